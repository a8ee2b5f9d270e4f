// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { setTimeout as sleep } from "node:timers/promises";
import { request } from "undici";
import type { ComputeCostArgs, Identity, WorkerRef } from "../common/types.js";
import { WorkerUnreachableError, errorMessage } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { accountIdOf } from "../identity/keys.js";
import { signRequest } from "./request-signing.js";
import { COMPUTE_COST, COMPUTE_COST_PATH, type WorkerTrigger } from "./trigger.js";

const logger = createLogger("trigger");

export interface HttpWorkerTriggerConfig {
  caller: Pick<Identity, "name" | "domain">;
  privateKeyPem: string;
  timeoutMs?: number;
  /** Extra attempts after the first one. */
  retries?: number;
  retryDelayMs?: number;
}

class NonRetryable extends Error {}

/** Signed HTTP invocation of a worker's `compute_cost` procedure. */
export class HttpWorkerTrigger implements WorkerTrigger {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(private readonly config: HttpWorkerTriggerConfig) {
    this.timeoutMs = config.timeoutMs ?? 5_000;
    this.retries = Math.max(0, config.retries ?? 2);
    this.retryDelayMs = config.retryDelayMs ?? 300;
  }

  async invoke(worker: WorkerRef, args: ComputeCostArgs): Promise<void> {
    const workerId = accountIdOf(worker.identity);
    const url = `${worker.address.replace(/\/$/, "")}${COMPUTE_COST_PATH}`;
    const body = JSON.stringify({ procedure: COMPUTE_COST, args });
    let lastError = "unknown";
    let attempts = 0;

    for (let attempt = 0; attempt <= this.retries; attempt += 1) {
      attempts = attempt + 1;
      try {
        await this.post(url, body);
        logger.debug("worker triggered", { worker: workerId, attempt: attempts });
        return;
      } catch (error) {
        lastError = errorMessage(error);
        if (error instanceof NonRetryable) break;
        logger.warn("worker trigger attempt failed", { worker: workerId, attempt: attempts, error: lastError });
        if (attempt < this.retries) await sleep(this.retryDelayMs * (attempt + 1));
      }
    }
    throw new WorkerUnreachableError(workerId, lastError, attempts);
  }

  private async post(url: string, body: string): Promise<void> {
    const headers = signRequest({
      method: "POST",
      path: COMPUTE_COST_PATH,
      body,
      privateKeyPem: this.config.privateKeyPem,
      nodeId: accountIdOf(this.config.caller)
    });
    const res = await request(url, {
      method: "POST",
      headers: { ...headers, "content-type": "application/json" },
      body,
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    const text = await res.body.text();
    if (res.statusCode >= 200 && res.statusCode < 300) return;
    const message = `status ${res.statusCode}${text ? `: ${text}` : ""}`;
    if (res.statusCode >= 400 && res.statusCode < 500) throw new NonRetryable(message);
    throw new Error(message);
  }
}
