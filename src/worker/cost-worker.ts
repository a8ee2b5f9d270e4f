// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { ComputeCostArgs, CostReport, Identity, RoundParameters } from "../common/types.js";
import { errorMessage } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import type { DetailChannel } from "../channel/detail-channel.js";
import { COST_KEY, PARAMETERS_KEY, decodeParameters, encodeCostReport } from "../channel/payloads.js";
import type { ObjectiveRegistry } from "../objective/registry.js";
import { accountIdOf } from "../identity/keys.js";
import type { ComputeCostHandler } from "../trigger/trigger.js";

const logger = createLogger("worker");

export interface CostWorkerConfig {
  identity: Identity;
  privateKeyPem: string;
  objectives: ObjectiveRegistry;
  /** Detail channel for the ledger at a given network location. */
  channelFor: (networkLocation: string) => DetailChannel;
  pollTimeoutMs?: number;
  pollIntervalMs?: number;
}

/**
 * Worker side of `compute_cost`: picks up the newest parameters a master
 * wrote into this worker's account, evaluates them against local data and
 * writes the cost back into the master's account.
 */
export class CostWorker implements ComputeCostHandler {
  /** Last round reported successfully, per master account and run. */
  private readonly reported = new Map<string, number>();
  private readonly pollTimeoutMs: number;
  private readonly pollIntervalMs: number;

  constructor(private readonly config: CostWorkerConfig) {
    this.pollTimeoutMs = config.pollTimeoutMs ?? 30_000;
    this.pollIntervalMs = config.pollIntervalMs ?? 250;
  }

  supports(objective: string): boolean {
    return this.config.objectives.has(objective);
  }

  lastReportedRound(master: string, runId: string): number | undefined {
    return this.reported.get(reportKey(master, runId));
  }

  async computeCost(args: ComputeCostArgs): Promise<CostReport> {
    const { identity, privateKeyPem } = this.config;
    const master = { name: args.writer, domain: args.domain };
    const masterId = accountIdOf(master);
    const channel = this.config.channelFor(args.networkLocation);

    const parameters = await channel.waitForValue(identity, masterId, PARAMETERS_KEY, privateKeyPem, {
      timeoutMs: this.pollTimeoutMs,
      intervalMs: this.pollIntervalMs,
      parse: (raw) => {
        const decoded = decodeParameters(raw);
        if (!decoded) return undefined;
        return decoded.round > (this.lastReportedRound(masterId, decoded.runId) ?? -1) ? decoded : undefined;
      }
    });

    const report = await this.evaluate(args.objective, parameters);
    await channel.publishTo(identity, master, COST_KEY, encodeCostReport(report), privateKeyPem);

    if ("cost" in report) {
      this.reported.set(reportKey(masterId, parameters.runId), parameters.round);
      logger.info("cost published", { master: masterId, runId: parameters.runId, round: parameters.round, cost: report.cost });
    } else {
      logger.warn("evaluation failed", {
        master: masterId,
        runId: parameters.runId,
        round: parameters.round,
        error: report.error
      });
    }
    return report;
  }

  private async evaluate(objective: string, parameters: RoundParameters): Promise<CostReport> {
    const { runId, round, attempt, beta } = parameters;
    const tag = { runId, round, attempt };
    const fn = this.config.objectives.get(objective);
    if (!fn) return { ...tag, error: `unknown objective ${objective}` };
    try {
      const cost = await fn(beta);
      return Number.isFinite(cost) ? { ...tag, cost } : { ...tag, error: "non_finite_cost" };
    } catch (error) {
      return { ...tag, error: errorMessage(error) };
    }
  }
}

function reportKey(master: string, runId: string): string {
  return `${master}\n${runId}`;
}
