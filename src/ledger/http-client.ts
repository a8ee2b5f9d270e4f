// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { request } from "undici";
import { z } from "zod";
import type { QueryResult, SignedQuery, SignedTransaction, SubmitReceipt } from "../common/types.js";
import { QueryDeniedError, TransactionRejectedError } from "../common/errors.js";
import type { LedgerClient } from "./client.js";
import {
  denialReasonSchema,
  queryResultSchema,
  rejectionReasonSchema,
  submitReceiptSchema
} from "./schemas.js";

export interface HttpLedgerClientOptions {
  timeoutMs?: number;
}

const rejectionBodySchema = z.object({ error: z.string(), reason: rejectionReasonSchema });
const denialBodySchema = z.object({ error: z.string(), reason: denialReasonSchema });
const queryBodySchema = z.object({ result: queryResultSchema });

/** Ledger client for a gateway served by `LedgerHttpServer`. */
export class HttpLedgerClient implements LedgerClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(baseUrl: string, options: HttpLedgerClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async submit(tx: SignedTransaction): Promise<SubmitReceipt> {
    const { statusCode, body } = await this.post("/transactions", tx);
    if (statusCode >= 200 && statusCode < 300) {
      return submitReceiptSchema.parse(body);
    }
    const rejection = rejectionBodySchema.safeParse(body);
    if (rejection.success) {
      throw new TransactionRejectedError(rejection.data.reason, { statusCode });
    }
    throw new Error(`POST /transactions failed (${statusCode})`);
  }

  async query(query: SignedQuery): Promise<QueryResult> {
    const { statusCode, body } = await this.post("/queries", query);
    if (statusCode >= 200 && statusCode < 300) {
      return queryBodySchema.parse(body).result;
    }
    const denial = denialBodySchema.safeParse(body);
    if (denial.success) {
      throw new QueryDeniedError(denial.data.reason, { statusCode });
    }
    throw new Error(`POST /queries failed (${statusCode})`);
  }

  private async post(path: string, payload: unknown): Promise<{ statusCode: number; body: unknown }> {
    const res = await request(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs
    });
    const text = await res.body.text();
    let body: unknown = {};
    if (text.trim()) {
      try {
        body = JSON.parse(text);
      } catch {
        body = {};
      }
    }
    return { statusCode: res.statusCode, body };
  }
}
