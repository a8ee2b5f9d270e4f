// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Fastify, { type FastifyInstance } from "fastify";
import { QueryDeniedError, TransactionRejectedError } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import type { LedgerClient } from "./client.js";
import { signedQuerySchema, signedTransactionSchema } from "./schemas.js";

const logger = createLogger("ledger-gateway");

export interface LedgerHttpServerConfig {
  port: number;
  host?: string;
  ledger: LedgerClient;
}

/** Exposes a ledger over HTTP for nodes running in other processes. */
export class LedgerHttpServer {
  readonly app: FastifyInstance;
  private actualPort = 0;

  constructor(private config: LedgerHttpServerConfig) {
    this.app = Fastify({ logger: false });
    this.registerRoutes();
  }

  private registerRoutes(): void {
    const { ledger } = this.config;

    this.app.get("/health", async () => ({ ok: true }));

    this.app.post("/transactions", async (req, reply) => {
      const parsed = signedTransactionSchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "transaction_rejected", reason: "malformed" });
      }
      try {
        return await ledger.submit(parsed.data);
      } catch (error) {
        if (error instanceof TransactionRejectedError) {
          return reply.code(400).send({ error: "transaction_rejected", reason: error.reason });
        }
        logger.error("transaction submission failed", { error: String(error) });
        throw error;
      }
    });

    this.app.post("/queries", async (req, reply) => {
      const parsed = signedQuerySchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "query_denied", reason: "malformed" });
      }
      try {
        return { result: await ledger.query(parsed.data) };
      } catch (error) {
        if (error instanceof QueryDeniedError) {
          return reply.code(403).send({ error: "query_denied", reason: error.reason });
        }
        logger.error("query failed", { error: String(error) });
        throw error;
      }
    });
  }

  async start(): Promise<number> {
    await this.app.listen({ port: this.config.port, host: this.config.host ?? "0.0.0.0" });
    const addr = this.app.server.address();
    this.actualPort = typeof addr === "object" && addr ? addr.port : this.config.port;
    logger.info("ledger gateway listening", { port: this.actualPort });
    return this.actualPort;
  }

  get port(): number {
    return this.actualPort;
  }

  async stop(): Promise<void> {
    await this.app.close();
  }
}
