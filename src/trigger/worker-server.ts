// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { z } from "zod";
import { createLogger } from "../common/logger.js";
import { ReplayGuard } from "../ledger/replay-guard.js";
import { verifySignedRequest, type SignedHeaders } from "./request-signing.js";
import { COMPUTE_COST, COMPUTE_COST_PATH, type ComputeCostHandler } from "./trigger.js";

const logger = createLogger("worker-rpc");

const computeCostSchema = z.object({
  procedure: z.literal(COMPUTE_COST),
  args: z.object({
    writer: z.string().min(1),
    domain: z.string().min(1),
    networkLocation: z.string().min(1),
    objective: z.string().min(1)
  })
});

export interface WorkerRpcServerConfig {
  port: number;
  host?: string;
  handler: ComputeCostHandler;
  /** Public key of a node allowed to trigger this worker, by account id. */
  resolvePublicKey: (nodeId: string) => string | undefined;
  maxSkewMs?: number;
  now?: () => number;
}

/**
 * Worker-side RPC endpoint. Verifies the caller's signature, answers 202 and
 * runs the computation in the background; the result goes out through the
 * detail channel, never in the HTTP response.
 */
export class WorkerRpcServer {
  readonly app: FastifyInstance;
  private actualPort = 0;
  private readonly replay: ReplayGuard;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private config: WorkerRpcServerConfig) {
    this.app = Fastify({ logger: false });
    this.replay = new ReplayGuard({ maxSkewMs: config.maxSkewMs, now: config.now });
    // the signature covers the exact request bytes, so JSON is parsed only after verification
    this.app.removeContentTypeParser("application/json");
    this.app.addContentTypeParser("application/json", { parseAs: "string" }, (_req, body, done) => {
      done(null, body);
    });
    this.registerRoutes();
  }

  private registerRoutes(): void {
    const { handler } = this.config;

    this.app.get("/health", async () => ({ ok: true }));

    this.app.post(COMPUTE_COST_PATH, async (req, reply) => {
      const rawBody = typeof req.body === "string" ? req.body : "";
      const verified = verifySignedRequest({
        method: req.method,
        path: COMPUTE_COST_PATH,
        headers: signedHeadersOf(req),
        rawBody,
        resolvePublicKey: this.config.resolvePublicKey,
        maxSkewMs: this.replay.maxSkewMs,
        nowMs: this.config.now?.()
      });
      if (!verified.valid) {
        return reply.code(401).send({ error: "invalid_signature", reason: verified.reason });
      }

      const replayed = this.replay.admit(verified.nodeId, verified.nonce, verified.timestampMs);
      if (replayed) {
        return reply.code(401).send({ error: "invalid_signature", reason: replayed });
      }

      const parsed = computeCostSchema.safeParse(parseJson(rawBody));
      if (!parsed.success) {
        return reply.code(400).send({ error: "validation_error", details: parsed.error.issues });
      }
      const { args } = parsed.data;
      if (verified.nodeId !== `${args.writer}@${args.domain}`) {
        return reply.code(403).send({ error: "writer_mismatch" });
      }
      if (!handler.supports(args.objective)) {
        return reply.code(404).send({ error: "unknown_objective", objective: args.objective });
      }

      const task = handler
        .computeCost(args)
        .then(() => undefined)
        .catch((error: unknown) => {
          logger.error("compute_cost failed", { caller: verified.nodeId, error: String(error) });
        })
        .finally(() => this.inFlight.delete(task));
      this.inFlight.add(task);

      return reply.code(202).send({ accepted: true });
    });
  }

  /** Resolves once every accepted computation has finished. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  async start(): Promise<number> {
    await this.app.listen({ port: this.config.port, host: this.config.host ?? "0.0.0.0" });
    const addr = this.app.server.address();
    this.actualPort = typeof addr === "object" && addr ? addr.port : this.config.port;
    logger.info("worker rpc listening", { port: this.actualPort });
    return this.actualPort;
  }

  get port(): number {
    return this.actualPort;
  }

  async stop(): Promise<void> {
    await this.app.close();
    await this.drain();
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function signedHeadersOf(req: FastifyRequest): Partial<SignedHeaders> {
  const pick = (name: keyof SignedHeaders): string | undefined => {
    const value = req.headers[name];
    return typeof value === "string" ? value : undefined;
  };
  return {
    "x-node-id": pick("x-node-id"),
    "x-timestamp-ms": pick("x-timestamp-ms"),
    "x-nonce": pick("x-nonce"),
    "x-body-sha256": pick("x-body-sha256"),
    "x-signature": pick("x-signature")
  };
}
