// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomUUID } from "node:crypto";
import type { ComputeCostArgs, HistoryEntry, Identity, TrajectoryEntry, WorkerRef } from "../common/types.js";
import {
  ConfigError,
  IncompleteRoundError,
  InvalidSigningKeyError,
  PollTimeoutError,
  QueryDeniedError,
  TransactionRejectedError,
  ValueTooLargeError,
  errorMessage
} from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import type { DetailChannel } from "../channel/detail-channel.js";
import { COST_KEY, PARAMETERS_KEY, costValue, decodeCostReport, encodeParameters } from "../channel/payloads.js";
import { accountIdOf } from "../identity/keys.js";
import type { WorkerTrigger } from "../trigger/trigger.js";
import { cool, validateSchedule, type CoolingSchedule } from "./schedule.js";
import { decide, perturb, type RandomSource } from "./proposal.js";
import { LogTrajectorySink, type TrajectorySink } from "./trajectory.js";

const logger = createLogger("annealing");

export type ControllerPhase = "init" | "distribute" | "collect" | "decide" | "cool" | "terminated";
export type FanOut = "sequential" | "parallel";

export interface AnnealingTimeouts {
  /** Upper bound on waiting for one worker's cost in one attempt. */
  collectTimeoutMs: number;
  pollIntervalMs: number;
}

export interface AnnealingConfig {
  master: Identity;
  masterPrivateKeyPem: string;
  workers: WorkerRef[];
  /** Domain of the master account, passed to workers as the writer's domain. */
  domain: string;
  /** Ledger location workers should read from. */
  networkLocation: string;
  objective: string;
  initialBeta: number[];
  schedule: CoolingSchedule;
  timeouts: AnnealingTimeouts;
  /** Extra attempts per worker and round after a failed one. Default 1. */
  workerRetries?: number;
  /** Half-width of the single-coordinate perturbation. Default 0.01. */
  maxOffset?: number;
  fanOut?: FanOut;
  /** Evaluate `initialBeta` before the first proposal. Default true. */
  measureBaseline?: boolean;
  random?: RandomSource;
  trajectory?: TrajectorySink;
}

export interface AnnealingDeps {
  channel: DetailChannel;
  trigger: WorkerTrigger;
}

/** One worker's share of one round. */
export interface WorkerSession {
  worker: WorkerRef;
  workerId: string;
  round: number;
  proposedBeta: number[];
  distributed: boolean;
  returnedCost?: number;
  failure?: string;
}

export type RoundOutcome =
  | { kind: "complete"; round: number; aggregateCost: number; costs: Record<string, number> }
  | { kind: "incomplete"; round: number; error: IncompleteRoundError };

export type StepOutcome =
  | {
      kind: "accepted" | "rejected";
      iteration: number;
      round: number;
      proposal: number[];
      cost: number;
      probability: number;
      temperature: number;
    }
  | { kind: "incomplete"; iteration: number; round: number; proposal: number[]; missing: string[]; temperature: number }
  | { kind: "terminated" };

export interface AnnealingSnapshot {
  runId: string;
  phase: ControllerPhase;
  beta: number[];
  currentCost: number;
  temperature: number;
  iteration: number;
  rounds: number;
  history: readonly HistoryEntry[];
}

export interface AnnealingResult {
  runId: string;
  beta: number[];
  cost: number;
  temperature: number;
  iterations: number;
  rounds: number;
  incompleteRounds: number;
  history: HistoryEntry[];
}

/**
 * Drives the annealing loop on the master node. Each proposal is written into
 * every worker's account, workers are triggered, and their costs are read back
 * from the master's own account and summed before the Metropolis decision.
 *
 * A round with any missing cost changes nothing: the same proposal is retried
 * at the same temperature on the next step.
 *
 * Payloads carry a fresh `runId` per controller, so values a previous run left
 * on the ledger never count for this one.
 */
export class AnnealingController {
  readonly runId = randomUUID();
  private phase: ControllerPhase = "init";
  private beta: number[];
  private currentCost = Number.NEGATIVE_INFINITY;
  private temperature: number;
  private iteration = 0;
  private iterationAtTemperature = 0;
  private round = 0;
  private incompleteRounds = 0;
  private pendingProposal: number[] | undefined;
  private readonly history: HistoryEntry[] = [];
  private readonly masterId: string;
  private readonly random: RandomSource;
  private readonly sink: TrajectorySink;

  constructor(
    private readonly config: AnnealingConfig,
    private readonly deps: AnnealingDeps
  ) {
    validateSchedule(config.schedule);
    if (config.initialBeta.length === 0) throw new ConfigError("initialBeta must not be empty");
    if (config.workers.length === 0) throw new ConfigError("at least one worker is required");
    if (config.master.domain !== config.domain) {
      throw new ConfigError("master account must live in the configured domain", {
        master: accountIdOf(config.master),
        domain: config.domain
      });
    }
    const ids = config.workers.map((w) => accountIdOf(w.identity));
    if (new Set(ids).size !== ids.length) throw new ConfigError("worker accounts must be distinct", { workers: ids });

    this.beta = [...config.initialBeta];
    this.temperature = config.schedule.t0;
    this.masterId = accountIdOf(config.master);
    this.random = config.random ?? Math.random;
    this.sink = config.trajectory ?? new LogTrajectorySink();
  }

  snapshot(): AnnealingSnapshot {
    return {
      runId: this.runId,
      phase: this.phase,
      beta: [...this.beta],
      currentCost: this.currentCost,
      temperature: this.temperature,
      iteration: this.iteration,
      rounds: this.round,
      history: this.copyHistory()
    };
  }

  /** Measures the baseline cost of `initialBeta` when enabled. Safe to call more than once. */
  async initialize(signal?: AbortSignal): Promise<void> {
    if (this.phase !== "init") return;
    logger.info("annealing started", {
      runId: this.runId,
      master: this.masterId,
      workers: this.config.workers.map((w) => accountIdOf(w.identity)),
      objective: this.config.objective,
      t0: this.config.schedule.t0
    });

    if (this.config.measureBaseline ?? true) {
      const outcome = await this.runRound(this.beta, signal);
      if (outcome.kind === "complete") {
        this.currentCost = outcome.aggregateCost;
        logger.info("baseline measured", { round: outcome.round, cost: outcome.aggregateCost });
      } else {
        this.incompleteRounds += 1;
        logger.warn("baseline incomplete, starting from -Infinity", { missing: outcome.error.missing });
      }
    }

    this.phase = this.temperature < this.config.schedule.temperatureMin ? "terminated" : "distribute";
  }

  /**
   * Publishes `beta` to every worker, triggers them, and collects their costs.
   * Throws only on fatal errors; worker failures produce an incomplete outcome.
   */
  async runRound(beta: readonly number[], signal?: AbortSignal): Promise<RoundOutcome> {
    const round = ++this.round;
    const sessions: WorkerSession[] = this.config.workers.map((worker) => ({
      worker,
      workerId: accountIdOf(worker.identity),
      round,
      proposedBeta: [...beta],
      distributed: false
    }));

    this.phase = "distribute";
    await this.forEachSession(sessions, (session) => this.distribute(session, 0));

    this.phase = "collect";
    await this.forEachSession(sessions, (session) => this.collect(session, signal));

    const missing = sessions.filter((s) => s.returnedCost === undefined).map((s) => s.workerId);
    if (missing.length > 0) {
      return { kind: "incomplete", round, error: new IncompleteRoundError(round, missing) };
    }

    const costs: Record<string, number> = {};
    let aggregateCost = 0;
    for (const session of sessions) {
      const cost = session.returnedCost ?? 0;
      costs[session.workerId] = cost;
      aggregateCost += cost;
    }
    return { kind: "complete", round, aggregateCost, costs };
  }

  /** One proposal: distribute, collect, decide, then advance the schedule. */
  async step(signal?: AbortSignal): Promise<StepOutcome> {
    if (this.phase === "init") await this.initialize(signal);
    if (this.phase === "terminated") return { kind: "terminated" };

    const proposal = this.pendingProposal ?? perturb(this.beta, this.config.maxOffset ?? 0.01, this.random).beta;
    this.iteration += 1;
    const iteration = this.iteration;
    const temperature = this.temperature;
    const outcome = await this.runRound(proposal, signal);

    let result: StepOutcome;
    if (outcome.kind === "incomplete") {
      this.pendingProposal = proposal;
      this.incompleteRounds += 1;
      const { missing } = outcome.error;
      logger.warn(outcome.error.message, { iteration, round: outcome.round });
      await this.record({ iteration, round: outcome.round, temperature, incomplete: true, missing });
      result = { kind: "incomplete", iteration, round: outcome.round, proposal, missing, temperature };
    } else {
      this.pendingProposal = undefined;
      this.phase = "decide";
      const decision = decide(this.currentCost, outcome.aggregateCost, temperature, this.random);
      const entry: HistoryEntry = {
        iteration,
        round: outcome.round,
        beta: [...proposal],
        cost: outcome.aggregateCost,
        temperature
      };
      if (decision.accepted) {
        this.beta = [...proposal];
        this.currentCost = outcome.aggregateCost;
        this.history.push(entry);
      }
      logger.debug("proposal decided", { iteration, accepted: decision.accepted, probability: decision.probability });
      await this.record({ ...entry, accepted: decision.accepted });
      result = {
        kind: decision.accepted ? "accepted" : "rejected",
        iteration,
        round: outcome.round,
        proposal,
        cost: outcome.aggregateCost,
        probability: decision.probability,
        temperature
      };
    }

    this.phase = "cool";
    this.advanceSchedule();
    return result;
  }

  /** Steps until the schedule is exhausted or `signal` aborts. */
  async run(signal?: AbortSignal): Promise<AnnealingResult> {
    try {
      await this.initialize(signal);
      while (this.phase !== "terminated" && !signal?.aborted) {
        await this.step(signal);
      }
    } catch (error) {
      if (!signal?.aborted) throw error;
    }
    if (signal?.aborted) logger.warn("annealing aborted", { iteration: this.iteration });
    const result = this.result();
    logger.info("annealing finished", {
      beta: result.beta,
      cost: result.cost,
      iterations: result.iterations,
      accepted: result.history.length,
      incompleteRounds: result.incompleteRounds
    });
    return result;
  }

  result(): AnnealingResult {
    return {
      runId: this.runId,
      beta: [...this.beta],
      cost: this.currentCost,
      temperature: this.temperature,
      iterations: this.iteration,
      rounds: this.round,
      incompleteRounds: this.incompleteRounds,
      history: this.copyHistory()
    };
  }

  private copyHistory(): HistoryEntry[] {
    return this.history.map((entry) => ({ ...entry, beta: [...entry.beta] }));
  }

  private advanceSchedule(): void {
    this.iterationAtTemperature += 1;
    if (this.iterationAtTemperature >= this.config.schedule.iterationsPerTemperature) {
      this.iterationAtTemperature = 0;
      this.temperature = cool(this.temperature, this.config.schedule);
      logger.info("cooled", { temperature: this.temperature, beta: this.beta, cost: this.currentCost });
    }
    this.phase = this.temperature < this.config.schedule.temperatureMin ? "terminated" : "distribute";
  }

  private triggerArgs(): ComputeCostArgs {
    return {
      writer: this.config.master.name,
      domain: this.config.domain,
      networkLocation: this.config.networkLocation,
      objective: this.config.objective
    };
  }

  /** Writes the round's parameters into the worker's account and triggers it. */
  private async distribute(session: WorkerSession, attempt: number): Promise<boolean> {
    const payload = encodeParameters({
      runId: this.runId,
      round: session.round,
      attempt,
      beta: session.proposedBeta,
      objective: this.config.objective
    });
    try {
      await this.deps.channel.publishTo(
        this.config.master,
        session.worker.identity,
        PARAMETERS_KEY,
        payload,
        this.config.masterPrivateKeyPem
      );
      await this.deps.trigger.invoke(session.worker, this.triggerArgs());
      session.distributed = true;
      session.failure = undefined;
    } catch (error) {
      this.rethrowFatal(error);
      session.distributed = false;
      session.failure = errorMessage(error);
      logger.warn("distribution failed", { worker: session.workerId, round: session.round, attempt, error: session.failure });
    }
    return session.distributed;
  }

  private async collect(session: WorkerSession, signal?: AbortSignal): Promise<void> {
    const retries = this.config.workerRetries ?? 1;
    for (let attempt = 0; attempt <= retries; attempt++) {
      if (attempt > 0 && !(await this.distribute(session, attempt))) continue;
      if (!session.distributed) continue;
      try {
        const report = await this.deps.channel.waitForValue(
          this.config.master,
          session.workerId,
          COST_KEY,
          this.config.masterPrivateKeyPem,
          {
            timeoutMs: this.config.timeouts.collectTimeoutMs,
            intervalMs: this.config.timeouts.pollIntervalMs,
            signal,
            parse: (raw) => {
              const decoded = decodeCostReport(raw);
              if (!decoded || decoded.runId !== this.runId || decoded.round !== session.round) return undefined;
              // a usable cost for this round counts whichever attempt produced it
              return costValue(decoded) !== null || decoded.attempt >= attempt ? decoded : undefined;
            }
          }
        );
        const cost = costValue(report);
        if (cost !== null) {
          session.returnedCost = cost;
          session.failure = undefined;
          return;
        }
        session.failure = "error" in report ? report.error : "unparsable cost";
      } catch (error) {
        this.rethrowFatal(error);
        if (signal?.aborted) throw error;
        session.failure = error instanceof PollTimeoutError ? "timeout" : errorMessage(error);
      }
      logger.warn("cost not collected", { worker: session.workerId, round: session.round, attempt, reason: session.failure });
    }
  }

  private async forEachSession(sessions: WorkerSession[], fn: (s: WorkerSession) => Promise<unknown>): Promise<void> {
    if ((this.config.fanOut ?? "sequential") === "sequential") {
      for (const session of sessions) await fn(session);
      return;
    }
    const settled = await Promise.allSettled(sessions.map(fn));
    for (const outcome of settled) {
      if (outcome.status === "rejected") throw outcome.reason;
    }
  }

  private rethrowFatal(error: unknown): void {
    if (error instanceof ValueTooLargeError) throw error;
    if (
      (error instanceof TransactionRejectedError || error instanceof QueryDeniedError) &&
      (error.reason === "invalid_signature" || error.reason === "unknown_creator")
    ) {
      throw new InvalidSigningKeyError(this.masterId, error.reason);
    }
  }

  private async record(entry: TrajectoryEntry): Promise<void> {
    try {
      await this.sink.record(entry);
    } catch (error) {
      logger.error("trajectory sink failed", { error: errorMessage(error) });
    }
  }
}
