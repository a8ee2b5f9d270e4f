import type { ComputeCostArgs, WorkerRef } from "../common/types.js";
import { WorkerUnreachableError } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { accountIdOf } from "../identity/keys.js";
import type { ComputeCostHandler, WorkerTrigger } from "./trigger.js";

const logger = createLogger("trigger");

/**
 * Delivers triggers to handlers living in the same process, keyed by worker
 * address. Used for single-process simulations and tests.
 */
export class LocalWorkerTrigger implements WorkerTrigger {
  private readonly handlers = new Map<string, ComputeCostHandler>();
  private readonly inFlight = new Set<Promise<void>>();

  register(address: string, handler: ComputeCostHandler): this {
    this.handlers.set(address, handler);
    return this;
  }

  async invoke(worker: WorkerRef, args: ComputeCostArgs): Promise<void> {
    const workerId = accountIdOf(worker.identity);
    const handler = this.handlers.get(worker.address);
    if (!handler) throw new WorkerUnreachableError(workerId, "no handler at address", 1);
    if (!handler.supports(args.objective)) {
      throw new WorkerUnreachableError(workerId, `unknown objective ${args.objective}`, 1);
    }

    const task = handler
      .computeCost(args)
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error("compute_cost failed", { worker: workerId, error: String(error) });
      })
      .finally(() => this.inFlight.delete(task));
    this.inFlight.add(task);
  }

  /** Resolves once every triggered computation has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
