import type { ComputeCostArgs, WorkerRef } from "../common/types.js";

export const COMPUTE_COST = "compute_cost";
export const COMPUTE_COST_PATH = `/rpc/${COMPUTE_COST}`;

/**
 * Asks a worker to evaluate the parameters it was just sent. Resolves once the
 * worker has accepted the call; the cost arrives later through the detail
 * channel. Rejects with `WorkerUnreachableError`.
 */
export interface WorkerTrigger {
  invoke(worker: WorkerRef, args: ComputeCostArgs): Promise<void>;
}

/** Worker-side receiver of a trigger. */
export interface ComputeCostHandler {
  supports(objective: string): boolean;
  computeCost(args: ComputeCostArgs): Promise<unknown>;
}
