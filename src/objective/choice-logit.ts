import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { CostFunction } from "./registry.js";

export const CHOICE_LOGIT = "choice-logit";

const observationSchema = z.object({
  chooseCar: z.boolean(),
  carCost: z.number(),
  carTime: z.number(),
  trainCost: z.number(),
  trainTime: z.number()
});

export type ChoiceObservation = z.infer<typeof observationSchema>;

/**
 * Binary logit for car versus train. Utility of the car alternative is
 * `b0 + b1 * (carCost - trainCost) + b2 * (carTime - trainTime)`; the cost is
 * the summed log-likelihood of the observed choices, so larger is better.
 */
export function choiceLogLikelihood(beta: readonly number[], observations: readonly ChoiceObservation[]): number {
  if (beta.length !== 3) throw new Error(`choice-logit expects 3 parameters, got ${beta.length}`);
  const [asc, costWeight, timeWeight] = beta;
  let total = 0;
  for (const o of observations) {
    const utility = asc + costWeight * (o.carCost - o.trainCost) + timeWeight * (o.carTime - o.trainTime);
    // log(sigmoid(u)) = -log(1 + e^-u), written to stay finite for large |u|
    total += o.chooseCar ? -softplus(-utility) : -softplus(utility);
  }
  return total;
}

function softplus(x: number): number {
  return x > 0 ? x + Math.log1p(Math.exp(-x)) : Math.log1p(Math.exp(x));
}

export function choiceLogitObjective(observations: readonly ChoiceObservation[]): CostFunction {
  return (beta) => choiceLogLikelihood(beta, observations);
}

export async function loadChoiceObservations(path: string): Promise<ChoiceObservation[]> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  return z.array(observationSchema).parse(raw);
}
