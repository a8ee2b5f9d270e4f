/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

export interface Perturbation {
  beta: number[];
  index: number;
  offset: number;
}

/** Copies `beta` and shifts one uniformly chosen coordinate by a uniform offset in [-maxOffset, maxOffset). */
export function perturb(beta: readonly number[], maxOffset: number, random: RandomSource): Perturbation {
  if (beta.length === 0) throw new Error("cannot perturb an empty parameter vector");
  const index = Math.min(beta.length - 1, Math.floor(random() * beta.length));
  const offset = (random() * 2 - 1) * maxOffset;
  const next = [...beta];
  next[index] += offset;
  return { beta: next, index, offset };
}

/**
 * Metropolis acceptance probability `exp((newCost - oldCost) / temperature)`.
 * Costs are maximized: an improvement gives a value of at least 1.
 */
export function acceptanceProbability(oldCost: number, newCost: number, temperature: number): number {
  return Math.exp((newCost - oldCost) / temperature);
}

export interface Decision {
  accepted: boolean;
  probability: number;
  draw: number;
}

export function decide(oldCost: number, newCost: number, temperature: number, random: RandomSource): Decision {
  const probability = acceptanceProbability(oldCost, newCost, temperature);
  const draw = random();
  return { accepted: probability > draw, probability, draw };
}
