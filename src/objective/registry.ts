/** Cost of a parameter vector against data the evaluating node keeps to itself. */
export type CostFunction = (beta: readonly number[]) => number | Promise<number>;

export class ObjectiveRegistry {
  private readonly objectives = new Map<string, CostFunction>();

  register(name: string, fn: CostFunction): this {
    this.objectives.set(name, fn);
    return this;
  }

  get(name: string): CostFunction | undefined {
    return this.objectives.get(name);
  }

  has(name: string): boolean {
    return this.objectives.has(name);
  }

  names(): string[] {
    return [...this.objectives.keys()];
  }
}

export const SUM = "sum";

export const sumObjective = ((beta) => beta.reduce((total, b) => total + b, 0)) satisfies CostFunction;
