import { z } from "zod";
import type { CostReport, RoundParameters } from "../common/types.js";

/** Detail key the master writes parameters under, in each worker's account. */
export const PARAMETERS_KEY = "betas";
/** Detail key a worker writes its result under, in the master's account. */
export const COST_KEY = "cost";

const runIdSchema = z.string().min(1);
const roundSchema = z.number().int().nonnegative();
const attemptSchema = z.number().int().nonnegative().default(0);

const roundParametersSchema = z.object({
  runId: runIdSchema,
  round: roundSchema,
  attempt: attemptSchema,
  beta: z.array(z.number().finite()).min(1),
  objective: z.string().min(1)
});

const costReportSchema = z.union([
  z.object({ runId: runIdSchema, round: roundSchema, attempt: attemptSchema, cost: z.union([z.number(), z.string()]) }),
  z.object({ runId: runIdSchema, round: roundSchema, attempt: attemptSchema, error: z.string() })
]);

export function encodeParameters(parameters: RoundParameters): string {
  return JSON.stringify(parameters);
}

export function decodeParameters(raw: string): RoundParameters | undefined {
  const parsed = roundParametersSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data : undefined;
}

export function encodeCostReport(report: CostReport): string {
  return JSON.stringify(report);
}

export function decodeCostReport(raw: string): CostReport | undefined {
  const parsed = costReportSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data : undefined;
}

/** Numeric value of a reported cost, or null when it is not a finite number. */
export function costValue(report: CostReport): number | null {
  if (!("cost" in report)) return null;
  if (typeof report.cost === "number") return Number.isFinite(report.cost) ? report.cost : null;
  const text = report.cost.trim();
  if (text === "") return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
