import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Domain, Identity, Role } from "./types.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { LogLevel } from "./logger.js";
import { DEFAULT_SCHEDULE, validateSchedule, type CoolingSchedule } from "../annealing/schedule.js";
import type { FanOut } from "../annealing/controller.js";

type Env = Record<string, string | undefined>;

export const DEFAULT_INITIAL_BETA = [0.00123, 0.00664, 0.006463];

const port = (fallback: number) => z.coerce.number().int().min(0).max(65_535).default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const positive = (fallback: number) => z.coerce.number().positive().default(fallback);

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

// PEM blocks often arrive with escaped newlines when passed through env files.
const pem = z
  .string()
  .min(1)
  .transform((value) => value.replace(/\\n/g, "\n"));

const numberList = z.string().transform((value, ctx) => {
  const parts = value.split(",").map((p) => p.trim()).filter((p) => p !== "");
  const numbers = parts.map(Number);
  if (numbers.length === 0 || numbers.some((n) => !Number.isFinite(n))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a comma separated list of numbers" });
    return z.NEVER;
  }
  return numbers;
});

const workerList = z.string().transform((value, ctx) => {
  const entries: Array<{ name: string; address: string }> = [];
  for (const part of value.split(",").map((p) => p.trim()).filter((p) => p !== "")) {
    const eq = part.indexOf("=");
    const name = part.slice(0, eq).trim();
    const address = part.slice(eq + 1).trim();
    if (eq <= 0 || address === "" || !URL.canParse(address)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid worker entry "${part}", expected name=url` });
      return z.NEVER;
    }
    entries.push({ name, address: address.replace(/\/+$/, "") });
  }
  if (entries.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at least one worker is required" });
    return z.NEVER;
  }
  return entries;
});

const common = {
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  HOST: z.string().min(1).default("0.0.0.0"),
  GENESIS_FILE: z.string().min(1).default("data/genesis.json")
};

const identityFields = {
  NODE_NAME: z.string().min(1),
  NODE_DOMAIN: z.string().min(1),
  NODE_PRIVATE_KEY_PEM: pem,
  NODE_PUBLIC_KEY_PEM: pem.optional(),
  LEDGER_URL: z.string().url()
};

const ledgerEnv = z.object({
  NODE_ROLE: z.literal("ledger"),
  ...common,
  LEDGER_PORT: port(4400),
  LEDGER_COMMIT_LATENCY_MS: z.coerce.number().int().nonnegative().default(0)
});

const workerEnv = z.object({
  NODE_ROLE: z.literal("worker"),
  ...common,
  ...identityFields,
  WORKER_PORT: port(4410),
  MASTER_ACCOUNT: z.string().regex(/^[^@\s]+@[^@\s]+$/, "expected name@domain"),
  DATA_FILE: z.string().min(1).optional(),
  POLL_TIMEOUT_MS: positiveInt(30_000),
  POLL_INTERVAL_MS: positiveInt(250)
});

const chiefEnv = z.object({
  NODE_ROLE: z.literal("chief"),
  ...common,
  ...identityFields,
  WORKERS: workerList,
  NETWORK_LOCATION: z.string().url().optional(),
  OBJECTIVE: z.string().min(1).default("choice-logit"),
  INITIAL_BETA: numberList.default(DEFAULT_INITIAL_BETA.join(",")),
  ANNEAL_T0: positive(DEFAULT_SCHEDULE.t0),
  ANNEAL_ALPHA: positive(DEFAULT_SCHEDULE.alpha),
  ANNEAL_T_MIN: positive(DEFAULT_SCHEDULE.temperatureMin),
  ANNEAL_ITERATIONS_PER_T: positiveInt(DEFAULT_SCHEDULE.iterationsPerTemperature),
  ANNEAL_MAX_OFFSET: positive(0.01),
  MEASURE_BASELINE: flag,
  COLLECT_TIMEOUT_MS: positiveInt(30_000),
  POLL_INTERVAL_MS: positiveInt(250),
  WORKER_RETRIES: z.coerce.number().int().nonnegative().default(1),
  FAN_OUT: z.enum(["sequential", "parallel"]).default("sequential"),
  TRAJECTORY_FILE: z.string().min(1).optional()
});

const envSchema = z.discriminatedUnion("NODE_ROLE", [ledgerEnv, workerEnv, chiefEnv]);

interface BaseConfig {
  logLevel: LogLevel;
  host: string;
  genesisFile: string;
}

export interface NodeIdentityConfig {
  name: string;
  domain: string;
  privateKeyPem: string;
  publicKeyPem?: string;
  ledgerUrl: string;
}

export interface LedgerNodeConfig extends BaseConfig {
  role: "ledger";
  port: number;
  commitLatencyMs: number;
}

export interface WorkerNodeConfig extends BaseConfig {
  role: "worker";
  node: NodeIdentityConfig;
  port: number;
  masterAccount: string;
  dataFile?: string;
  pollTimeoutMs: number;
  pollIntervalMs: number;
}

export interface ChiefNodeConfig extends BaseConfig {
  role: "chief";
  node: NodeIdentityConfig;
  workers: Array<{ name: string; address: string }>;
  networkLocation: string;
  objective: string;
  initialBeta: number[];
  schedule: CoolingSchedule;
  maxOffset: number;
  measureBaseline: boolean;
  collectTimeoutMs: number;
  pollIntervalMs: number;
  workerRetries: number;
  fanOut: FanOut;
  trajectoryFile?: string;
}

export type AppConfig = LedgerNodeConfig | WorkerNodeConfig | ChiefNodeConfig;

/** Reads node configuration from environment variables. Throws `ConfigError`. */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("invalid environment configuration", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    });
  }
  const e = parsed.data;
  const base: BaseConfig = { logLevel: e.LOG_LEVEL, host: e.HOST, genesisFile: e.GENESIS_FILE };

  if (e.NODE_ROLE === "ledger") {
    return { ...base, role: "ledger", port: e.LEDGER_PORT, commitLatencyMs: e.LEDGER_COMMIT_LATENCY_MS };
  }

  const node: NodeIdentityConfig = {
    name: e.NODE_NAME,
    domain: e.NODE_DOMAIN,
    privateKeyPem: e.NODE_PRIVATE_KEY_PEM,
    publicKeyPem: e.NODE_PUBLIC_KEY_PEM,
    ledgerUrl: e.LEDGER_URL
  };

  if (e.NODE_ROLE === "worker") {
    return {
      ...base,
      role: "worker",
      node,
      port: e.WORKER_PORT,
      masterAccount: e.MASTER_ACCOUNT,
      dataFile: e.DATA_FILE,
      pollTimeoutMs: e.POLL_TIMEOUT_MS,
      pollIntervalMs: e.POLL_INTERVAL_MS
    };
  }

  const schedule = validateSchedule({
    t0: e.ANNEAL_T0,
    alpha: e.ANNEAL_ALPHA,
    temperatureMin: e.ANNEAL_T_MIN,
    iterationsPerTemperature: e.ANNEAL_ITERATIONS_PER_T
  });
  return {
    ...base,
    role: "chief",
    node,
    workers: e.WORKERS,
    networkLocation: e.NETWORK_LOCATION ?? e.LEDGER_URL,
    objective: e.OBJECTIVE,
    initialBeta: e.INITIAL_BETA,
    schedule,
    maxOffset: e.ANNEAL_MAX_OFFSET,
    measureBaseline: e.MEASURE_BASELINE,
    collectTimeoutMs: e.COLLECT_TIMEOUT_MS,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    workerRetries: e.WORKER_RETRIES,
    fanOut: e.FAN_OUT,
    trajectoryFile: e.TRAJECTORY_FILE
  };
}

const genesisSchema = z.object({
  domains: z.array(z.object({ id: z.string().min(1), defaultRole: z.enum(["admin", "user"]).default("user") })),
  accounts: z.array(
    z.object({
      name: z.string().min(1),
      domain: z.string().min(1),
      publicKeyPem: z.string().min(1),
      role: z.enum(["admin", "user"]).optional()
    })
  )
});

export interface GenesisDocument {
  domains: Domain[];
  accounts: Array<{ identity: Identity; role?: Role }>;
}

/** Parses the shared directory of domains and account keys every node starts from. */
export function parseGenesis(raw: unknown): GenesisDocument {
  const parsed = genesisSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("invalid genesis document", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }
  return {
    domains: parsed.data.domains,
    accounts: parsed.data.accounts.map(({ role, ...identity }) => ({ identity, role }))
  };
}

export async function loadGenesis(path: string): Promise<GenesisDocument> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`cannot read genesis file ${path}`, { error: errorMessage(error) });
  }
  return parseGenesis(raw);
}
