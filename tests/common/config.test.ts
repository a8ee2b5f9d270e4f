import { describe, expect, it } from "vitest";
import { ConfigError } from "../../src/common/errors.js";
import { loadConfig, parseGenesis } from "../../src/common/config.js";

const chiefEnv = {
  NODE_ROLE: "chief",
  NODE_NAME: "chief",
  NODE_DOMAIN: "cluster",
  NODE_PRIVATE_KEY_PEM: "test-key-line-1\\ntest-key-line-2",
  LEDGER_URL: "http://ledger.test:4400",
  WORKERS: "worker1=http://w1.test:4410/, worker2=http://w2.test:4410"
};

describe("config", () => {
  it("defaults a ledger node", () => {
    expect(loadConfig({ NODE_ROLE: "ledger" })).toEqual({
      role: "ledger",
      logLevel: "info",
      host: "0.0.0.0",
      genesisFile: "data/genesis.json",
      port: 4400,
      commitLatencyMs: 0
    });
  });

  it("defaults a chief to the reference annealing run", () => {
    const config = loadConfig(chiefEnv);
    expect(config.role).toBe("chief");
    if (config.role !== "chief") return;
    expect(config.node.privateKeyPem).toBe("test-key-line-1\ntest-key-line-2");
    expect(config.workers).toEqual([
      { name: "worker1", address: "http://w1.test:4410" },
      { name: "worker2", address: "http://w2.test:4410" }
    ]);
    expect(config.networkLocation).toBe("http://ledger.test:4400");
    expect(config.objective).toBe("choice-logit");
    expect(config.initialBeta).toEqual([0.00123, 0.00664, 0.006463]);
    expect(config.schedule).toEqual({ t0: 1, alpha: 0.9, temperatureMin: 0.00001, iterationsPerTemperature: 500 });
    expect(config.maxOffset).toBe(0.01);
    expect(config.measureBaseline).toBe(true);
    expect(config.workerRetries).toBe(1);
    expect(config.fanOut).toBe("sequential");
    expect(config.trajectoryFile).toBeUndefined();
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...chiefEnv,
      INITIAL_BETA: "0.1, 0.2,0.3",
      ANNEAL_ALPHA: "0.5",
      ANNEAL_ITERATIONS_PER_T: "20",
      MEASURE_BASELINE: "false",
      FAN_OUT: "parallel",
      WORKER_RETRIES: "0",
      LOG_LEVEL: "debug"
    });
    if (config.role !== "chief") throw new Error("expected a chief config");
    expect(config.initialBeta).toEqual([0.1, 0.2, 0.3]);
    expect(config.schedule.alpha).toBe(0.5);
    expect(config.schedule.iterationsPerTemperature).toBe(20);
    expect(config.measureBaseline).toBe(false);
    expect(config.fanOut).toBe("parallel");
    expect(config.workerRetries).toBe(0);
    expect(config.logLevel).toBe("debug");
  });

  it("reads a worker node", () => {
    const config = loadConfig({
      NODE_ROLE: "worker",
      NODE_NAME: "worker1",
      NODE_DOMAIN: "cluster",
      NODE_PRIVATE_KEY_PEM: "test-key",
      LEDGER_URL: "http://ledger.test:4400",
      MASTER_ACCOUNT: "chief@cluster",
      DATA_FILE: "data/sample-choices.json"
    });
    expect(config).toMatchObject({
      role: "worker",
      port: 4410,
      masterAccount: "chief@cluster",
      dataFile: "data/sample-choices.json",
      pollTimeoutMs: 30_000,
      pollIntervalMs: 250
    });
  });

  it("rejects invalid settings with ConfigError", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ NODE_ROLE: "observer" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...chiefEnv, WORKERS: "worker1" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...chiefEnv, INITIAL_BETA: "0.1,abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...chiefEnv, ANNEAL_ALPHA: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...chiefEnv, LEDGER_URL: "not a url" })).toThrow(ConfigError);
  });

  it("lists the failing variables", () => {
    const error = (() => {
      try {
        loadConfig({ ...chiefEnv, FAN_OUT: "sideways" });
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ details: { issues: [expect.stringContaining("FAN_OUT")] } });
  });
});

describe("genesis document", () => {
  it("maps accounts to identities with optional roles", () => {
    const genesis = parseGenesis({
      domains: [{ id: "cluster" }],
      accounts: [
        { name: "admin", domain: "cluster", publicKeyPem: "test-public-key-a", role: "admin" },
        { name: "chief", domain: "cluster", publicKeyPem: "test-public-key-b" }
      ]
    });
    expect(genesis).toEqual({
      domains: [{ id: "cluster", defaultRole: "user" }],
      accounts: [
        { identity: { name: "admin", domain: "cluster", publicKeyPem: "test-public-key-a" }, role: "admin" },
        { identity: { name: "chief", domain: "cluster", publicKeyPem: "test-public-key-b" }, role: undefined }
      ]
    });
  });

  it("rejects a malformed document", () => {
    expect(() => parseGenesis({ domains: "cluster" })).toThrow(ConfigError);
  });
});
