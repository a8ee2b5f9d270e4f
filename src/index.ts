#!/usr/bin/env node
import { loadConfig, loadGenesis } from "./common/config.js";
import { errorMessage } from "./common/errors.js";
import { log, setLogLevel } from "./common/logger.js";
import { runChief, startLedgerNode, startWorkerNode, type RunningNode } from "./bootstrap/nodes.js";

function isEaddrInUse(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EADDRINUSE";
}

function stopOnSignal(node: RunningNode): void {
  const shutdown = (signal: NodeJS.Signals) => {
    log.info("shutting down", { signal });
    node.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("shutdown failed", { error: errorMessage(error) });
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function boot(): Promise<void> {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);
  const genesis = await loadGenesis(config.genesisFile);

  switch (config.role) {
    case "ledger":
      stopOnSignal(await startLedgerNode(config, genesis));
      return;
    case "worker":
      stopOnSignal(await startWorkerNode(config, genesis));
      return;
    case "chief": {
      const abort = new AbortController();
      process.once("SIGINT", () => abort.abort());
      process.once("SIGTERM", () => abort.abort());
      const result = await runChief(config, genesis, abort.signal);
      log.info("final parameters", { beta: result.beta, cost: result.cost, iterations: result.iterations });
      return;
    }
  }
}

boot().catch((error: unknown) => {
  if (isEaddrInUse(error)) {
    log.error("port already in use", { error: errorMessage(error) });
  } else {
    log.error("fatal", { error: errorMessage(error) });
  }
  process.exit(1);
});
