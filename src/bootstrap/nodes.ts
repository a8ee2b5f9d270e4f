// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { Identity, WorkerRef } from "../common/types.js";
import { ConfigError } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import type {
  ChiefNodeConfig,
  GenesisDocument,
  LedgerNodeConfig,
  NodeIdentityConfig,
  WorkerNodeConfig
} from "../common/config.js";
import { accountIdOf, createIdentity, derivePublicKeyPem, parseAccountId } from "../identity/keys.js";
import { InMemoryLedger } from "../ledger/memory-ledger.js";
import { LedgerHttpServer } from "../ledger/server.js";
import { HttpLedgerClient } from "../ledger/http-client.js";
import { DetailChannel } from "../channel/detail-channel.js";
import { PermissionRegistry } from "../channel/permission-registry.js";
import { ObjectiveRegistry, SUM, sumObjective } from "../objective/registry.js";
import { CHOICE_LOGIT, choiceLogitObjective, loadChoiceObservations } from "../objective/choice-logit.js";
import { CostWorker } from "../worker/cost-worker.js";
import { WorkerRpcServer } from "../trigger/worker-server.js";
import { HttpWorkerTrigger } from "../trigger/http-trigger.js";
import { AnnealingController, type AnnealingResult } from "../annealing/controller.js";
import {
  FanOutTrajectorySink,
  JsonlTrajectorySink,
  LogTrajectorySink,
  type TrajectorySink
} from "../annealing/trajectory.js";

const logger = createLogger("node");

export interface RunningNode {
  port: number;
  stop(): Promise<void>;
}

/** Account keys by account id, as listed in the genesis document. */
export function publicKeyDirectory(genesis: GenesisDocument): Map<string, string> {
  return new Map(genesis.accounts.map(({ identity }) => [accountIdOf(identity), identity.publicKeyPem]));
}

/** Identity of this node, checked against its private key and the genesis directory. */
export function resolveNodeIdentity(node: NodeIdentityConfig, genesis: GenesisDocument): Identity {
  const derived = derivePublicKeyPem(node.privateKeyPem);
  if (node.publicKeyPem !== undefined && node.publicKeyPem.trim() !== derived.trim()) {
    throw new ConfigError("NODE_PUBLIC_KEY_PEM does not match NODE_PRIVATE_KEY_PEM");
  }
  const identity = createIdentity(node.name, node.domain, { publicKeyPem: derived });
  const registered = publicKeyDirectory(genesis).get(accountIdOf(identity));
  if (registered === undefined) {
    throw new ConfigError(`account ${accountIdOf(identity)} is not in the genesis document`);
  }
  if (registered.trim() !== derived.trim()) {
    throw new ConfigError(`genesis key of ${accountIdOf(identity)} does not match the node key`);
  }
  return identity;
}

export async function startLedgerNode(config: LedgerNodeConfig, genesis: GenesisDocument): Promise<RunningNode> {
  const ledger = new InMemoryLedger({ genesis, commitLatencyMs: config.commitLatencyMs });
  const server = new LedgerHttpServer({ port: config.port, host: config.host, ledger });
  const port = await server.start();
  logger.info("ledger node listening", { port, accounts: genesis.accounts.length });
  return { port, stop: () => server.stop() };
}

export async function buildObjectives(dataFile?: string): Promise<ObjectiveRegistry> {
  const objectives = new ObjectiveRegistry().register(SUM, sumObjective);
  if (dataFile !== undefined) {
    const observations = await loadChoiceObservations(dataFile);
    objectives.register(CHOICE_LOGIT, choiceLogitObjective(observations));
    logger.info("choice observations loaded", { file: dataFile, count: observations.length });
  }
  return objectives;
}

export async function startWorkerNode(config: WorkerNodeConfig, genesis: GenesisDocument): Promise<RunningNode> {
  const identity = resolveNodeIdentity(config.node, genesis);
  const master = parseAccountId(config.masterAccount);
  if (!master) throw new ConfigError(`invalid MASTER_ACCOUNT ${config.masterAccount}`);

  const ledger = new HttpLedgerClient(config.node.ledgerUrl);
  await new PermissionRegistry(ledger).grant(identity, master, config.node.privateKeyPem);

  const channels = new Map<string, DetailChannel>([[config.node.ledgerUrl, new DetailChannel(ledger)]]);
  const worker = new CostWorker({
    identity,
    privateKeyPem: config.node.privateKeyPem,
    objectives: await buildObjectives(config.dataFile),
    channelFor: (location) => {
      let channel = channels.get(location);
      if (!channel) {
        channel = new DetailChannel(new HttpLedgerClient(location));
        channels.set(location, channel);
      }
      return channel;
    },
    pollTimeoutMs: config.pollTimeoutMs,
    pollIntervalMs: config.pollIntervalMs
  });

  const keys = publicKeyDirectory(genesis);
  const server = new WorkerRpcServer({
    port: config.port,
    host: config.host,
    handler: worker,
    // only the configured master may trigger this worker
    resolvePublicKey: (nodeId) => (nodeId === config.masterAccount ? keys.get(nodeId) : undefined)
  });
  const port = await server.start();
  logger.info("worker node listening", { port, account: accountIdOf(identity), master: config.masterAccount });
  return { port, stop: () => server.stop() };
}

export function resolveWorkers(config: ChiefNodeConfig, genesis: GenesisDocument): WorkerRef[] {
  const keys = publicKeyDirectory(genesis);
  return config.workers.map(({ name, address }) => {
    const accountId = accountIdOf({ name, domain: config.node.domain });
    const publicKeyPem = keys.get(accountId);
    if (publicKeyPem === undefined) throw new ConfigError(`worker ${accountId} is not in the genesis document`);
    return { identity: createIdentity(name, config.node.domain, { publicKeyPem }), address };
  });
}

export async function runChief(
  config: ChiefNodeConfig,
  genesis: GenesisDocument,
  signal?: AbortSignal
): Promise<AnnealingResult> {
  const master = resolveNodeIdentity(config.node, genesis);
  const workers = resolveWorkers(config, genesis);
  const ledger = new HttpLedgerClient(config.node.ledgerUrl);

  const registry = new PermissionRegistry(ledger);
  for (const worker of workers) {
    await registry.grant(master, worker.identity, config.node.privateKeyPem);
  }

  const sinks: TrajectorySink[] = [new LogTrajectorySink()];
  if (config.trajectoryFile !== undefined) sinks.push(new JsonlTrajectorySink(config.trajectoryFile));

  const controller = new AnnealingController(
    {
      master,
      masterPrivateKeyPem: config.node.privateKeyPem,
      workers,
      domain: config.node.domain,
      networkLocation: config.networkLocation,
      objective: config.objective,
      initialBeta: config.initialBeta,
      schedule: config.schedule,
      timeouts: { collectTimeoutMs: config.collectTimeoutMs, pollIntervalMs: config.pollIntervalMs },
      workerRetries: config.workerRetries,
      maxOffset: config.maxOffset,
      fanOut: config.fanOut,
      measureBaseline: config.measureBaseline,
      trajectory: sinks.length === 1 ? sinks[0] : new FanOutTrajectorySink(sinks)
    },
    {
      channel: new DetailChannel(ledger),
      trigger: new HttpWorkerTrigger({ caller: master, privateKeyPem: config.node.privateKeyPem })
    }
  );
  return controller.run(signal);
}
