// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type {
  AccountAsset,
  Command,
  DetailMap,
  Domain,
  Identity,
  QueryResult,
  Role,
  SignedQuery,
  SignedTransaction,
  SubmitReceipt
} from "../common/types.js";
import { QueryDeniedError, TransactionRejectedError, type RejectionReason } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { accountIdOf, parseAccountId } from "../identity/keys.js";
import { MAX_DETAIL_LENGTH, detailLength, type LedgerClient } from "./client.js";
import { formatAmount, parseAmount } from "./amount.js";
import { ReplayGuard } from "./replay-guard.js";
import { hashTransaction, verifyQuerySignature, verifyTransactionSignature } from "./transaction.js";

const logger = createLogger("ledger");

const DETAIL_KEY = /^[A-Za-z0-9_]{1,64}$/;
const SIMPLE_NAME = /^[a-z_0-9]{1,32}$/;

interface AccountRecord {
  accountId: string;
  name: string;
  domain: string;
  publicKeyPem: string;
  role: Role;
}

interface AssetRecord {
  assetId: string;
  domainId: string;
  precision: number;
}

interface DetailVersion {
  value: string;
  visibleAtMs: number;
}

export interface CommittedTransaction {
  txHash: string;
  tx: SignedTransaction;
  committedAtMs: number;
}

export interface InMemoryLedgerOptions {
  /** Domains and accounts that exist before the first transaction. */
  genesis: {
    domains: Domain[];
    accounts: Array<{ identity: Identity; role?: Role }>;
  };
  /** Delay between commit and visibility of a detail to queries. */
  commitLatencyMs?: number;
  maxSkewMs?: number;
  maxDetailLength?: number;
  now?: () => number;
}

class Rejection extends Error {
  constructor(readonly reason: RejectionReason) {
    super(reason);
  }
}

function grantKey(grantor: string, grantee: string): string {
  return `${grantor}|${grantee}`;
}

/**
 * Permissioned ledger kept in process memory. Validates signatures against
 * registered account keys, enforces roles and detail grants, rejects replayed
 * nonces and applies each transaction atomically. Detail writes become visible
 * to queries `commitLatencyMs` after commit.
 */
export class InMemoryLedger implements LedgerClient {
  private readonly domains = new Map<string, Domain>();
  private readonly accounts = new Map<string, AccountRecord>();
  private readonly assets = new Map<string, AssetRecord>();
  private readonly balances = new Map<string, Map<string, bigint>>();
  private readonly details = new Map<string, Map<string, Map<string, DetailVersion[]>>>();
  private readonly grants = new Set<string>();
  private readonly log: CommittedTransaction[] = [];

  private readonly commitLatencyMs: number;
  private readonly maxDetailLength: number;
  private readonly now: () => number;
  private readonly replay: ReplayGuard;

  constructor(options: InMemoryLedgerOptions) {
    this.commitLatencyMs = options.commitLatencyMs ?? 0;
    this.maxDetailLength = options.maxDetailLength ?? MAX_DETAIL_LENGTH;
    this.now = options.now ?? Date.now;
    this.replay = new ReplayGuard({ maxSkewMs: options.maxSkewMs, now: this.now });

    for (const domain of options.genesis.domains) {
      this.domains.set(domain.id, { ...domain });
    }
    for (const { identity, role } of options.genesis.accounts) {
      const domain = this.domains.get(identity.domain);
      if (!domain) throw new Error(`genesis account ${accountIdOf(identity)} references unknown domain`);
      this.registerAccount(identity.name, identity.domain, identity.publicKeyPem, role ?? domain.defaultRole);
    }
  }

  async submit(tx: SignedTransaction): Promise<SubmitReceipt> {
    const creator = this.accounts.get(tx.creatorAccountId);
    if (!creator) throw this.reject(tx, "unknown_creator");
    if (!verifyTransactionSignature(tx, creator.publicKeyPem)) throw this.reject(tx, "invalid_signature");
    if (tx.commands.length === 0) throw this.reject(tx, "malformed");

    const replayed = this.replay.admit(tx.creatorAccountId, tx.nonce, tx.createdAtMs);
    if (replayed) throw this.reject(tx, replayed);

    const nowMs = this.now();

    const undo: Array<() => void> = [];
    try {
      for (const command of tx.commands) {
        this.apply(creator, command, nowMs, undo);
      }
    } catch (error) {
      for (let i = undo.length - 1; i >= 0; i -= 1) undo[i]();
      if (error instanceof Rejection) throw this.reject(tx, error.reason);
      throw error;
    }

    const txHash = hashTransaction(tx);
    this.log.push({ txHash, tx, committedAtMs: nowMs });
    logger.debug("transaction committed", {
      txHash,
      creator: tx.creatorAccountId,
      commands: tx.commands.map((c) => c.type)
    });
    return { txHash, status: "committed" };
  }

  async query(query: SignedQuery): Promise<QueryResult> {
    const creator = this.accounts.get(query.creatorAccountId);
    if (!creator) throw new QueryDeniedError("unknown_creator", { creator: query.creatorAccountId });
    if (!verifyQuerySignature(query, creator.publicKeyPem)) {
      throw new QueryDeniedError("invalid_signature", { creator: query.creatorAccountId });
    }

    const replayed = this.replay.admit(query.creatorAccountId, query.nonce, query.createdAtMs);
    if (replayed) throw new QueryDeniedError(replayed, { creator: query.creatorAccountId });

    const { request } = query;
    if (!this.accounts.has(request.accountId)) {
      throw new QueryDeniedError("not_found", { accountId: request.accountId });
    }
    if (creator.accountId !== request.accountId && creator.role !== "admin") {
      throw new QueryDeniedError("no_visibility", { creator: creator.accountId, accountId: request.accountId });
    }

    if (request.type === "GetAccountAssets") {
      return { type: "AccountAssets", assets: this.assetsOf(request.accountId) };
    }
    return {
      type: "AccountDetail",
      detail: this.visibleDetails(request.accountId, this.now(), request.writer, request.key)
    };
  }

  /** Append-only record of committed transactions. */
  committed(): CommittedTransaction[] {
    return [...this.log];
  }

  hasGrant(grantor: string, grantee: string): boolean {
    return this.grants.has(grantKey(grantor, grantee));
  }

  private reject(tx: SignedTransaction, reason: RejectionReason): TransactionRejectedError {
    logger.debug("transaction rejected", { creator: tx.creatorAccountId, reason });
    return new TransactionRejectedError(reason, { creator: tx.creatorAccountId });
  }

  private registerAccount(name: string, domain: string, publicKeyPem: string, role: Role): AccountRecord {
    const accountId = `${name}@${domain}`;
    const record: AccountRecord = { accountId, name, domain, publicKeyPem, role };
    this.accounts.set(accountId, record);
    return record;
  }

  private apply(creator: AccountRecord, command: Command, nowMs: number, undo: Array<() => void>): void {
    switch (command.type) {
      case "CreateDomain": {
        this.requireAdmin(creator);
        if (!SIMPLE_NAME.test(command.domainId)) throw new Rejection("malformed");
        if (this.domains.has(command.domainId)) throw new Rejection("duplicate_domain");
        this.domains.set(command.domainId, { id: command.domainId, defaultRole: command.defaultRole });
        undo.push(() => this.domains.delete(command.domainId));
        return;
      }
      case "CreateAccount": {
        this.requireAdmin(creator);
        const domain = this.domains.get(command.domainId);
        if (!domain) throw new Rejection("unknown_domain");
        const accountId = `${command.accountName}@${command.domainId}`;
        if (!parseAccountId(accountId)) throw new Rejection("malformed");
        if (this.accounts.has(accountId)) throw new Rejection("duplicate_account");
        this.registerAccount(command.accountName, command.domainId, command.publicKeyPem, domain.defaultRole);
        undo.push(() => this.accounts.delete(accountId));
        return;
      }
      case "CreateAsset": {
        this.requireAdmin(creator);
        if (!this.domains.has(command.domainId)) throw new Rejection("unknown_domain");
        if (!SIMPLE_NAME.test(command.assetName)) throw new Rejection("malformed");
        if (!Number.isInteger(command.precision) || command.precision < 0 || command.precision > 18) {
          throw new Rejection("malformed");
        }
        const assetId = `${command.assetName}#${command.domainId}`;
        if (this.assets.has(assetId)) throw new Rejection("duplicate_asset");
        this.assets.set(assetId, { assetId, domainId: command.domainId, precision: command.precision });
        undo.push(() => this.assets.delete(assetId));
        return;
      }
      case "AddAssetQuantity": {
        this.requireAdmin(creator);
        const asset = this.assets.get(command.assetId);
        if (!asset) throw new Rejection("unknown_asset");
        const units = parseAmount(command.amount, asset.precision);
        if (units === null || units <= 0n) throw new Rejection("malformed");
        this.adjustBalance(creator.accountId, asset.assetId, units, undo);
        return;
      }
      case "SetAccountDetail": {
        if (!this.accounts.has(command.accountId)) throw new Rejection("unknown_account");
        if (!DETAIL_KEY.test(command.key)) throw new Rejection("malformed");
        if (detailLength(command.value) > this.maxDetailLength) throw new Rejection("value_too_large");
        const writer = creator.accountId;
        if (writer !== command.accountId && !this.hasGrant(command.accountId, writer)) {
          throw new Rejection("permission_denied");
        }
        this.writeDetail(command.accountId, writer, command.key, command.value, nowMs + this.commitLatencyMs, undo);
        return;
      }
      case "TransferAsset": {
        if (command.srcAccountId !== creator.accountId) throw new Rejection("not_authorized");
        const dest = this.accounts.get(command.destAccountId);
        if (!dest) throw new Rejection("unknown_account");
        const asset = this.assets.get(command.assetId);
        if (!asset) throw new Rejection("unknown_asset");
        if (creator.domain !== dest.domain || asset.domainId !== creator.domain) {
          throw new Rejection("cross_domain_transfer");
        }
        if (command.description.length > 64) throw new Rejection("malformed");
        const units = parseAmount(command.amount, asset.precision);
        if (units === null || units <= 0n) throw new Rejection("malformed");
        const available = this.balances.get(creator.accountId)?.get(asset.assetId) ?? 0n;
        if (available < units) throw new Rejection("insufficient_balance");
        this.adjustBalance(creator.accountId, asset.assetId, -units, undo);
        this.adjustBalance(dest.accountId, asset.assetId, units, undo);
        return;
      }
      case "GrantPermission": {
        if (!this.accounts.has(command.accountId)) throw new Rejection("unknown_account");
        const key = grantKey(creator.accountId, command.accountId);
        if (this.grants.has(key)) return;
        this.grants.add(key);
        undo.push(() => this.grants.delete(key));
        return;
      }
      case "RevokePermission": {
        if (!this.accounts.has(command.accountId)) throw new Rejection("unknown_account");
        const key = grantKey(creator.accountId, command.accountId);
        if (!this.grants.has(key)) return;
        this.grants.delete(key);
        undo.push(() => this.grants.add(key));
        return;
      }
    }
  }

  private requireAdmin(creator: AccountRecord): void {
    if (creator.role !== "admin") throw new Rejection("not_authorized");
  }

  private adjustBalance(accountId: string, assetId: string, delta: bigint, undo: Array<() => void>): void {
    let holdings = this.balances.get(accountId);
    if (!holdings) {
      holdings = new Map();
      this.balances.set(accountId, holdings);
    }
    const target = holdings;
    target.set(assetId, (target.get(assetId) ?? 0n) + delta);
    undo.push(() => target.set(assetId, (target.get(assetId) ?? 0n) - delta));
  }

  private writeDetail(
    owner: string,
    writer: string,
    key: string,
    value: string,
    visibleAtMs: number,
    undo: Array<() => void>
  ): void {
    let byWriter = this.details.get(owner);
    if (!byWriter) {
      byWriter = new Map();
      this.details.set(owner, byWriter);
    }
    let byKey = byWriter.get(writer);
    if (!byKey) {
      byKey = new Map();
      byWriter.set(writer, byKey);
    }
    let versions = byKey.get(key);
    if (!versions) {
      versions = [];
      byKey.set(key, versions);
    }
    const list = versions;
    list.push({ value, visibleAtMs });
    undo.push(() => list.pop());
  }

  private visibleDetails(owner: string, nowMs: number, writer?: string, key?: string): DetailMap {
    const result: DetailMap = {};
    const byWriter = this.details.get(owner);
    if (!byWriter) return result;
    for (const [writerId, byKey] of byWriter) {
      if (writer !== undefined && writerId !== writer) continue;
      for (const [detailKey, versions] of byKey) {
        if (key !== undefined && detailKey !== key) continue;
        const latest = latestVisible(versions, nowMs);
        if (latest === undefined) continue;
        result[writerId] ??= {};
        result[writerId][detailKey] = latest;
      }
    }
    return result;
  }

  private assetsOf(accountId: string): AccountAsset[] {
    const holdings = this.balances.get(accountId);
    if (!holdings) return [];
    const assets: AccountAsset[] = [];
    for (const [assetId, units] of holdings) {
      const asset = this.assets.get(assetId);
      if (!asset) continue;
      assets.push({ assetId, accountId, balance: formatAmount(units, asset.precision) });
    }
    return assets;
  }
}

function latestVisible(versions: DetailVersion[], nowMs: number): string | undefined {
  for (let i = versions.length - 1; i >= 0; i -= 1) {
    if (versions[i].visibleAtMs <= nowMs) return versions[i].value;
  }
  return undefined;
}
