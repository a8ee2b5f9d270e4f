// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomUUID } from "node:crypto";
import type {
  Command,
  Identity,
  Query,
  QueryRequest,
  SignedQuery,
  SignedTransaction,
  Transaction
} from "../common/types.js";
import { accountIdOf, sha256Hex, signPayload, verifyPayload } from "../identity/keys.js";

export function buildTransaction(creator: Pick<Identity, "name" | "domain">, commands: Command[]): Transaction {
  return {
    creatorAccountId: accountIdOf(creator),
    commands,
    createdAtMs: Date.now(),
    nonce: randomUUID()
  };
}

export function buildQuery(creator: Pick<Identity, "name" | "domain">, request: QueryRequest): Query {
  return {
    creatorAccountId: accountIdOf(creator),
    createdAtMs: Date.now(),
    nonce: randomUUID(),
    request
  };
}

/** JSON with object keys sorted at every level and undefined members dropped. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map((item) => stableStringify(item ?? null)).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${stableStringify(member)}`);
    return `{${members.join(",")}}`;
  }
  return JSON.stringify(value);
}

export function canonicalizeTransaction(tx: Transaction): string {
  return stableStringify({
    creatorAccountId: tx.creatorAccountId,
    commands: tx.commands,
    createdAtMs: tx.createdAtMs,
    nonce: tx.nonce
  });
}

export function canonicalizeQuery(query: Query): string {
  return stableStringify({
    creatorAccountId: query.creatorAccountId,
    createdAtMs: query.createdAtMs,
    nonce: query.nonce,
    request: query.request
  });
}

export function hashTransaction(tx: Transaction): string {
  return sha256Hex(canonicalizeTransaction(tx));
}

export function signTransaction(tx: Transaction, privateKeyPem: string): SignedTransaction {
  return { ...tx, signature: signPayload(canonicalizeTransaction(tx), privateKeyPem) };
}

export function signQuery(query: Query, privateKeyPem: string): SignedQuery {
  return { ...query, signature: signPayload(canonicalizeQuery(query), privateKeyPem) };
}

export function verifyTransactionSignature(tx: SignedTransaction, publicKeyPem: string): boolean {
  return verifyPayload(canonicalizeTransaction(tx), tx.signature, publicKeyPem);
}

export function verifyQuerySignature(query: SignedQuery, publicKeyPem: string): boolean {
  return verifyPayload(canonicalizeQuery(query), query.signature, publicKeyPem);
}
