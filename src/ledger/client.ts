// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type {
  Command,
  Identity,
  QueryRequest,
  QueryResult,
  SignedQuery,
  SignedTransaction,
  SubmitReceipt
} from "../common/types.js";
import { buildQuery, buildTransaction, signQuery, signTransaction } from "./transaction.js";

/** Longest value a single detail may hold, in code points. */
export const MAX_DETAIL_LENGTH = 4096;

export function detailLength(value: string): number {
  return [...value].length;
}

/**
 * Boundary to the permissioned store. `submit` resolves once the ledger has
 * reached a final status for the transaction; it rejects with
 * `TransactionRejectedError`. `query` rejects with `QueryDeniedError`.
 * A committed write is not guaranteed to be visible to the next query.
 */
export interface LedgerClient {
  submit(tx: SignedTransaction): Promise<SubmitReceipt>;
  query(query: SignedQuery): Promise<QueryResult>;
}

export type Signer = Pick<Identity, "name" | "domain">;

export function submitCommands(
  ledger: LedgerClient,
  creator: Signer,
  privateKeyPem: string,
  commands: Command[]
): Promise<SubmitReceipt> {
  return ledger.submit(signTransaction(buildTransaction(creator, commands), privateKeyPem));
}

export function runQuery(
  ledger: LedgerClient,
  creator: Signer,
  privateKeyPem: string,
  request: QueryRequest
): Promise<QueryResult> {
  return ledger.query(signQuery(buildQuery(creator, request), privateKeyPem));
}
