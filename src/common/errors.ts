// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type RejectionReason =
  | "invalid_signature"
  | "unknown_creator"
  | "replay"
  | "timestamp_skew"
  | "malformed"
  | "duplicate_account"
  | "duplicate_domain"
  | "duplicate_asset"
  | "unknown_domain"
  | "unknown_account"
  | "unknown_asset"
  | "cross_domain_transfer"
  | "insufficient_balance"
  | "not_authorized"
  | "permission_denied"
  | "value_too_large"
  | "already_granted"
  | "not_granted";

export type DenialReason =
  | "invalid_signature"
  | "unknown_creator"
  | "replay"
  | "timestamp_skew"
  | "malformed"
  | "not_found"
  | "no_visibility";

export abstract class CoordinationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** The ledger refused a transaction. */
export class TransactionRejectedError extends CoordinationError {
  constructor(
    public readonly reason: RejectionReason,
    details: Record<string, unknown> = {}
  ) {
    super(`transaction rejected: ${reason}`, "TRANSACTION_REJECTED", { reason, ...details });
  }
}

/** The ledger refused a query. Only `not_found` may be read as "no data yet". */
export class QueryDeniedError extends CoordinationError {
  constructor(
    public readonly reason: DenialReason,
    details: Record<string, unknown> = {}
  ) {
    super(`query denied: ${reason}`, "QUERY_DENIED", { reason, ...details });
  }
}

export class PermissionDeniedError extends CoordinationError {
  constructor(writer: string, owner: string) {
    super(`${writer} may not set details on ${owner}`, "PERMISSION_DENIED", { writer, owner });
  }
}

export class ValueTooLargeError extends CoordinationError {
  constructor(key: string, length: number, limit: number) {
    super(`value for "${key}" is ${length} characters, limit is ${limit}`, "VALUE_TOO_LARGE", {
      key,
      length,
      limit
    });
  }
}

export class WorkerUnreachableError extends CoordinationError {
  constructor(worker: string, cause: string, attempts: number) {
    super(`worker ${worker} unreachable after ${attempts} attempt(s): ${cause}`, "WORKER_UNREACHABLE", {
      worker,
      cause,
      attempts
    });
  }
}

export class IncompleteRoundError extends CoordinationError {
  constructor(
    public readonly round: number,
    public readonly missing: string[]
  ) {
    super(`round ${round} incomplete, missing ${missing.join(", ")}`, "INCOMPLETE_ROUND", { round, missing });
  }
}

export class PollTimeoutError extends CoordinationError {
  constructor(what: string, timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms waiting for ${what}`, "POLL_TIMEOUT", { what, timeoutMs });
  }
}

/** The node's own key was refused by the ledger. Nothing can proceed without it. */
export class InvalidSigningKeyError extends CoordinationError {
  constructor(accountId: string, reason: string) {
    super(`signing key of ${accountId} was rejected: ${reason}`, "INVALID_SIGNING_KEY", { accountId, reason });
  }
}

export class ConfigError extends CoordinationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "CONFIG_INVALID", details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
