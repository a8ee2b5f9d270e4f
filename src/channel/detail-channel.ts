// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { DetailMap, Identity, SubmitReceipt } from "../common/types.js";
import {
  PermissionDeniedError,
  QueryDeniedError,
  TransactionRejectedError,
  ValueTooLargeError
} from "../common/errors.js";
import { pollUntil, type PollOptions } from "../common/poll.js";
import { accountIdOf } from "../identity/keys.js";
import { MAX_DETAIL_LENGTH, detailLength, runQuery, submitCommands, type LedgerClient } from "../ledger/client.js";

type Party = Pick<Identity, "name" | "domain">;

export interface DetailFilter {
  key?: string;
  /** Account id of the writer, `name@domain`. */
  writer?: string;
}

export interface DetailChannelOptions {
  maxValueLength?: number;
}

export interface WaitOptions<T> extends PollOptions {
  /** Maps a raw value to a result; `undefined` keeps polling. */
  parse: (value: string) => T | undefined;
}

/**
 * Permissioned key/value publish-and-read over the ledger. Facts live under
 * `(owner, writer, key)`; writing into another account needs that account's
 * grant.
 */
export class DetailChannel {
  private readonly maxValueLength: number;

  constructor(
    private readonly ledger: LedgerClient,
    options: DetailChannelOptions = {}
  ) {
    this.maxValueLength = options.maxValueLength ?? MAX_DETAIL_LENGTH;
  }

  publish(self: Party, key: string, value: string, signingKey: string): Promise<SubmitReceipt> {
    return this.publishTo(self, self, key, value, signingKey);
  }

  async publishTo(
    self: Party,
    target: Party,
    key: string,
    value: string,
    signingKey: string
  ): Promise<SubmitReceipt> {
    const length = detailLength(value);
    if (length > this.maxValueLength) {
      throw new ValueTooLargeError(key, length, this.maxValueLength);
    }
    try {
      return await submitCommands(this.ledger, self, signingKey, [
        { type: "SetAccountDetail", accountId: accountIdOf(target), key, value }
      ]);
    } catch (error) {
      if (error instanceof TransactionRejectedError && error.reason === "permission_denied") {
        throw new PermissionDeniedError(accountIdOf(self), accountIdOf(target));
      }
      throw error;
    }
  }

  /** Details on the caller's own account. Empty when nothing matches yet. */
  async read(self: Party, filter: DetailFilter, signingKey: string): Promise<DetailMap> {
    try {
      const result = await runQuery(this.ledger, self, signingKey, {
        type: "GetAccountDetail",
        accountId: accountIdOf(self),
        writer: filter.writer,
        key: filter.key
      });
      if (result.type !== "AccountDetail") {
        throw new Error(`unexpected query result: ${result.type}`);
      }
      return result.detail;
    } catch (error) {
      if (error instanceof QueryDeniedError && error.reason === "not_found") return {};
      throw error;
    }
  }

  async readValue(self: Party, writer: string, key: string, signingKey: string): Promise<string | undefined> {
    const detail = await this.read(self, { writer, key }, signingKey);
    return detail[writer]?.[key];
  }

  /** Polls the caller's account until `writer` has stored an acceptable value under `key`. */
  waitForValue<T>(self: Party, writer: string, key: string, signingKey: string, options: WaitOptions<T>): Promise<T> {
    return pollUntil(
      async () => {
        const raw = await this.readValue(self, writer, key, signingKey);
        return raw === undefined ? undefined : options.parse(raw);
      },
      `${key} from ${writer}`,
      options
    );
  }
}
