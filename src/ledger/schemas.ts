// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";

const roleSchema = z.enum(["admin", "user"]);
const capabilitySchema = z.literal("can_set_my_account_detail");

export const commandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("CreateDomain"), domainId: z.string(), defaultRole: roleSchema }),
  z.object({
    type: z.literal("CreateAccount"),
    accountName: z.string(),
    domainId: z.string(),
    publicKeyPem: z.string()
  }),
  z.object({
    type: z.literal("CreateAsset"),
    assetName: z.string(),
    domainId: z.string(),
    precision: z.number().int()
  }),
  z.object({ type: z.literal("AddAssetQuantity"), assetId: z.string(), amount: z.string() }),
  z.object({ type: z.literal("SetAccountDetail"), accountId: z.string(), key: z.string(), value: z.string() }),
  z.object({
    type: z.literal("TransferAsset"),
    srcAccountId: z.string(),
    destAccountId: z.string(),
    assetId: z.string(),
    amount: z.string(),
    description: z.string()
  }),
  z.object({ type: z.literal("GrantPermission"), accountId: z.string(), permission: capabilitySchema }),
  z.object({ type: z.literal("RevokePermission"), accountId: z.string(), permission: capabilitySchema })
]);

export const signedTransactionSchema = z.object({
  creatorAccountId: z.string(),
  commands: z.array(commandSchema).min(1),
  createdAtMs: z.number().int(),
  nonce: z.string().min(1),
  signature: z.string().min(1)
});

export const queryRequestSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("GetAccountAssets"), accountId: z.string() }),
  z.object({
    type: z.literal("GetAccountDetail"),
    accountId: z.string(),
    writer: z.string().optional(),
    key: z.string().optional()
  })
]);

export const signedQuerySchema = z.object({
  creatorAccountId: z.string(),
  createdAtMs: z.number().int(),
  nonce: z.string().min(1),
  request: queryRequestSchema,
  signature: z.string().min(1)
});

export const submitReceiptSchema = z.object({
  txHash: z.string(),
  status: z.literal("committed")
});

export const queryResultSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("AccountAssets"),
    assets: z.array(z.object({ assetId: z.string(), accountId: z.string(), balance: z.string() }))
  }),
  z.object({
    type: z.literal("AccountDetail"),
    detail: z.record(z.string(), z.record(z.string(), z.string()))
  })
]);

export const rejectionReasonSchema = z.enum([
  "invalid_signature",
  "unknown_creator",
  "replay",
  "timestamp_skew",
  "malformed",
  "duplicate_account",
  "duplicate_domain",
  "duplicate_asset",
  "unknown_domain",
  "unknown_account",
  "unknown_asset",
  "cross_domain_transfer",
  "insufficient_balance",
  "not_authorized",
  "permission_denied",
  "value_too_large",
  "already_granted",
  "not_granted"
]);

export const denialReasonSchema = z.enum([
  "invalid_signature",
  "unknown_creator",
  "replay",
  "timestamp_skew",
  "malformed",
  "not_found",
  "no_visibility"
]);
