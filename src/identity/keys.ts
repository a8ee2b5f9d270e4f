// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createHash, createPublicKey, generateKeyPairSync, sign, verify } from "node:crypto";
import type { Identity, NodeKeys } from "../common/types.js";

const ACCOUNT_PART = /^[a-z_0-9][a-z_0-9.-]{0,63}$/;

export function createNodeKeys(): NodeKeys {
  const keys = generateKeyPairSync("ed25519");
  const publicKeyPem = keys.publicKey.export({ type: "spki", format: "pem" }).toString();
  const privateKeyPem = keys.privateKey.export({ type: "pkcs8", format: "pem" }).toString();
  return { publicKeyPem, privateKeyPem };
}

export function derivePublicKeyPem(privateKeyPem: string): string {
  return createPublicKey(privateKeyPem).export({ type: "spki", format: "pem" }).toString();
}

export function createIdentity(name: string, domain: string, keys: Pick<NodeKeys, "publicKeyPem">): Identity {
  if (!ACCOUNT_PART.test(name)) throw new Error(`invalid account name: ${name}`);
  if (!ACCOUNT_PART.test(domain)) throw new Error(`invalid domain: ${domain}`);
  return { name, domain, publicKeyPem: keys.publicKeyPem };
}

export function accountIdOf(identity: Pick<Identity, "name" | "domain">): string {
  return `${identity.name}@${identity.domain}`;
}

export function parseAccountId(accountId: string): { name: string; domain: string } | null {
  const parts = accountId.split("@");
  if (parts.length !== 2) return null;
  const [name, domain] = parts;
  if (!ACCOUNT_PART.test(name) || !ACCOUNT_PART.test(domain)) return null;
  return { name, domain };
}

export function signPayload(payload: string, privateKeyPem: string): string {
  return sign(null, Buffer.from(payload), privateKeyPem).toString("base64");
}

export function verifyPayload(payload: string, signature: string, publicKeyPem: string): boolean {
  try {
    return verify(null, Buffer.from(payload), publicKeyPem, Buffer.from(signature, "base64"));
  } catch {
    return false;
  }
}

export function sha256Hex(payload: string): string {
  return createHash("sha256").update(payload).digest("hex");
}
