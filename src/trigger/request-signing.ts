import { randomUUID } from "node:crypto";
import { sha256Hex, signPayload, verifyPayload } from "../identity/keys.js";

export interface SignRequestParams {
  method: string;
  path: string;
  body: string;
  privateKeyPem: string;
  nodeId: string;
}

export interface SignedHeaders {
  "x-node-id": string;
  "x-timestamp-ms": string;
  "x-nonce": string;
  "x-body-sha256": string;
  "x-signature": string;
}

export interface VerifyParams {
  method: string;
  path: string;
  headers: Partial<SignedHeaders>;
  rawBody: string;
  resolvePublicKey: (nodeId: string) => string | undefined;
  maxSkewMs: number;
  nowMs?: number;
}

export type VerifyResult =
  | { valid: true; nodeId: string; nonce: string; timestampMs: number }
  | {
      valid: false;
      reason: "missing_headers" | "unknown_node" | "timestamp_skew" | "body_hash_mismatch" | "invalid_signature";
    };

function canonicalize(timestampMs: string, nonce: string, method: string, path: string, bodyHash: string): string {
  return `${timestampMs}\n${nonce}\n${method}\n${path}\n${bodyHash}`;
}

export function signRequest(params: SignRequestParams): SignedHeaders {
  const timestampMs = String(Date.now());
  const nonce = randomUUID();
  const bodyHash = sha256Hex(params.body);
  const payload = canonicalize(timestampMs, nonce, params.method, params.path, bodyHash);

  return {
    "x-node-id": params.nodeId,
    "x-timestamp-ms": timestampMs,
    "x-nonce": nonce,
    "x-body-sha256": bodyHash,
    "x-signature": signPayload(payload, params.privateKeyPem)
  };
}

export function verifySignedRequest(params: VerifyParams): VerifyResult {
  const { method, path, headers, maxSkewMs } = params;
  const timestampMs = headers["x-timestamp-ms"];
  const nonce = headers["x-nonce"];
  const bodyHash = headers["x-body-sha256"];
  const signature = headers["x-signature"];
  const nodeId = headers["x-node-id"];

  if (!timestampMs || !nonce || !bodyHash || !signature || !nodeId) {
    return { valid: false, reason: "missing_headers" };
  }

  const publicKeyPem = params.resolvePublicKey(nodeId);
  if (!publicKeyPem) return { valid: false, reason: "unknown_node" };

  const skew = Math.abs((params.nowMs ?? Date.now()) - Number(timestampMs));
  if (!Number.isFinite(skew) || skew > maxSkewMs) {
    return { valid: false, reason: "timestamp_skew" };
  }

  if (sha256Hex(params.rawBody) !== bodyHash) {
    return { valid: false, reason: "body_hash_mismatch" };
  }

  const payload = canonicalize(timestampMs, nonce, method, path, bodyHash);
  if (!verifyPayload(payload, signature, publicKeyPem)) {
    return { valid: false, reason: "invalid_signature" };
  }

  return { valid: true, nodeId, nonce, timestampMs: Number(timestampMs) };
}
