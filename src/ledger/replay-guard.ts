export type ReplayRejection = "replay" | "timestamp_skew";

export interface ReplayGuardOptions {
  /** Largest accepted distance between a message timestamp and the local clock. */
  maxSkewMs?: number;
  now?: () => number;
}

/**
 * Per-signer nonce memory for signed ledger messages and RPC calls. A nonce
 * is only remembered while its timestamp can still pass the skew check, so
 * memory stays bounded by the message rate within one skew window.
 */
export class ReplayGuard {
  readonly maxSkewMs: number;
  private readonly now: () => number;
  private readonly seen = new Map<string, number>();

  constructor(options: ReplayGuardOptions = {}) {
    this.maxSkewMs = options.maxSkewMs ?? 120_000;
    this.now = options.now ?? Date.now;
  }

  /** Records `nonce` for `signer` and returns why it must be refused, if it must. */
  admit(signer: string, nonce: string, timestampMs: number): ReplayRejection | undefined {
    const nowMs = this.now();
    this.forgetBefore(nowMs);
    if (!Number.isFinite(timestampMs) || Math.abs(nowMs - timestampMs) > this.maxSkewMs) return "timestamp_skew";

    const key = `${signer}\n${nonce}`;
    if (this.seen.has(key)) return "replay";
    this.seen.set(key, timestampMs + this.maxSkewMs);
    return undefined;
  }

  get size(): number {
    return this.seen.size;
  }

  private forgetBefore(nowMs: number): void {
    for (const [key, expiresAtMs] of this.seen) {
      if (expiresAtMs < nowMs) this.seen.delete(key);
    }
  }
}
