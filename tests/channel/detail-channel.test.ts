import { describe, expect, it } from "vitest";
import { PermissionDeniedError, PollTimeoutError, ValueTooLargeError } from "../../src/common/errors.js";
import { DetailChannel } from "../../src/channel/detail-channel.js";
import { PermissionRegistry } from "../../src/channel/permission-registry.js";
import { accountIdOf } from "../../src/identity/keys.js";
import { makeNetwork } from "../helpers/network.js";

describe("detail channel", () => {
  it("returns exactly what the owner published", async () => {
    const { ledger, master } = makeNetwork();
    const channel = new DetailChannel(ledger);
    await channel.publish(master.identity, "note", "round-trip value", master.privateKeyPem);

    const detail = await channel.read(master.identity, {}, master.privateKeyPem);
    expect(detail).toEqual({ "chief@cluster": { note: "round-trip value" } });
    expect(await channel.readValue(master.identity, "chief@cluster", "note", master.privateKeyPem)).toBe(
      "round-trip value"
    );
  });

  it("returns the latest value for a key", async () => {
    const { ledger, master } = makeNetwork();
    const channel = new DetailChannel(ledger);
    await channel.publish(master.identity, "note", "first", master.privateKeyPem);
    await channel.publish(master.identity, "note", "second", master.privateKeyPem);
    expect(await channel.readValue(master.identity, "chief@cluster", "note", master.privateKeyPem)).toBe("second");
  });

  it("fails fast on values over the limit without touching the ledger", async () => {
    const { ledger, master } = makeNetwork();
    const channel = new DetailChannel(ledger);
    const error = await channel
      .publish(master.identity, "blob", "x".repeat(4097), master.privateKeyPem)
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValueTooLargeError);
    expect(ledger.committed()).toHaveLength(0);

    await channel.publish(master.identity, "blob", "x".repeat(4096), master.privateKeyPem);
    expect(ledger.committed()).toHaveLength(1);
  });

  it("measures the limit in code points", async () => {
    const { ledger, master } = makeNetwork();
    const channel = new DetailChannel(ledger);
    const emoji = "\u{1F600}".repeat(4096);
    expect(emoji).toHaveLength(8192);

    await channel.publish(master.identity, "faces", emoji, master.privateKeyPem);
    expect(await channel.readValue(master.identity, "chief@cluster", "faces", master.privateKeyPem)).toBe(emoji);
    await expect(
      channel.publish(master.identity, "faces", `${emoji}x`, master.privateKeyPem)
    ).rejects.toBeInstanceOf(ValueTooLargeError);
  });

  it("gates writes into another account on a live grant", async () => {
    const { ledger, master, workers } = makeNetwork();
    const [worker] = workers;
    const channel = new DetailChannel(ledger);
    const registry = new PermissionRegistry(ledger);
    const write = () => channel.publishTo(worker.identity, master.identity, "cost", "3.5", worker.privateKeyPem);

    await expect(write()).rejects.toBeInstanceOf(PermissionDeniedError);

    await registry.grant(master.identity, worker.identity, master.privateKeyPem);
    await write();
    const detail = await channel.read(master.identity, { writer: accountIdOf(worker.identity) }, master.privateKeyPem);
    expect(detail).toEqual({ "worker1@cluster": { cost: "3.5" } });

    await registry.revoke(master.identity, worker.identity, master.privateKeyPem);
    await expect(write()).rejects.toBeInstanceOf(PermissionDeniedError);

    await registry.grant(master.identity, worker.identity, master.privateKeyPem);
    await expect(write()).resolves.toMatchObject({ status: "committed" });
  });

  it("filters reads by writer and key", async () => {
    const { ledger, master, workers } = makeNetwork();
    const channel = new DetailChannel(ledger);
    const registry = new PermissionRegistry(ledger);
    for (const worker of workers) {
      await registry.grant(master.identity, worker.identity, master.privateKeyPem);
      await channel.publishTo(worker.identity, master.identity, "cost", worker.identity.name, worker.privateKeyPem);
    }
    await channel.publish(master.identity, "cost", "own", master.privateKeyPem);

    expect(await channel.read(master.identity, { writer: "worker2@cluster" }, master.privateKeyPem)).toEqual({
      "worker2@cluster": { cost: "worker2" }
    });
    expect(await channel.read(master.identity, { key: "cost" }, master.privateKeyPem)).toEqual({
      "worker1@cluster": { cost: "worker1" },
      "worker2@cluster": { cost: "worker2" },
      "chief@cluster": { cost: "own" }
    });
    expect(await channel.read(master.identity, { key: "missing" }, master.privateKeyPem)).toEqual({});
  });

  it("waits for a value to become visible", async () => {
    const { ledger, master } = makeNetwork(["worker1"], { commitLatencyMs: 40 });
    const channel = new DetailChannel(ledger);
    await channel.publish(master.identity, "note", "eventually", master.privateKeyPem);

    const value = await channel.waitForValue(master.identity, "chief@cluster", "note", master.privateKeyPem, {
      timeoutMs: 2_000,
      intervalMs: 10,
      parse: (raw) => raw
    });
    expect(value).toBe("eventually");
  });

  it("gives up waiting after the timeout", async () => {
    const { ledger, master } = makeNetwork();
    const channel = new DetailChannel(ledger);
    await expect(
      channel.waitForValue(master.identity, "chief@cluster", "never", master.privateKeyPem, {
        timeoutMs: 30,
        intervalMs: 10,
        parse: (raw) => raw
      })
    ).rejects.toBeInstanceOf(PollTimeoutError);
  });
});
