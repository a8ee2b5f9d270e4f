import { describe, expect, it } from "vitest";
import { QueryDeniedError, TransactionRejectedError } from "../../src/common/errors.js";
import { AccountService } from "../../src/identity/account-service.js";
import { accountIdOf } from "../../src/identity/keys.js";
import { runQuery, submitCommands } from "../../src/ledger/client.js";
import { buildTransaction, signTransaction } from "../../src/ledger/transaction.js";
import { makeNetwork, makeParty } from "../helpers/network.js";

function detailOf(accountId: string, key: string, value: string) {
  return { type: "SetAccountDetail" as const, accountId, key, value };
}

describe("in-memory ledger", () => {
  it("commits a signed detail write and returns it to the owner", async () => {
    const { ledger, master } = makeNetwork();
    const masterId = accountIdOf(master.identity);
    const receipt = await submitCommands(ledger, master.identity, master.privateKeyPem, [
      detailOf(masterId, "note", "hello")
    ]);
    expect(receipt.status).toBe("committed");
    expect(receipt.txHash).toMatch(/^[0-9a-f]{64}$/);

    const result = await runQuery(ledger, master.identity, master.privateKeyPem, {
      type: "GetAccountDetail",
      accountId: masterId
    });
    expect(result).toEqual({ type: "AccountDetail", detail: { [masterId]: { note: "hello" } } });
    expect(ledger.committed()).toHaveLength(1);
  });

  it("rejects a transaction signed with the wrong key", async () => {
    const { ledger, master } = makeNetwork();
    const stranger = makeParty("stranger");
    const error = await submitCommands(ledger, master.identity, stranger.privateKeyPem, [
      detailOf(accountIdOf(master.identity), "note", "x")
    ]).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransactionRejectedError);
    expect(error).toMatchObject({ reason: "invalid_signature" });
  });

  it("rejects a creator that has no account", async () => {
    const { ledger } = makeNetwork();
    const stranger = makeParty("stranger");
    await expect(
      submitCommands(ledger, stranger.identity, stranger.privateKeyPem, [
        detailOf(accountIdOf(stranger.identity), "note", "x")
      ])
    ).rejects.toMatchObject({ reason: "unknown_creator" });
  });

  it("rejects a replayed transaction", async () => {
    const { ledger, master } = makeNetwork();
    const tx = signTransaction(
      buildTransaction(master.identity, [detailOf(accountIdOf(master.identity), "note", "once")]),
      master.privateKeyPem
    );
    await ledger.submit(tx);
    await expect(ledger.submit(tx)).rejects.toMatchObject({ reason: "replay" });
    expect(ledger.committed()).toHaveLength(1);
  });

  it("rejects transactions outside the clock skew window", async () => {
    const { ledger, master } = makeNetwork(["worker1"], { now: () => Date.now() + 300_000 });
    await expect(
      submitCommands(ledger, master.identity, master.privateKeyPem, [
        detailOf(accountIdOf(master.identity), "note", "late")
      ])
    ).rejects.toMatchObject({ reason: "timestamp_skew" });
  });

  it("hides a committed detail until the commit latency has passed", async () => {
    let offset = 0;
    const { ledger, master } = makeNetwork(["worker1"], { commitLatencyMs: 500, now: () => Date.now() + offset });
    const masterId = accountIdOf(master.identity);
    await submitCommands(ledger, master.identity, master.privateKeyPem, [detailOf(masterId, "note", "later")]);

    const read = () =>
      runQuery(ledger, master.identity, master.privateKeyPem, { type: "GetAccountDetail", accountId: masterId });
    expect(await read()).toEqual({ type: "AccountDetail", detail: {} });
    offset = 600;
    expect(await read()).toEqual({ type: "AccountDetail", detail: { [masterId]: { note: "later" } } });
  });

  it("applies every command of a transaction or none", async () => {
    const { ledger, master, workers } = makeNetwork();
    const masterId = accountIdOf(master.identity);
    await expect(
      submitCommands(ledger, master.identity, master.privateKeyPem, [
        detailOf(masterId, "note", "first"),
        detailOf(accountIdOf(workers[0].identity), "note", "no grant")
      ])
    ).rejects.toMatchObject({ reason: "permission_denied" });

    const result = await runQuery(ledger, master.identity, master.privateKeyPem, {
      type: "GetAccountDetail",
      accountId: masterId
    });
    expect(result).toEqual({ type: "AccountDetail", detail: {} });
    expect(ledger.committed()).toHaveLength(0);
  });

  it("rejects oversized detail values", async () => {
    const { ledger, master } = makeNetwork();
    await expect(
      submitCommands(ledger, master.identity, master.privateKeyPem, [
        detailOf(accountIdOf(master.identity), "blob", "x".repeat(4097))
      ])
    ).rejects.toMatchObject({ reason: "value_too_large" });
  });

  it("keeps grants idempotent and lets the grantee write", async () => {
    const { ledger, master, workers } = makeNetwork();
    const workerId = accountIdOf(workers[0].identity);
    const masterId = accountIdOf(master.identity);
    const grant = { type: "GrantPermission" as const, accountId: workerId, permission: "can_set_my_account_detail" as const };

    await submitCommands(ledger, master.identity, master.privateKeyPem, [grant]);
    await submitCommands(ledger, master.identity, master.privateKeyPem, [grant]);
    expect(ledger.hasGrant(masterId, workerId)).toBe(true);

    await submitCommands(ledger, workers[0].identity, workers[0].privateKeyPem, [detailOf(masterId, "cost", "1.5")]);
    const result = await runQuery(ledger, master.identity, master.privateKeyPem, {
      type: "GetAccountDetail",
      accountId: masterId,
      writer: workerId
    });
    expect(result).toEqual({ type: "AccountDetail", detail: { [workerId]: { cost: "1.5" } } });
  });

  it("limits reads to the owner and admins", async () => {
    const { ledger, admin, master, workers } = makeNetwork();
    const masterId = accountIdOf(master.identity);
    await submitCommands(ledger, master.identity, master.privateKeyPem, [detailOf(masterId, "note", "private")]);

    const denied = await runQuery(ledger, workers[0].identity, workers[0].privateKeyPem, {
      type: "GetAccountDetail",
      accountId: masterId
    }).catch((e: unknown) => e);
    expect(denied).toBeInstanceOf(QueryDeniedError);
    expect(denied).toMatchObject({ reason: "no_visibility" });

    const byAdmin = await runQuery(ledger, admin.identity, admin.privateKeyPem, {
      type: "GetAccountDetail",
      accountId: masterId
    });
    expect(byAdmin).toEqual({ type: "AccountDetail", detail: { [masterId]: { note: "private" } } });

    await expect(
      runQuery(ledger, admin.identity, admin.privateKeyPem, { type: "GetAccountDetail", accountId: "ghost@cluster" })
    ).rejects.toMatchObject({ reason: "not_found" });
  });

  it("reserves provisioning to admins", async () => {
    const { ledger, master } = makeNetwork();
    await expect(
      submitCommands(ledger, master.identity, master.privateKeyPem, [
        { type: "CreateDomain", domainId: "rogue", defaultRole: "admin" }
      ])
    ).rejects.toMatchObject({ reason: "not_authorized" });
  });
});

describe("asset transfers", () => {
  async function fundedNetwork() {
    const network = makeNetwork();
    const accounts = new AccountService(network.ledger);
    const { admin } = network;
    await accounts.createAsset(admin.identity, admin.privateKeyPem, "coin", "cluster", 2);
    await accounts.addAssetQuantity(admin.identity, admin.privateKeyPem, "coin#cluster", "100");
    return { ...network, accounts };
  }

  it("moves balances within a domain", async () => {
    const { accounts, admin, master } = await fundedNetwork();
    await accounts.transferAsset(admin.identity, admin.privateKeyPem, master.identity, "coin", "30.5", "payment");

    expect(await accounts.getAssets(admin.identity, admin.privateKeyPem)).toEqual([
      { assetId: "coin#cluster", accountId: "admin@cluster", balance: "69.50" }
    ]);
    expect(await accounts.getAssets(master.identity, master.privateKeyPem)).toEqual([
      { assetId: "coin#cluster", accountId: "chief@cluster", balance: "30.50" }
    ]);
  });

  it("rejects a transfer beyond the balance and leaves both sides unchanged", async () => {
    const { accounts, admin, master } = await fundedNetwork();
    await accounts.transferAsset(admin.identity, admin.privateKeyPem, master.identity, "coin", "30", "payment");
    await expect(
      accounts.transferAsset(master.identity, master.privateKeyPem, admin.identity, "coin", "31", "refund")
    ).rejects.toMatchObject({ reason: "insufficient_balance" });
    expect(await accounts.getAssets(master.identity, master.privateKeyPem)).toEqual([
      { assetId: "coin#cluster", accountId: "chief@cluster", balance: "30.00" }
    ]);
  });

  it("rejects transfers across domains", async () => {
    const { accounts, admin, ledger } = await fundedNetwork();
    await accounts.createDomain(admin.identity, admin.privateKeyPem, "other");
    const outsider = makeParty("outsider", "other");
    await accounts.createAccount(admin.identity, admin.privateKeyPem, outsider.identity);

    await expect(
      accounts.transferAsset(admin.identity, admin.privateKeyPem, outsider.identity, "coin", "1", "gift")
    ).rejects.toMatchObject({ reason: "cross_domain_transfer" });
    expect(ledger.committed()).toHaveLength(4);
  });

  it("rejects a duplicate account", async () => {
    const { accounts, admin, master } = await fundedNetwork();
    await expect(accounts.createAccount(admin.identity, admin.privateKeyPem, master.identity)).rejects.toMatchObject({
      reason: "duplicate_account"
    });
  });
});
