// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { AccountAsset, Identity, Role, SubmitReceipt } from "../common/types.js";
import { createLogger } from "../common/logger.js";
import { runQuery, submitCommands, type LedgerClient } from "../ledger/client.js";
import { accountIdOf } from "./keys.js";

type Party = Pick<Identity, "name" | "domain">;

const logger = createLogger("accounts");

/** Provisioning and asset operations for node accounts. */
export class AccountService {
  constructor(private readonly ledger: LedgerClient) {}

  createDomain(admin: Party, adminKey: string, domainId: string, defaultRole: Role = "user"): Promise<SubmitReceipt> {
    return submitCommands(this.ledger, admin, adminKey, [{ type: "CreateDomain", domainId, defaultRole }]);
  }

  /** Registers `identity` on the ledger. Signed by an admin, never by the new account. */
  async createAccount(admin: Party, adminKey: string, identity: Identity): Promise<SubmitReceipt> {
    const receipt = await submitCommands(this.ledger, admin, adminKey, [
      {
        type: "CreateAccount",
        accountName: identity.name,
        domainId: identity.domain,
        publicKeyPem: identity.publicKeyPem
      }
    ]);
    logger.info("account created", { accountId: accountIdOf(identity), txHash: receipt.txHash });
    return receipt;
  }

  createAsset(admin: Party, adminKey: string, assetName: string, domainId: string, precision = 2): Promise<SubmitReceipt> {
    return submitCommands(this.ledger, admin, adminKey, [{ type: "CreateAsset", assetName, domainId, precision }]);
  }

  /** Mints `amount` of an asset into the admin's own account. */
  addAssetQuantity(admin: Party, adminKey: string, assetId: string, amount: string): Promise<SubmitReceipt> {
    return submitCommands(this.ledger, admin, adminKey, [{ type: "AddAssetQuantity", assetId, amount }]);
  }

  async getAssets(self: Party, signingKey: string): Promise<AccountAsset[]> {
    const result = await runQuery(this.ledger, self, signingKey, {
      type: "GetAccountAssets",
      accountId: accountIdOf(self)
    });
    if (result.type !== "AccountAssets") throw new Error(`unexpected query result: ${result.type}`);
    return result.assets;
  }

  /** Both accounts and the asset must live in the sender's domain. */
  transferAsset(
    self: Party,
    signingKey: string,
    to: Party,
    assetName: string,
    amount: string,
    description: string
  ): Promise<SubmitReceipt> {
    return submitCommands(this.ledger, self, signingKey, [
      {
        type: "TransferAsset",
        srcAccountId: accountIdOf(self),
        destAccountId: accountIdOf(to),
        assetId: `${assetName}#${self.domain}`,
        amount,
        description
      }
    ]);
  }
}
