import type { Identity } from "../common/types.js";
import { TransactionRejectedError } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { accountIdOf } from "../identity/keys.js";
import { submitCommands, type LedgerClient } from "../ledger/client.js";

type Party = Pick<Identity, "name" | "domain">;

const logger = createLogger("permissions");

/**
 * Grants and revokes the right to set details on the grantor's account. The
 * ledger is the only authority; `knownState` reflects this registry's own
 * completed writes and nothing else.
 */
export class PermissionRegistry {
  private readonly known = new Map<string, boolean>();

  constructor(private readonly ledger: LedgerClient) {}

  grant(grantor: Party, grantee: Party, signingKey: string): Promise<void> {
    return this.write(grantor, grantee, signingKey, true);
  }

  revoke(grantor: Party, grantee: Party, signingKey: string): Promise<void> {
    return this.write(grantor, grantee, signingKey, false);
  }

  /** `undefined` when this registry has not completed a write for the pair. */
  knownState(grantor: Party, grantee: Party): boolean | undefined {
    return this.known.get(pairKey(grantor, grantee));
  }

  private async write(grantor: Party, grantee: Party, signingKey: string, granted: boolean): Promise<void> {
    const key = pairKey(grantor, grantee);
    this.known.delete(key);
    const permission = "can_set_my_account_detail";
    const accountId = accountIdOf(grantee);
    try {
      await submitCommands(this.ledger, grantor, signingKey, [
        granted
          ? { type: "GrantPermission", accountId, permission }
          : { type: "RevokePermission", accountId, permission }
      ]);
    } catch (error) {
      const noop = granted ? "already_granted" : "not_granted";
      if (!(error instanceof TransactionRejectedError && error.reason === noop)) throw error;
    }
    this.known.set(key, granted);
    logger.info(granted ? "permission granted" : "permission revoked", {
      grantor: accountIdOf(grantor),
      grantee: accountId
    });
  }
}

function pairKey(grantor: Party, grantee: Party): string {
  return `${accountIdOf(grantor)}|${accountIdOf(grantee)}`;
}
