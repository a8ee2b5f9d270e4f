export type Role = "admin" | "user";

export type Capability = "can_set_my_account_detail";

export interface Identity {
  name: string;
  domain: string;
  publicKeyPem: string;
}

export interface NodeKeys {
  publicKeyPem: string;
  privateKeyPem: string;
}

export interface Domain {
  id: string;
  defaultRole: Role;
}

/** `writer account -> key -> value`, the shape every detail query returns. */
export type DetailMap = Record<string, Record<string, string>>;

export type Command =
  | { type: "CreateDomain"; domainId: string; defaultRole: Role }
  | { type: "CreateAccount"; accountName: string; domainId: string; publicKeyPem: string }
  | { type: "CreateAsset"; assetName: string; domainId: string; precision: number }
  | { type: "AddAssetQuantity"; assetId: string; amount: string }
  | { type: "SetAccountDetail"; accountId: string; key: string; value: string }
  | {
      type: "TransferAsset";
      srcAccountId: string;
      destAccountId: string;
      assetId: string;
      amount: string;
      description: string;
    }
  | { type: "GrantPermission"; accountId: string; permission: Capability }
  | { type: "RevokePermission"; accountId: string; permission: Capability };

export type CommandType = Command["type"];

export interface Transaction {
  creatorAccountId: string;
  commands: Command[];
  createdAtMs: number;
  nonce: string;
}

export interface SignedTransaction extends Transaction {
  signature: string;
}

export type QueryRequest =
  | { type: "GetAccountAssets"; accountId: string }
  | { type: "GetAccountDetail"; accountId: string; writer?: string; key?: string };

export interface Query {
  creatorAccountId: string;
  createdAtMs: number;
  nonce: string;
  request: QueryRequest;
}

export interface SignedQuery extends Query {
  signature: string;
}

export interface AccountAsset {
  assetId: string;
  accountId: string;
  balance: string;
}

export type QueryResult =
  | { type: "AccountAssets"; assets: AccountAsset[] }
  | { type: "AccountDetail"; detail: DetailMap };

export interface SubmitReceipt {
  txHash: string;
  status: "committed";
}

export interface WorkerRef {
  identity: Identity;
  /** Base URL of the worker's RPC endpoint. */
  address: string;
}

export interface ComputeCostArgs {
  /** Name of the account that published the parameters. */
  writer: string;
  domain: string;
  /** Where the worker reaches the ledger. */
  networkLocation: string;
  objective: string;
}

export interface RoundParameters {
  /** Identifies one annealing run; round numbers restart with every run. */
  runId: string;
  round: number;
  /** Bumped each time the same round is re-sent to one worker. */
  attempt: number;
  beta: number[];
  objective: string;
}

export type CostReport =
  | { runId: string; round: number; attempt: number; cost: number | string }
  | { runId: string; round: number; attempt: number; error: string };

export interface HistoryEntry {
  iteration: number;
  round: number;
  beta: number[];
  cost: number;
  temperature: number;
}

export type TrajectoryEntry =
  | (HistoryEntry & { accepted: boolean; incomplete?: false })
  | { iteration: number; round: number; temperature: number; incomplete: true; missing: string[] };
