/**
 * Ledger shapes the validator reads.
 *
 * These are the decoded, in-memory forms: quantities and times are bigint,
 * values are key-unique maps. The JSON wire forms live in ./schemas.
 */

/** 28-byte minting policy hash, lowercase hex. */
export type PolicyId = string;
/** Asset name bytes, lowercase hex (may be empty). */
export type TokenName = string;
/** 28-byte verification key hash, lowercase hex. */
export type KeyHash = string;
/** 28-byte script hash, lowercase hex. */
export type ScriptHash = string;
/** POSIX time in seconds. */
export type PosixTime = bigint;

export type Credential =
  | { type: "Key"; hash: KeyHash }
  | { type: "Script"; hash: ScriptHash };

export interface Address {
  payment: Credential;
  stake?: Credential;
}

export interface OutRef {
  txHash: string;
  outputIndex: number;
}

/** TokenName → quantity for a single policy. */
export type TokenMap = ReadonlyMap<TokenName, bigint>;

/** PolicyId → TokenName → quantity. Also used for the mint field (signed). */
export type Value = ReadonlyMap<PolicyId, TokenMap>;

export type PlutusData =
  | { int: bigint }
  | { bytes: string }
  | { constr: number; fields: readonly PlutusData[] }
  | { list: readonly PlutusData[] }
  | { map: readonly { k: PlutusData; v: PlutusData }[] };

export interface Output {
  address: Address;
  value: Value;
  datum?: PlutusData;
}

export interface Input {
  outRef: OutRef;
  output: Output;
}

/** Either bound may be open (undefined). */
export interface ValidityRange {
  lower?: PosixTime;
  upper?: PosixTime;
}

export interface TransactionSnapshot {
  inputs: readonly Input[];
  outputs: readonly Output[];
  mint: Value;
  signers: ReadonlySet<KeyHash>;
  validity: ValidityRange;
}

/**
 * How the spend path reads the LP quantity minted in its own transaction.
 *
 * "non-negative" accepts burned_lp_amt >= 0, which is what the deployed
 * script checks even though the mint-side Burn requires a negative amount.
 * "negative" makes the spend side agree with the mint side.
 */
export type SpendLpSignRule = "non-negative" | "negative";

export interface ValidatorConfig {
  underlyingPolicyId: PolicyId;
  underlyingTokenName: TokenName;
  lpTokenName: TokenName;
  rewardPolicyId: PolicyId;
  rewardTokenName: TokenName;
  adminKeyHash: KeyHash;
  spendLpSignRule: SpendLpSignRule;
}

export type Action =
  | { type: "Mint"; amount: bigint }
  | { type: "Burn" }
  | { type: "DepositReward" };
