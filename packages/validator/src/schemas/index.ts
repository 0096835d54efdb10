/**
 * Schema barrel export.
 * All V1 wire types read by the validator tooling.
 */

export {
  Hash28,
  TxHash,
  TokenNameHex,
  HexBytes,
  IntString,
  QuantityString,
} from "./primitives.js";

export { PlutusDataV1 } from "./data.js";

export {
  CredentialV1,
  AddressV1,
  OutRefV1,
  AssetV1,
  MintAssetV1,
  OutputV1,
  InputV1,
  ValidityRangeV1,
  TransactionSnapshotV1,
} from "./transaction.js";

export { ValidatorConfigV1, SpendLpSignRuleV1 } from "./config.js";
