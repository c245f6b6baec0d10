export * from "./core/types";
export { Account, DEFAULT_PROTOCOL_VERSION, type AccountOptions } from "./core/account";
export { AccountFactory, type FactoryOptions } from "./core/registry";
export { Runtime, type RuntimeOptions } from "./core/runtime";
export {
  GAS_STORAGE_WRITE,
  GAS_TRANSFER_STIPEND,
  GasMeter,
  HostLedger,
  OutOfGas,
  Revert,
  type CallContext,
  type ContractStorage,
  type HostContract,
  type LedgerOptions,
} from "./core/ledger";
export type { AccountImplementation, VerificationOracle } from "./core/oracle";
export {
  DOMAIN_TYPE,
  DOMAIN_TYPEHASH,
  PAYLOAD_TYPE,
  PAYLOAD_TYPEHASH,
  domainSeparator,
  structHash,
  typedDigest,
} from "./core/hash";
export { chainKeyOf, codeHash, counterfactualAddress, identitySalt, vmTypeHash } from "./core/identity";
export {
  CurveVerificationOracle,
  ObservedTxIndex,
  type NativeTxObservation,
  type SignatureScheme,
} from "./crypto/oracle";
export { VM, cosmosAccount, registerDefaults, solanaAccount } from "./chains";
export * from "./errors";
export { encodeCall, selector } from "./codec/abi";
export { parseIdentity, parsePayload } from "./model/validation";
export { loadConfig, type Config } from "./config";
export { makeLogger, type ILogger } from "./logging";
