import { vmTypeHash } from "./core/identity";
import type { AccountImplementation, VerificationOracle } from "./core/oracle";
import type { AccountFactory } from "./core/registry";
import type { ChainKey } from "./core/types";

export const VM = {
  SVM: vmTypeHash("SVM"),
  COSMOS: vmTypeHash("COSMOS-SDK"),
} as const;

export const solanaAccount = (oracle: VerificationOracle): AccountImplementation => ({
  name: "SolanaAccount",
  vmTypeHash: VM.SVM,
  strategy: "ed25519",
  oracle,
});

export const cosmosAccount = (oracle: VerificationOracle): AccountImplementation => ({
  name: "CosmosAccount",
  vmTypeHash: VM.COSMOS,
  strategy: "secp256k1",
  oracle,
});

// legacy Solana cluster ids plus CAIP-2 genesis-hash references
export const SOLANA_CHAINS: readonly ChainKey[] = [
  "solana:101",
  "solana:102",
  "solana:103",
  "solana:5eykt4UsFv8P8NJdTREpY1vzqKqZKvdp",
  "solana:EtWTRABZaYq6iMfeYKouRu166VU2xqa1",
];

export const COSMOS_CHAINS: readonly ChainKey[] = ["cosmos:cosmoshub-4", "cosmos:theta-testnet-001"];

/* binds every known chain key of each family to its implementation */
export const registerDefaults = (
  factory: AccountFactory,
  oracles: { solana?: VerificationOracle; cosmos?: VerificationOracle },
): void => {
  const families: [readonly ChainKey[], AccountImplementation | undefined][] = [
    [SOLANA_CHAINS, oracles.solana && solanaAccount(oracles.solana)],
    [COSMOS_CHAINS, oracles.cosmos && cosmosAccount(oracles.cosmos)],
  ];
  for (const [keys, impl] of families) {
    if (!impl) continue;
    for (const key of keys) {
      factory.registerChainType(key, impl.vmTypeHash);
      factory.registerImplementation(key, impl.vmTypeHash, impl);
    }
  }
};
