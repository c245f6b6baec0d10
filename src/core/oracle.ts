import type { Hex } from "./types";

/**
 * Native-chain verification capability consumed by accounts.
 *
 * Both calls may throw instead of answering (unreachable, malformed input);
 * a thrown error is never read as a verdict. Only `true` authorizes.
 */
export interface VerificationOracle {
  verifySignature(ownerKey: Hex, messageHash: Hex, signature: Hex): boolean;
  verifyNativeTxHash(
    chainNamespace: string,
    chainId: string,
    ownerKey: Hex,
    payloadHash: Hex,
    txHash: Hex,
  ): boolean;
}

/** Verification strategy shared by every account of one VM type. */
export interface AccountImplementation {
  readonly name: string; // e.g. 'SolanaAccount'; hashed into the account address
  readonly vmTypeHash: Hex;
  readonly strategy: string; // names the scheme in InvalidSignature errors
  readonly oracle: VerificationOracle;
}
