import { ed25519 } from "@noble/curves/ed25519";
import { secp256k1 } from "@noble/curves/secp256k1";
import { chainKeyOf } from "../core/identity";
import type { VerificationOracle } from "../core/oracle";
import type { Hex } from "../core/types";
import { fromHex, normalizeHex, sameBytes } from "../utils/bytes";

export type SignatureScheme = "ed25519" | "secp256k1";

/* ── observed native transactions ─────────────────────────── */
export type NativeTxObservation = {
  chainNamespace: string;
  chainId: string;
  owner: Hex;
  txHash: Hex;
  payloadHash: Hex; // payload hash the native tx committed to
};

/**
 * Native transactions relayed from source chains, keyed by
 * (chain, owner, tx hash). Only recorded observations ever verify.
 */
export class ObservedTxIndex {
  private readonly seen = new Map<string, Hex>();

  private static key(ns: string, chainId: string, owner: Hex, txHash: Hex) {
    return `${chainKeyOf({ chainNamespace: ns, chainId })}|${normalizeHex(owner)}|${normalizeHex(txHash)}`;
  }

  record(o: NativeTxObservation): void {
    const key = ObservedTxIndex.key(o.chainNamespace, o.chainId, o.owner, o.txHash);
    const prior = this.seen.get(key);
    if (prior !== undefined && !sameBytes(prior, o.payloadHash))
      throw new Error(`conflicting observation for ${o.txHash}`);
    this.seen.set(key, o.payloadHash);
  }

  lookup(ns: string, chainId: string, owner: Hex, txHash: Hex): Hex | undefined {
    return this.seen.get(ObservedTxIndex.key(ns, chainId, owner, txHash));
  }

  get size(): number {
    return this.seen.size;
  }
}

/* ── curve-backed oracle ──────────────────────────────────── */
const KEY_LENGTHS: Record<SignatureScheme, readonly number[]> = {
  ed25519: [32],
  secp256k1: [33, 65],
};
const SIG_LENGTH = 64;
const HASH_LENGTH = 32;

const expectLength = (what: string, bytes: Uint8Array, allowed: readonly number[]) => {
  if (!allowed.includes(bytes.length))
    throw new Error(`${what}: expected ${allowed.join(" or ")} bytes, got ${bytes.length}`);
};

/**
 * Verification oracle over a single signature scheme. Malformed input
 * throws; a well-formed but wrong signature answers false.
 */
export class CurveVerificationOracle implements VerificationOracle {
  constructor(
    readonly scheme: SignatureScheme,
    private readonly observed: ObservedTxIndex = new ObservedTxIndex(),
  ) {}

  verifySignature(ownerKey: Hex, messageHash: Hex, signature: Hex): boolean {
    const key = fromHex(ownerKey);
    const msg = fromHex(messageHash);
    const sig = fromHex(signature);
    expectLength("owner key", key, KEY_LENGTHS[this.scheme]);
    expectLength("message hash", msg, [HASH_LENGTH]);
    expectLength("signature", sig, [SIG_LENGTH]);

    switch (this.scheme) {
      case "ed25519":
        return ed25519.verify(sig, msg, key);
      case "secp256k1":
        return secp256k1.verify(sig, msg, key);
    }
  }

  verifyNativeTxHash(
    chainNamespace: string,
    chainId: string,
    ownerKey: Hex,
    payloadHash: Hex,
    txHash: Hex,
  ): boolean {
    expectLength("payload hash", fromHex(payloadHash), [HASH_LENGTH]);
    const committed = this.observed.lookup(chainNamespace, chainId, ownerKey, txHash);
    return committed !== undefined && sameBytes(committed, payloadHash);
  }
}
