import { concat } from "uint8arrays";
import { keccak, keccakUtf8 } from "../codec/abi";
import { encIdentity } from "../codec/rlp";
import { bytesToHex, fromHex } from "../utils/bytes";
import type { Address, ChainKey, Hex, Identity } from "./types";

export const chainKeyOf = (id: Pick<Identity, "chainNamespace" | "chainId">): ChainKey =>
  `${id.chainNamespace}:${id.chainId}`;

/* VM family tag, e.g. vmTypeHash("SVM") for every Solana cluster */
export const vmTypeHash = (vm: string): Hex => keccakUtf8(vm);

/* implementation-class tag */
export const codeHash = (implementationName: string): Hex =>
  keccakUtf8(implementationName);

export const identitySalt = (id: Identity): Hex => keccak(encIdentity(id));

/* keccak(0xff ‖ deployer ‖ salt ‖ codeHash)[12..] */
export const counterfactualAddress = (
  deployer: Address,
  salt: Hex,
  code: Hex,
): Address => {
  const digest = fromHex(
    keccak(concat([Uint8Array.of(0xff), fromHex(deployer), fromHex(salt), fromHex(code)])),
  );
  return bytesToHex(digest.subarray(12));
};
