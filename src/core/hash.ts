import { concat } from "uint8arrays";
import { encodeWords, keccak, keccakHex, keccakUtf8 } from "../codec/abi";
import { fromHex } from "../utils/bytes";
import type { Address, Big, Hex, Payload } from "./types";

/* ── typed-hash constants ────────────────────────────────── */
// Changing either string changes every hash: a breaking protocol change.
export const DOMAIN_TYPE =
  "Domain(string version,string chainId,address verifyingContract)";
export const PAYLOAD_TYPE =
  "Payload(address to,uint256 value,bytes data,uint256 gasLimit,uint256 maxFeePerGas," +
  "uint256 maxPriorityFeePerGas,uint256 nonce,uint256 deadline,uint8 verificationType)";

export const DOMAIN_TYPEHASH = keccakUtf8(DOMAIN_TYPE);
export const PAYLOAD_TYPEHASH = keccakUtf8(PAYLOAD_TYPE);

const TYPED_PREFIX = Uint8Array.of(0x19, 0x01);

export const domainSeparator = (
  version: string,
  chainId: string,
  verifyingContract: Address,
): Hex =>
  keccak(
    encodeWords([
      { type: "bytes32", value: DOMAIN_TYPEHASH },
      { type: "bytes32", value: keccakUtf8(version) },
      { type: "bytes32", value: keccakUtf8(chainId) },
      { type: "address", value: verifyingContract },
    ]),
  );

/* `nonce` is the account's live counter; payload.nonce is not hashed */
export const structHash = (p: Payload, nonce: Big): Hex =>
  keccak(
    encodeWords([
      { type: "bytes32", value: PAYLOAD_TYPEHASH },
      { type: "address", value: p.to },
      { type: "uint256", value: p.value },
      { type: "bytes32", value: keccakHex(p.data) },
      { type: "uint256", value: p.gasLimit },
      { type: "uint256", value: p.maxFeePerGas },
      { type: "uint256", value: p.maxPriorityFeePerGas },
      { type: "uint256", value: nonce },
      { type: "uint256", value: p.deadline },
      { type: "uint8", value: p.verificationType },
    ]),
  );

export const typedDigest = (separator: Hex, struct: Hex): Hex =>
  keccak(concat([TYPED_PREFIX, fromHex(separator), fromHex(struct)]));
