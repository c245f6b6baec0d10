// Fixed 32-byte word encoding for typed hashing (static types only).

import { keccak_256 } from "@noble/hashes/sha3";
import { utf8ToBytes } from "@noble/hashes/utils";
import { concat } from "uint8arrays";
import type { Address, Big, Hex } from "../core/types";
import { bytesToHex, fromHex } from "../utils/bytes";

export const MAX_UINT256 = 2n ** 256n - 1n;
const WORD = 32;

export type Word =
  | { type: "uint256"; value: Big }
  | { type: "uint8"; value: number }
  | { type: "address"; value: Address }
  | { type: "bytes32"; value: Hex };

const leftPad = (bytes: Uint8Array): Uint8Array => {
  if (bytes.length > WORD) throw new RangeError(`word overflow: ${bytes.length} bytes`);
  const out = new Uint8Array(WORD);
  out.set(bytes, WORD - bytes.length);
  return out;
};

const uintWord = (n: Big, max: Big): Uint8Array => {
  if (n < 0n || n > max) throw new RangeError(`uint out of range: ${n}`);
  return fromHex(`0x${n.toString(16).padStart(64, "0")}`);
};

export const encodeWord = (w: Word): Uint8Array => {
  switch (w.type) {
    case "uint256":
      return uintWord(w.value, MAX_UINT256);
    case "uint8":
      return uintWord(BigInt(w.value), 255n);
    case "address": {
      const raw = fromHex(w.value);
      if (raw.length !== 20) throw new RangeError(`bad address length: ${raw.length}`);
      return leftPad(raw);
    }
    case "bytes32": {
      const raw = fromHex(w.value);
      if (raw.length !== WORD) throw new RangeError(`bad bytes32 length: ${raw.length}`);
      return raw;
    }
  }
};

export const encodeWords = (words: Word[]): Uint8Array =>
  concat(words.map(encodeWord));

export const keccak = (bytes: Uint8Array): Hex => bytesToHex(keccak_256(bytes));

export const keccakHex = (hex: Hex): Hex => keccak(fromHex(hex));

export const keccakUtf8 = (s: string): Hex => keccak(utf8ToBytes(s));

/* first four bytes of keccak(signature), e.g. selector("setCount(uint256)") */
export const selector = (signature: string): Hex =>
  `0x${keccakUtf8(signature).slice(2, 10)}`;

export const decodeUint256 = (words: Uint8Array, index: number): Big => {
  const word = words.subarray(index * WORD, (index + 1) * WORD);
  if (word.length !== WORD) throw new RangeError(`missing word ${index}`);
  return BigInt(bytesToHex(word));
};

/* selector ‖ words, the layout target contracts receive as call data */
export const encodeCall = (signature: string, words: Word[]): Hex =>
  bytesToHex(concat([fromHex(selector(signature)), encodeWords(words)]));
