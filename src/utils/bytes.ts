import { bytesToHex as toHexRaw, hexToBytes } from "@noble/hashes/utils";
import { equals } from "uint8arrays";
import type { Address, Hex } from "../core/types";

export const ZERO_ADDRESS: Address = `0x${"00".repeat(20)}`;
export const ZERO_HASH: Hex = `0x${"00".repeat(32)}`;

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHexRaw(bytes)}`;

export const fromHex = (hex: Hex): Uint8Array => hexToBytes(hex.slice(2));

export const isEmptyHex = (hex: Hex) => hex.length <= 2;

export const sameBytes = (a: Hex, b: Hex) => equals(fromHex(a), fromHex(b));

export const normalizeHex = (h: Hex): Hex => bytesToHex(fromHex(h));
