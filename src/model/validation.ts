import {
  bigint,
  check,
  literal,
  maxValue,
  minValue,
  object,
  pipe,
  regex,
  safeParse,
  string,
  union,
} from "valibot";
import { MAX_UINT256 } from "../codec/abi";
import { AccountError } from "../errors";
import type { Hex, Identity, Payload } from "../core/types";

export const hexSchema = pipe(string(), regex(/^0x([0-9a-fA-F]{2})*$/, "expected even-length 0x-hex"));
export const addressSchema = pipe(string(), regex(/^0x[0-9a-fA-F]{40}$/, "expected 20-byte address"));
export const uint256Schema = pipe(bigint(), minValue(0n), maxValue(MAX_UINT256));

const narrowHex = (s: string): Hex => {
  if (!s.startsWith("0x")) throw new TypeError(`not hex: ${s}`);
  return `0x${s.slice(2)}`;
};

export const identitySchema = object({
  chainNamespace: pipe(string(), regex(/^[-a-z0-9]{3,8}$/, "expected a CAIP-2 namespace")),
  chainId: pipe(string(), regex(/^[-_a-zA-Z0-9]{1,32}$/, "expected a CAIP-2 reference")),
  owner: pipe(hexSchema, check((s) => s.length > 2, "owner must not be empty")),
});

export const payloadSchema = object({
  to: addressSchema,
  value: uint256Schema,
  data: hexSchema,
  gasLimit: uint256Schema,
  maxFeePerGas: uint256Schema,
  maxPriorityFeePerGas: uint256Schema,
  nonce: uint256Schema,
  deadline: uint256Schema,
  verificationType: union([literal(0), literal(1)]),
});

const formatIssues = (issues: readonly { message: string; path?: readonly { key: unknown }[] }[]) =>
  issues
    .map((i) => {
      const path = i.path?.map((p) => String(p.key)).join(".");
      return path ? `${path}: ${i.message}` : i.message;
    })
    .join("; ");

export const parseIdentity = (input: unknown): Identity => {
  const res = safeParse(identitySchema, input);
  if (!res.success) throw new AccountError("InvalidIdentity", formatIssues(res.issues));
  const { chainNamespace, chainId, owner } = res.output;
  return { chainNamespace, chainId, owner: narrowHex(owner) };
};

export const parsePayload = (input: unknown): Payload => {
  const res = safeParse(payloadSchema, input);
  if (!res.success) throw new AccountError("InvalidPayload", formatIssues(res.issues));
  const p = res.output;
  return {
    ...p,
    to: narrowHex(p.to),
    data: narrowHex(p.data),
  };
};
