export type Big = bigint;
export type Hex = `0x${string}`;
export type Address = Hex;

/* ── foreign identity ────────────────────────────────────── */
export type Identity = {
  chainNamespace: string; // e.g. 'solana', 'bip122', 'cosmos'
  chainId: string;
  owner: Hex; // raw public key / owner bytes on the source chain
};

/* `${namespace}:${chainId}`, CAIP-2 style */
export type ChainKey = `${string}:${string}`;

/* ── payload ─────────────────────────────────────────────── */
export const VerificationType = {
  SignatureBased: 0,
  TxHashBased: 1,
} as const;
export type VerificationType =
  (typeof VerificationType)[keyof typeof VerificationType];

export type Payload = {
  to: Address;
  value: Big;
  data: Hex;
  gasLimit: Big;
  maxFeePerGas: Big;
  maxPriorityFeePerGas: Big;
  nonce: Big; // informational, the hash binds the account's own counter
  deadline: Big; // unix seconds
  verificationType: VerificationType;
};

/* signature bytes or a native tx hash, depending on verificationType */
export type Proof = Hex;

/* ── account ─────────────────────────────────────────────── */
export type AccountState = {
  address: Address;
  identity?: Identity; // absent while uninitialized
  nonce: Big;
};

/* ── registry ────────────────────────────────────────────── */
export type ChainTypeEntry = { vmTypeHash: Hex; registered: boolean };

/* ── host-ledger events ──────────────────────────────────── */
export type PayloadExecuted = {
  name: "PayloadExecuted";
  args: { owner: Hex; to: Address; data: Hex };
};

export type AccountDeployed = {
  name: "AccountDeployed";
  args: { account: Address; chainKey: ChainKey; owner: Hex };
};

export type LedgerEvent = PayloadExecuted | AccountDeployed;

export type LogEntry = LedgerEvent & { emitter: Address; index: number };

/* ── host-ledger calls ───────────────────────────────────── */
export type CallRequest = {
  from: Address;
  to: Address;
  value: Big;
  data: Hex;
  gasLimit: Big;
};

export type CallResult =
  | { ok: true; returnData: Hex; gasUsed: Big }
  | { ok: false; reason?: string; gasUsed: Big };
