import {
  AccountError,
  ExecutionRevertedError,
  InvalidSignatureError,
  isAccountError,
} from "../errors";
import { silentLogger, type ILogger } from "../logging";
import { parsePayload } from "../model/validation";
import { isEmptyHex, normalizeHex } from "../utils/bytes";
import { domainSeparator, structHash, typedDigest } from "./hash";
import { Revert, type HostContract, type HostLedger } from "./ledger";
import type { AccountImplementation } from "./oracle";
import {
  VerificationType,
  type AccountState,
  type Address,
  type Big,
  type Hex,
  type Identity,
  type Payload,
  type Proof,
} from "./types";

export const DEFAULT_PROTOCOL_VERSION = "1";

const NONCE_SLOT = "nonce";

export type AccountOptions = {
  address: Address;
  implementation: AccountImplementation;
  ledger: HostLedger;
  protocolVersion?: string;
  logger?: ILogger;
};

/**
 * Proxy account on the host ledger, controlled by one foreign identity.
 *
 * Uninitialized → Active. The nonce lives in ledger storage so that it is
 * rolled back together with everything else a failed unit touched.
 */
export class Account implements HostContract {
  readonly payable = true;
  readonly address: Address;
  readonly implementation: AccountImplementation;
  private readonly ledger: HostLedger;
  private readonly version: string;
  private readonly log: ILogger;
  private bound?: Identity;

  constructor(opts: AccountOptions) {
    this.address = normalizeHex(opts.address);
    this.implementation = opts.implementation;
    this.ledger = opts.ledger;
    this.version = opts.protocolVersion ?? DEFAULT_PROTOCOL_VERSION;
    this.log = opts.logger ?? silentLogger();
  }

  /* ── lifecycle ── */
  initialize(identity: Identity): void {
    if (this.bound)
      throw new AccountError("AccountAlreadyExists", `account ${this.address} is already bound`);
    this.bound = { ...identity };
    this.ledger.storageAt(this.address).set(NONCE_SLOT, 0n);
  }

  isInitialized(): boolean {
    return this.bound !== undefined;
  }

  identity(): Identity {
    if (!this.bound)
      throw new AccountError("AccountNotInitialized", `account ${this.address} has no identity`);
    return { ...this.bound };
  }

  nonce(): Big {
    return this.ledger.storageAt(this.address).get(NONCE_SLOT);
  }

  snapshot(): AccountState {
    return { address: this.address, identity: this.bound && { ...this.bound }, nonce: this.nonce() };
  }

  /* ── hashing ── */
  domainSeparator(): Hex {
    return domainSeparator(this.version, this.identity().chainId, this.address);
  }

  computePayloadHash(payload: Payload): Hex {
    const now = this.ledger.now();
    if (now > payload.deadline)
      throw new AccountError("ExpiredDeadline", `deadline ${payload.deadline} passed at ${now}`);
    return typedDigest(this.domainSeparator(), structHash(payload, this.nonce()));
  }

  /* ── verification ── */
  verifyBySignature(messageHash: Hex, signature: Hex): boolean {
    const { owner } = this.identity();
    return this.consult("verifySignature", () =>
      this.implementation.oracle.verifySignature(owner, messageHash, signature),
    );
  }

  verifyByTxHash(payloadHash: Hex, txProof: Hex): boolean {
    if (isEmptyHex(txProof)) throw new AccountError("InvalidTxHash", "empty tx hash proof");
    const { chainNamespace, chainId, owner } = this.identity();
    return this.consult("verifyNativeTxHash", () =>
      this.implementation.oracle.verifyNativeTxHash(chainNamespace, chainId, owner, payloadHash, txProof),
    );
  }

  /* ── execution ── */
  executePayload(payload: Payload, proof: Proof): Hex {
    const p = parsePayload(payload);
    try {
      return this.ledger.transact(() => this.execute(p, proof));
    } catch (err) {
      if (isAccountError(err))
        this.log.warn({ account: this.address, code: err.code, to: p.to }, "payload rejected");
      throw err;
    }
  }

  /* the account has no callable surface on the ledger: only plain receives */
  invoke(): Hex {
    throw new Revert();
  }

  private execute(p: Payload, proof: Proof): Hex {
    const payloadHash = this.computePayloadHash(p);
    this.authorize(p.verificationType, payloadHash, proof);

    const res = this.ledger.call({
      from: this.address,
      to: p.to,
      value: p.value,
      data: p.data,
      gasLimit: p.gasLimit,
    });
    if (!res.ok) {
      if (res.reason !== undefined) throw new ExecutionRevertedError(res.reason);
      throw new AccountError("ExecutionFailed", `call to ${p.to} failed`);
    }

    const nonce = this.nonce();
    const { owner } = this.identity();
    this.ledger.storageAt(this.address).set(NONCE_SLOT, nonce + 1n);
    this.ledger.emit(this.address, {
      name: "PayloadExecuted",
      args: { owner, to: p.to, data: p.data },
    });
    this.log.info(
      { account: this.address, to: p.to, nonce: nonce.toString(), gasUsed: res.gasUsed.toString() },
      "payload executed",
    );
    return res.returnData;
  }

  private authorize(type: VerificationType, payloadHash: Hex, proof: Proof): void {
    switch (type) {
      case VerificationType.SignatureBased:
        if (!this.verifyBySignature(payloadHash, proof))
          throw new InvalidSignatureError(this.implementation.strategy);
        return;
      case VerificationType.TxHashBased:
        if (!this.verifyByTxHash(payloadHash, proof))
          throw new AccountError("InvalidTxHash", "native tx hash not verified");
        return;
    }
  }

  private consult(op: string, call: () => boolean): boolean {
    let verdict: boolean;
    try {
      verdict = call();
    } catch (err) {
      throw new AccountError("PrecompileCallFailed", `${op}: ${String(err)}`, { cause: err });
    }
    return verdict === true;
  }
}
