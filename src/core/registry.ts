import { AccountError } from "../errors";
import { silentLogger, type ILogger } from "../logging";
import { parseIdentity } from "../model/validation";
import { ZERO_ADDRESS, ZERO_HASH, normalizeHex, sameBytes } from "../utils/bytes";
import { Account, DEFAULT_PROTOCOL_VERSION } from "./account";
import { chainKeyOf, codeHash, counterfactualAddress, identitySalt } from "./identity";
import type { HostLedger } from "./ledger";
import type { AccountImplementation } from "./oracle";
import type { Address, ChainKey, ChainTypeEntry, Hex, Identity } from "./types";

export type FactoryOptions = {
  ledger: HostLedger;
  address?: Address; // deployer address mixed into every derived address
  protocolVersion?: string;
  logger?: ILogger;
};

/**
 * Chain-type registry and account factory.
 *
 * chainKey → vmTypeHash → implementation. Both bindings are write-once; the
 * account store maps derived addresses to live accounts.
 */
export class AccountFactory {
  readonly address: Address;
  private readonly ledger: HostLedger;
  private readonly version: string;
  private readonly log: ILogger;
  private readonly chainTypes = new Map<ChainKey, Hex>();
  private readonly implementations = new Map<Hex, AccountImplementation>();
  private readonly accounts = new Map<Address, Account>();

  constructor(opts: FactoryOptions) {
    this.ledger = opts.ledger;
    this.address = normalizeHex(opts.address ?? ZERO_ADDRESS);
    this.version = opts.protocolVersion ?? DEFAULT_PROTOCOL_VERSION;
    this.log = opts.logger ?? silentLogger();
  }

  /* ── registry ── */
  registerChainType(chainKey: ChainKey, vmTypeHash: Hex): void {
    const bound = this.chainTypes.get(chainKey);
    if (bound !== undefined) {
      if (sameBytes(bound, vmTypeHash)) return;
      throw new AccountError("ChainTypeAlreadyRegistered", `${chainKey} is bound to ${bound}`);
    }
    this.chainTypes.set(chainKey, vmTypeHash);
    this.log.debug({ chainKey, vmTypeHash }, "chain type registered");
  }

  registerImplementation(chainKey: ChainKey, vmTypeHash: Hex, impl: AccountImplementation): void {
    const bound = this.chainTypes.get(chainKey);
    if (bound === undefined)
      throw new AccountError("ChainTypeNotRegistered", `${chainKey} is not registered`);
    if (!sameBytes(bound, vmTypeHash) || !sameBytes(impl.vmTypeHash, vmTypeHash))
      throw new AccountError("VmTypeMismatch", `${chainKey} expects ${bound}, got ${vmTypeHash}`);

    const existing = this.implementations.get(bound);
    if (existing === impl) return;
    if (existing)
      throw new AccountError(
        "ImplementationAlreadyRegistered",
        `${existing.name} already implements ${bound}`,
      );
    this.implementations.set(bound, impl);
    this.log.debug({ chainKey, vmTypeHash, implementation: impl.name }, "implementation registered");
  }

  lookupChainType(chainKey: ChainKey): ChainTypeEntry {
    const vmTypeHash = this.chainTypes.get(chainKey);
    return vmTypeHash === undefined
      ? { vmTypeHash: ZERO_HASH, registered: false }
      : { vmTypeHash, registered: true };
  }

  implementationOf(identity: Identity): AccountImplementation {
    const chainKey = chainKeyOf(identity);
    const vmTypeHash = this.chainTypes.get(chainKey);
    if (vmTypeHash === undefined)
      throw new AccountError("ChainTypeNotRegistered", `${chainKey} is not registered`);
    const impl = this.implementations.get(vmTypeHash);
    if (!impl)
      throw new AccountError("ImplementationNotRegistered", `no implementation for ${chainKey}`);
    return impl;
  }

  /* ── factory ── */
  deriveAddress(identity: Identity): Address {
    const id = parseIdentity(identity);
    const impl = this.implementationOf(id);
    return counterfactualAddress(this.address, identitySalt(id), codeHash(impl.name));
  }

  deploy(identity: Identity): Address {
    const id = parseIdentity(identity);
    const impl = this.implementationOf(id);
    const address = this.deriveAddress(id);
    if (this.accounts.has(address)) return address;
    if (this.ledger.contractAt(address))
      throw new AccountError("AccountAlreadyExists", `foreign code occupies ${address}`);

    const account = new Account({
      address,
      implementation: impl,
      ledger: this.ledger,
      protocolVersion: this.version,
      logger: this.log,
    });
    this.ledger.transact(() => {
      this.ledger.install(address, account);
      account.initialize(id);
      this.ledger.emit(this.address, {
        name: "AccountDeployed",
        args: { account: address, chainKey: chainKeyOf(id), owner: id.owner },
      });
    });
    this.accounts.set(address, account);
    this.log.info({ account: address, chainKey: chainKeyOf(id), implementation: impl.name }, "account deployed");
    return address;
  }

  getAccount(address: Address): Account | undefined {
    return this.accounts.get(normalizeHex(address));
  }

  accountOf(identity: Identity): Account | undefined {
    return this.getAccount(this.deriveAddress(identity));
  }
}
