import { registerDefaults } from "../chains";
import { loadConfig, type Config } from "../config";
import { CurveVerificationOracle, ObservedTxIndex, type NativeTxObservation } from "../crypto/oracle";
import { AccountError } from "../errors";
import { makeLogger, type ILogger } from "../logging";
import type { Account } from "./account";
import { HostLedger } from "./ledger";
import { AccountFactory } from "./registry";
import type { Address, Big, Hex, Identity, Payload, Proof } from "./types";

export type RuntimeOptions = {
  config?: Config;
  clock?: () => Big;
  logger?: ILogger;
};

/* ──────────── runtime shell ──────────── */
export class Runtime {
  readonly ledger: HostLedger;
  readonly factory: AccountFactory;
  readonly observed = new ObservedTxIndex();
  private readonly log: ILogger;

  constructor(opts: RuntimeOptions = {}) {
    const config = opts.config ?? loadConfig();
    this.log = opts.logger ?? makeLogger(config.logLevel, config.logPretty);
    this.ledger = new HostLedger({ clock: opts.clock });
    this.factory = new AccountFactory({
      ledger: this.ledger,
      address: config.factoryAddress,
      protocolVersion: config.protocolVersion,
      logger: this.log,
    });
    registerDefaults(this.factory, {
      solana: new CurveVerificationOracle("ed25519", this.observed),
      cosmos: new CurveVerificationOracle("secp256k1", this.observed),
    });
  }

  /* relay of a source-chain transaction that committed to a payload hash */
  observe(obs: NativeTxObservation): void {
    this.log.debug({ txHash: obs.txHash, chainId: obs.chainId }, "native tx observed");
    this.observed.record(obs);
  }

  deploy(identity: Identity): Account {
    const address = this.factory.deploy(identity);
    return this.account(address);
  }

  account(address: Address): Account {
    const acct = this.factory.getAccount(address);
    if (!acct) throw new AccountError("AccountNotInitialized", `no account at ${address}`);
    return acct;
  }

  /* counterfactual: deploys on first use */
  execute(identity: Identity, payload: Payload, proof: Proof): Hex {
    return this.deploy(identity).executePayload(payload, proof);
  }

  fund(address: Address, amount: Big): void {
    this.ledger.deposit(address, amount);
  }
}
