import { fromHex, normalizeHex } from "../utils/bytes";
import type {
  Address,
  Big,
  CallRequest,
  CallResult,
  Hex,
  LedgerEvent,
  LogEntry,
} from "./types";

/* ── gas ─────────────────────────────────────────────────── */
export const GAS_STORAGE_WRITE = 20_000n;
export const GAS_TRANSFER_STIPEND = 2_300n;

/** A contract stopped the call; `reason` is surfaced to the caller as-is. */
export class Revert extends Error {
  readonly reason?: string;

  constructor(reason?: string) {
    super(reason ?? "reverted without reason");
    this.name = "Revert";
    this.reason = reason;
  }
}

export class OutOfGas extends Error {
  constructor(limit: Big) {
    super(`out of gas (limit ${limit})`);
    this.name = "OutOfGas";
  }
}

export class GasMeter {
  private spent = 0n;

  constructor(readonly limit: Big) {}

  get used(): Big {
    return this.spent;
  }

  consume(amount: Big): void {
    this.spent += amount;
    if (this.spent > this.limit) {
      this.spent = this.limit;
      throw new OutOfGas(this.limit);
    }
  }
}

/* ── contracts ───────────────────────────────────────────── */
export interface ContractStorage {
  get(slot: string): Big;
  set(slot: string, value: Big): void;
}

export type CallContext = {
  self: Address;
  caller: Address;
  value: Big;
  data: Uint8Array;
  storage: ContractStorage; // writes are metered
  gas: GasMeter;
  ledger: HostLedger;
};

export interface HostContract {
  /** accepts plain value transfers with empty call data */
  readonly payable: boolean;
  /** throws Revert to fail the call with a reason; any other throw fails it without one */
  invoke(ctx: CallContext): Hex;
}

type Snapshot = {
  balances: Map<Address, Big>;
  storage: Map<Address, Map<string, Big>>;
  contracts: Map<Address, HostContract>;
  events: number;
};

export type LedgerOptions = {
  clock?: () => Big; // unix seconds
};

const systemClock = (): Big => BigInt(Math.floor(Date.now() / 1000));

/**
 * In-process stand-in for the host chain: balances, contract storage,
 * an event log and a clock. Every mutation goes through a journal so a
 * failed unit leaves no trace.
 */
export class HostLedger {
  private balances = new Map<Address, Big>();
  private storage = new Map<Address, Map<string, Big>>();
  private contracts = new Map<Address, HostContract>();
  private events: LogEntry[] = [];
  private readonly clock: () => Big;

  constructor(opts: LedgerOptions = {}) {
    this.clock = opts.clock ?? systemClock;
  }

  now(): Big {
    return this.clock();
  }

  /* ── accounts & code ── */
  balanceOf(address: Address): Big {
    return this.balances.get(normalizeHex(address)) ?? 0n;
  }

  /** mints `amount` to `address`; setup only, never reached by calls */
  deposit(address: Address, amount: Big): void {
    if (amount < 0n) throw new RangeError("negative deposit");
    const a = normalizeHex(address);
    this.balances.set(a, this.balanceOf(a) + amount);
  }

  install(address: Address, contract: HostContract): void {
    const a = normalizeHex(address);
    if (this.contracts.has(a)) throw new Error(`code already installed at ${a}`);
    this.contracts.set(a, contract);
  }

  contractAt(address: Address): HostContract | undefined {
    return this.contracts.get(normalizeHex(address));
  }

  /** unmetered storage, for a contract's own host-side bookkeeping */
  storageAt(address: Address): ContractStorage {
    const a = normalizeHex(address);
    // resolved per access: a rollback swaps the underlying maps
    return {
      get: (slot) => this.slotsOf(a).get(slot) ?? 0n,
      set: (slot, value) => void this.slotsOf(a).set(slot, value),
    };
  }

  /* ── events ── */
  emit(emitter: Address, event: LedgerEvent): void {
    this.events.push({ ...event, emitter: normalizeHex(emitter), index: this.events.length });
  }

  logs(): readonly LogEntry[] {
    return [...this.events];
  }

  /* ── atomic units ── */
  transact<T>(fn: () => T): T {
    const snap = this.snapshot();
    try {
      return fn();
    } catch (err) {
      this.restore(snap);
      throw err;
    }
  }

  /** value-only call with the transfer stipend */
  transfer(from: Address, to: Address, value: Big): CallResult {
    return this.call({ from, to, value, data: "0x", gasLimit: GAS_TRANSFER_STIPEND });
  }

  /* anything the target throws fails the call; only a Revert carries a reason */
  call(req: CallRequest): CallResult {
    if (req.value < 0n) throw new RangeError("negative call value");
    const gas = new GasMeter(req.gasLimit);
    const snap = this.snapshot();
    try {
      return { ok: true, returnData: this.run(req, gas), gasUsed: gas.used };
    } catch (err) {
      this.restore(snap);
      if (err instanceof Revert) return { ok: false, reason: err.reason, gasUsed: gas.used };
      return { ok: false, gasUsed: gas.used };
    }
  }

  private run(req: CallRequest, gas: GasMeter): Hex {
    const from = normalizeHex(req.from);
    const to = normalizeHex(req.to);
    const available = this.balanceOf(from);
    if (available < req.value) throw new Revert();
    this.balances.set(from, available - req.value);
    this.balances.set(to, this.balanceOf(to) + req.value);

    const contract = this.contracts.get(to);
    if (!contract) return "0x";

    const data = fromHex(req.data);
    if (data.length === 0) {
      if (!contract.payable) throw new Revert();
      return "0x";
    }

    return contract.invoke({
      self: to,
      caller: from,
      value: req.value,
      data,
      gas,
      ledger: this,
      storage: {
        get: (slot) => this.slotsOf(to).get(slot) ?? 0n,
        set: (slot, value) => {
          gas.consume(GAS_STORAGE_WRITE);
          this.slotsOf(to).set(slot, value);
        },
      },
    });
  }

  private slotsOf(address: Address): Map<string, Big> {
    let slots = this.storage.get(address);
    if (!slots) {
      slots = new Map();
      this.storage.set(address, slots);
    }
    return slots;
  }

  private snapshot(): Snapshot {
    return {
      balances: new Map(this.balances),
      storage: new Map(
        [...this.storage].map(([a, slots]): [Address, Map<string, Big>] => [a, new Map(slots)]),
      ),
      contracts: new Map(this.contracts),
      events: this.events.length,
    };
  }

  private restore(s: Snapshot): void {
    this.balances = s.balances;
    this.storage = s.storage;
    this.contracts = s.contracts;
    this.events = this.events.slice(0, s.events);
  }
}
