import { vi, type Mock } from "vitest";
import { ed25519 } from "@noble/curves/ed25519";
import { secp256k1 } from "@noble/curves/secp256k1";
import { solanaAccount } from "../../src/chains";
import { Account } from "../../src/core/account";
import { HostLedger } from "../../src/core/ledger";
import type { VerificationOracle } from "../../src/core/oracle";
import { AccountFactory } from "../../src/core/registry";
import { VerificationType, type Hex, type Identity, type Payload } from "../../src/core/types";
import { silentLogger } from "../../src/logging";
import { bytesToHex, fromHex } from "../../src/utils/bytes";
import { COUNTER, Counter, setCount } from "./contracts";

export const T0 = 1_700_000_000n;
export const OWNER: Hex = `0x${"11".repeat(32)}`;

export const mkClock = (start: bigint = T0) => {
  let t = start;
  return {
    now: () => t,
    set: (v: bigint) => {
      t = v;
    },
  };
};

export const mkIdentity = (over: Partial<Identity> = {}): Identity => ({
  chainNamespace: "solana",
  chainId: "101",
  owner: OWNER,
  ...over,
});

export const mkPayload = (over: Partial<Payload> = {}): Payload => ({
  to: COUNTER,
  value: 0n,
  data: setCount(42n),
  gasLimit: 100_000n,
  maxFeePerGas: 30_000_000_000n,
  maxPriorityFeePerGas: 1_000_000_000n,
  nonce: 0n,
  deadline: T0 + 3_600n,
  verificationType: VerificationType.SignatureBased,
  ...over,
});

export type StubOracle = {
  verifySignature: Mock<[Hex, Hex, Hex], boolean>;
  verifyNativeTxHash: Mock<[string, string, Hex, Hex, Hex], boolean>;
};

export const stubOracle = (verdict = true): StubOracle => ({
  verifySignature: vi.fn<[Hex, Hex, Hex], boolean>(() => verdict),
  verifyNativeTxHash: vi.fn<[string, string, Hex, Hex, Hex], boolean>(() => verdict),
});

/* uninitialized account on a ledger with a Counter at COUNTER */
export const mkAccount = (oracle: VerificationOracle = stubOracle()) => {
  const clock = mkClock();
  const ledger = new HostLedger({ clock: clock.now });
  ledger.install(COUNTER, new Counter());
  const account = new Account({
    address: `0x${"ac".repeat(20)}`,
    implementation: solanaAccount(oracle),
    ledger,
    logger: silentLogger(),
  });
  ledger.install(account.address, account);
  return { clock, ledger, account };
};

export const mkFactory = (ledger: HostLedger) =>
  new AccountFactory({ ledger, logger: silentLogger() });

export const counterValue = (ledger: HostLedger) => ledger.storageAt(COUNTER).get("count");

/* ── real keys ── */
export const ed25519Signer = () => {
  const priv = ed25519.utils.randomPrivateKey();
  return {
    owner: bytesToHex(ed25519.getPublicKey(priv)),
    sign: (hash: Hex): Hex => bytesToHex(ed25519.sign(fromHex(hash), priv)),
  };
};

export const secp256k1Signer = () => {
  const priv = secp256k1.utils.randomPrivateKey();
  return {
    owner: bytesToHex(secp256k1.getPublicKey(priv)),
    sign: (hash: Hex): Hex => bytesToHex(secp256k1.sign(fromHex(hash), priv).toCompactRawBytes()),
  };
};

/* returns whatever `fn` throws */
export const caught = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
};
