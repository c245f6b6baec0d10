import { describe, it, expect } from "vitest";
import type { Config } from "../src/config";
import { Runtime } from "../src/core/runtime";
import { VerificationType, type Identity } from "../src/core/types";
import { InvalidSignatureError } from "../src/errors";
import { silentLogger } from "../src/logging";
import { ZERO_ADDRESS } from "../src/utils/bytes";
import { COUNTER, Counter, RECIPIENT, boom, fail, setCount } from "./helpers/contracts";
import {
  T0,
  caught,
  counterValue,
  ed25519Signer,
  mkClock,
  mkPayload,
  secp256k1Signer,
} from "./helpers/fixtures";

const config: Config = {
  protocolVersion: "1",
  logLevel: "silent",
  logPretty: false,
  factoryAddress: ZERO_ADDRESS,
};

const setup = () => {
  const clock = mkClock();
  const rt = new Runtime({ config, clock: clock.now, logger: silentLogger() });
  rt.ledger.install(COUNTER, new Counter());
  const signer = ed25519Signer();
  const identity: Identity = { chainNamespace: "solana", chainId: "101", owner: signer.owner };
  const account = rt.deploy(identity);
  return { rt, clock, signer, identity, account };
};

describe("Solana identity, signature path", () => {
  it("executes a signed counter update", () => {
    const { rt, signer, account } = setup();
    const payload = mkPayload({ data: setCount(7n) });
    const sig = signer.sign(account.computePayloadHash(payload));

    account.executePayload(payload, sig);

    expect(counterValue(rt.ledger)).toBe(7n);
    expect(account.nonce()).toBe(1n);
    expect(rt.ledger.logs().at(-1)).toEqual({
      name: "PayloadExecuted",
      emitter: account.address,
      index: 1,
      args: { owner: signer.owner, to: COUNTER, data: setCount(7n) },
    });
  });

  it("rejects a replay of the same signed payload", () => {
    const { rt, signer, account } = setup();
    const payload = mkPayload({ data: setCount(7n) });
    const sig = signer.sign(account.computePayloadHash(payload));
    account.executePayload(payload, sig);

    const err = caught(() => account.executePayload(payload, sig));
    expect(err).toBeInstanceOf(InvalidSignatureError);
    expect(account.nonce()).toBe(1n);
    expect(rt.ledger.logs()).toHaveLength(2);
  });

  it("rejects a signature from another key", () => {
    const { rt, account } = setup();
    const payload = mkPayload();
    const sig = ed25519Signer().sign(account.computePayloadHash(payload));

    expect(caught(() => account.executePayload(payload, sig))).toMatchObject({
      code: "InvalidSignature",
      strategy: "ed25519",
    });
    expect(account.nonce()).toBe(0n);
    expect(counterValue(rt.ledger)).toBe(0n);
  });

  it("rejects a payload whose signed fields were altered", () => {
    const { account, signer } = setup();
    const sig = signer.sign(account.computePayloadHash(mkPayload()));
    expect(caught(() => account.executePayload(mkPayload({ gasLimit: 200_000n }), sig))).toMatchObject({
      code: "InvalidSignature",
    });
  });

  it("surfaces a malformed signature as PrecompileCallFailed", () => {
    const { account } = setup();
    expect(caught(() => account.executePayload(mkPayload(), "0x0102"))).toMatchObject({
      code: "PrecompileCallFailed",
    });
  });

  it("re-raises the target's revert reason and keeps the nonce", () => {
    const { signer, account } = setup();
    const payload = mkPayload({ data: boom() });
    const err = caught(() => account.executePayload(payload, signer.sign(account.computePayloadHash(payload))));
    expect(err).toMatchObject({ code: "ExecutionReverted", message: "boom" });
    expect(account.nonce()).toBe(0n);
  });

  it("reports a silent revert as ExecutionFailed", () => {
    const { signer, account } = setup();
    const payload = mkPayload({ data: fail() });
    const err = caught(() => account.executePayload(payload, signer.sign(account.computePayloadHash(payload))));
    expect(err).toMatchObject({ code: "ExecutionFailed" });
    expect(account.nonce()).toBe(0n);
  });

  it("refuses a payload signed before its deadline lapsed", () => {
    const { clock, signer, account } = setup();
    const payload = mkPayload({ deadline: T0 + 60n });
    const sig = signer.sign(account.computePayloadHash(payload));
    clock.set(T0 + 61n);

    expect(caught(() => account.executePayload(payload, sig))).toMatchObject({ code: "ExpiredDeadline" });
  });
});

describe("Solana identity, native tx path", () => {
  it("executes once the native tx was observed", () => {
    const { rt, identity, account } = setup();
    const payload = mkPayload({ verificationType: VerificationType.TxHashBased, data: setCount(3n) });
    const txHash = `0x${"5a".repeat(32)}` as const;
    rt.observe({ ...identity, txHash, payloadHash: account.computePayloadHash(payload) });

    account.executePayload(payload, txHash);
    expect(counterValue(rt.ledger)).toBe(3n);
    expect(account.nonce()).toBe(1n);
  });

  it("rejects an unobserved tx hash", () => {
    const { account } = setup();
    const payload = mkPayload({ verificationType: VerificationType.TxHashBased });
    expect(caught(() => account.executePayload(payload, `0x${"5a".repeat(32)}`))).toMatchObject({
      code: "InvalidTxHash",
    });
    expect(account.nonce()).toBe(0n);
  });

  it("rejects an empty tx hash", () => {
    const { account } = setup();
    const payload = mkPayload({ verificationType: VerificationType.TxHashBased });
    expect(caught(() => account.executePayload(payload, "0x"))).toMatchObject({ code: "InvalidTxHash" });
  });

  it("does not accept an observation made for another chain", () => {
    const { rt, identity, account } = setup();
    const payload = mkPayload({ verificationType: VerificationType.TxHashBased });
    const txHash = `0x${"5b".repeat(32)}` as const;
    rt.observe({ ...identity, chainId: "102", txHash, payloadHash: account.computePayloadHash(payload) });

    expect(caught(() => account.executePayload(payload, txHash))).toMatchObject({ code: "InvalidTxHash" });
  });
});

describe("Cosmos identity", () => {
  it("executes a secp256k1-signed payload", () => {
    const { rt } = setup();
    const signer = secp256k1Signer();
    const account = rt.deploy({ chainNamespace: "cosmos", chainId: "cosmoshub-4", owner: signer.owner });
    const payload = mkPayload({ data: setCount(11n) });

    account.executePayload(payload, signer.sign(account.computePayloadHash(payload)));
    expect(counterValue(rt.ledger)).toBe(11n);
    expect(account.implementation.name).toBe("CosmosAccount");
  });
});

describe("Counterfactual funding", () => {
  it("keeps funds sent to the derived address before deployment", () => {
    const clock = mkClock();
    const rt = new Runtime({ config, clock: clock.now, logger: silentLogger() });
    const signer = ed25519Signer();
    const identity: Identity = { chainNamespace: "solana", chainId: "101", owner: signer.owner };

    const address = rt.factory.deriveAddress(identity);
    rt.fund(address, 1_000n);

    const account = rt.deploy(identity);
    expect(account.address).toBe(address);
    expect(rt.ledger.balanceOf(address)).toBe(1_000n);

    const payload = mkPayload({ to: RECIPIENT, value: 250n, data: "0x" });
    account.executePayload(payload, signer.sign(account.computePayloadHash(payload)));
    expect(rt.ledger.balanceOf(RECIPIENT)).toBe(250n);
    expect(rt.ledger.balanceOf(address)).toBe(750n);
  });

  it("executes by identity, reusing the deployed account", () => {
    const clock = mkClock();
    const rt = new Runtime({ config, clock: clock.now, logger: silentLogger() });
    rt.ledger.install(COUNTER, new Counter());
    const signer = ed25519Signer();
    const identity: Identity = { chainNamespace: "solana", chainId: "103", owner: signer.owner };
    const payload = mkPayload();

    expect(rt.factory.accountOf(identity)).toBeUndefined();
    const account = rt.deploy(identity);
    rt.execute(identity, payload, signer.sign(account.computePayloadHash(payload)));

    expect(rt.factory.accountOf(identity)).toBe(account);
    expect(counterValue(rt.ledger)).toBe(42n);
    expect(account.nonce()).toBe(1n);
  });
});
