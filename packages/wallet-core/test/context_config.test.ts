import { describe, expect, it } from "vitest";
import {
  ConsoleLogger,
  ed25519KeyPairs,
  InvalidArgumentError,
  MAINNET,
  NullLogger,
  PrivateKey,
  TESTNET,
} from "@harvestkit/sdk";
import { WalletAccount } from "../src/account.js";
import { createWalletAccountContext } from "../src/context.js";

describe("createWalletAccountContext", () => {
  it("picks the network from the environment", () => {
    expect(createWalletAccountContext({}, {}).network).toBe(TESTNET);
    expect(createWalletAccountContext({}, { HARVESTKIT_NETWORK: "mainnet" }).network).toBe(MAINNET);
  });

  it("derives addresses on the configured network", () => {
    const ctx = createWalletAccountContext({}, { HARVESTKIT_NETWORK: "mainnet" });
    const account = WalletAccount.fromKey(new PrivateKey(0x1234n), undefined, ctx);
    expect(account.network).toBe(MAINNET);
    expect(account.toString()).toMatch(/^N/);
  });

  it("prefers an explicit network over the environment", () => {
    const ctx = createWalletAccountContext({ network: TESTNET }, { HARVESTKIT_NETWORK: "mainnet" });
    expect(ctx.network).toBe(TESTNET);
  });

  it("rejects an unknown network name", () => {
    expect(() => createWalletAccountContext({}, { HARVESTKIT_NETWORK: "devnet" })).toThrow(InvalidArgumentError);
  });

  it("builds a scoped console logger from the log level", () => {
    const ctx = createWalletAccountContext({}, { HARVESTKIT_LOG_LEVEL: "warn" });
    expect(ctx.logger).toBeInstanceOf(ConsoleLogger);
    expect(ctx.logger).toMatchObject({ prefix: "harvestkit module=wallet-account", level: "warn" });
    expect(createWalletAccountContext({}, {}).logger).toBeInstanceOf(NullLogger);
  });

  it("keeps supplied collaborators", () => {
    const logger = new NullLogger();
    const ctx = createWalletAccountContext({ logger, keyPairs: ed25519KeyPairs }, {});
    expect(ctx.logger).toBe(logger);
    expect(ctx.keyPairs).toBe(ed25519KeyPairs);
  });
});
