import { describe, expect, it } from "vitest";
import { Address, networkAddressDeriver } from "../src/address.js";
import { ed25519KeyPairs, PrivateKey } from "../src/keys.js";
import { MAINNET, networkForAddress, TESTNET } from "../src/network.js";

const publicKey = ed25519KeyPairs.fromPrivateKey(new PrivateKey(0x1234n)).publicKey;

describe("Address", () => {
  it("encodes 40 base32 characters led by the network version", () => {
    const testnet = Address.fromPublicKey(TESTNET.addressVersion, publicKey);
    expect(testnet.toString()).toHaveLength(40);
    expect(testnet.toString()).toMatch(/^T[A-Z2-7]{39}$/);
    expect(testnet.version()).toBe(0x98);
    expect(testnet.isValid()).toBe(true);

    const mainnet = Address.fromPublicKey(MAINNET.addressVersion, publicKey);
    expect(mainnet.toString()).toMatch(/^N[A-Z2-7]{39}$/);
    expect(mainnet.version()).toBe(0x68);
  });

  it("is deterministic", () => {
    const a = Address.fromPublicKey(0x98, publicKey);
    const b = Address.fromPublicKey(0x98, publicKey);
    expect(a.equals(b)).toBe(true);
    expect(a.hashCode()).toBe(b.hashCode());
  });

  it("detects a corrupted checksum", () => {
    const encoded = Address.fromPublicKey(0x98, publicKey).toString();
    const last = encoded.endsWith("A") ? "B" : "A";
    expect(Address.fromEncoded(encoded.slice(0, -1) + last).isValid()).toBe(false);
  });

  it("normalizes encoded text without validating it", () => {
    const a = Address.fromEncoded(" tabc ");
    expect(a.toString()).toBe("TABC");
    expect(a.isValid()).toBe(false);
    expect(a.version()).toBeUndefined();
  });

  it("parses its own encoding", () => {
    const a = Address.fromPublicKey(0x68, publicKey);
    expect(Address.fromEncoded(a.toString().toLowerCase()).equals(a)).toBe(true);
  });

  it("hashes the encoded string", () => {
    expect(Address.fromEncoded("AB").hashCode()).toBe(65 * 31 + 66);
  });
});

describe("networkAddressDeriver", () => {
  it("uses the network's version byte", () => {
    const address = networkAddressDeriver(MAINNET).derive(publicKey);
    expect(address.equals(Address.fromPublicKey(0x68, publicKey))).toBe(true);
    expect(networkForAddress(address)).toBe(MAINNET);
    expect(networkForAddress(networkAddressDeriver(TESTNET).derive(publicKey))).toBe(TESTNET);
    expect(networkForAddress(Address.fromEncoded("NOPE"))).toBeUndefined();
  });
});
