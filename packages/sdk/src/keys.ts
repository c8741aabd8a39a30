import { ed25519 } from "@noble/curves/ed25519.js";
import { keccak_512 } from "@noble/hashes/sha3.js";
import { randomBytes } from "@noble/hashes/utils.js";
import { InvalidArgumentError } from "./errors.js";
import {
  bigintToHex,
  bigIntTo32Le,
  bytesToHex,
  hexToBigint,
  hexToBytes,
  isHexString,
  leBytesToBigInt,
  type HexString,
} from "./hex.js";

const ORDER = ed25519.Point.Fn.ORDER;

/**
 * Secret scalar backing an account. Any bigint is accepted; key derivation
 * reads it modulo 2^256.
 */
export class PrivateKey {
  constructor(public readonly raw: bigint) {}

  static fromHexString(text: string): PrivateKey {
    try {
      return new PrivateKey(hexToBigint(text.trim()));
    } catch (e) {
      throw new InvalidArgumentError(`Invalid private key hex: ${JSON.stringify(text)}`, e);
    }
  }

  static fromDecimalString(text: string): PrivateKey {
    if (!/^-?\d+$/.test(text.trim())) {
      throw new InvalidArgumentError(`Invalid private key decimal: ${JSON.stringify(text)}`);
    }
    return new PrivateKey(BigInt(text.trim()));
  }

  static fromBytes(bytes: Uint8Array): PrivateKey {
    return new PrivateKey(leBytesToBigInt(bytes));
  }

  toBytes(): Uint8Array {
    return bigIntTo32Le(this.raw);
  }

  equals(other: PrivateKey): boolean {
    return this.raw === other.raw;
  }

  toString(): string {
    return bigintToHex(this.raw);
  }
}

export class PublicKey {
  private readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.bytes = new Uint8Array(bytes);
  }

  static fromHexString(text: string): PublicKey {
    if (!isHexString(text)) throw new InvalidArgumentError(`Invalid public key hex: ${JSON.stringify(text)}`);
    return new PublicKey(hexToBytes(text));
  }

  getBytes(): Uint8Array {
    return new Uint8Array(this.bytes);
  }

  equals(other: PublicKey): boolean {
    if (this.bytes.length !== other.bytes.length) return false;
    return this.bytes.every((b, i) => b === other.bytes[i]);
  }

  toHex(): HexString {
    return bytesToHex(this.bytes);
  }

  toString(): string {
    return this.toHex();
  }
}

export class KeyPair {
  constructor(
    public readonly privateKey: PrivateKey,
    public readonly publicKey: PublicKey,
  ) {}
}

export interface KeyPairProvider {
  generate(): KeyPair;
  fromPrivateKey(privateKey: PrivateKey): KeyPair;
}

function privateKeyToScalar(privateKey: PrivateKey): bigint {
  const h = keccak_512(privateKey.toBytes()).slice(0, 32);
  h[0] = h[0]! & 248;
  h[31] = (h[31]! & 127) | 64;
  return leBytesToBigInt(h) % ORDER;
}

export function publicKeyFromPrivateKey(privateKey: PrivateKey): PublicKey {
  const P = ed25519.Point.BASE.multiply(privateKeyToScalar(privateKey));
  return new PublicKey(P.toBytes());
}

/** Ed25519 over keccak-512 key expansion. */
export const ed25519KeyPairs: KeyPairProvider = {
  generate(): KeyPair {
    const privateKey = PrivateKey.fromBytes(randomBytes(32));
    return new KeyPair(privateKey, publicKeyFromPrivateKey(privateKey));
  },
  fromPrivateKey(privateKey: PrivateKey): KeyPair {
    return new KeyPair(privateKey, publicKeyFromPrivateKey(privateKey));
  },
};
