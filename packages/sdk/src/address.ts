import { base32 } from "@scure/base";
import { ripemd160 } from "@noble/hashes/legacy.js";
import { keccak_256 } from "@noble/hashes/sha3.js";
import { concatBytes } from "./hex.js";
import type { PublicKey } from "./keys.js";
import type { NetworkConfig } from "./network.js";

const ADDRESS_BYTES = 25;
const ADDRESS_CHARS = 40;
const CHECKSUM_BYTES = 4;

function u8(v: number): Uint8Array {
  if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new RangeError("address version must be u8");
  return Uint8Array.of(v);
}

function checksum(versionedHash: Uint8Array): Uint8Array {
  return keccak_256(versionedHash).slice(0, CHECKSUM_BYTES);
}

function decode(encoded: string): Uint8Array | undefined {
  if (encoded.length !== ADDRESS_CHARS) return undefined;
  try {
    const bytes = base32.decode(encoded);
    return bytes.length === ADDRESS_BYTES ? bytes : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Base32 account address: `version ‖ ripemd160(keccak256(pub)) ‖ checksum`.
 */
export class Address {
  private constructor(public readonly encoded: string) {}

  static fromPublicKey(version: number, publicKey: PublicKey): Address {
    const hash = ripemd160(keccak_256(publicKey.getBytes()));
    const versioned = concatBytes(u8(version), hash);
    return new Address(base32.encode(concatBytes(versioned, checksum(versioned))));
  }

  /** Wraps an encoded address without validating it; see {@link Address.isValid}. */
  static fromEncoded(text: string): Address {
    return new Address(text.trim().toUpperCase());
  }

  isValid(): boolean {
    const bytes = decode(this.encoded);
    if (!bytes) return false;
    const versioned = bytes.slice(0, ADDRESS_BYTES - CHECKSUM_BYTES);
    const expected = checksum(versioned);
    return expected.every((b, i) => b === bytes[ADDRESS_BYTES - CHECKSUM_BYTES + i]);
  }

  version(): number | undefined {
    return decode(this.encoded)?.[0];
  }

  equals(other: Address): boolean {
    return this.encoded === other.encoded;
  }

  hashCode(): number {
    let h = 0;
    for (let i = 0; i < this.encoded.length; i++) {
      h = (Math.imul(h, 31) + this.encoded.charCodeAt(i)) | 0;
    }
    return h;
  }

  toString(): string {
    return this.encoded;
  }
}

export interface AddressDeriver {
  derive(publicKey: PublicKey): Address;
}

export function networkAddressDeriver(network: NetworkConfig): AddressDeriver {
  return {
    derive: (publicKey) => Address.fromPublicKey(network.addressVersion, publicKey),
  };
}
