import { MalformedDataError } from "./errors.js";

export type HexString = `0x${string}`;

export function hexToBytes(hex: HexString): Uint8Array {
  const h = hex.slice(2);
  if (h.length % 2 !== 0) throw new MalformedDataError("Invalid hex length");
  if (!isHexString(hex)) throw new MalformedDataError("Invalid hex");
  const out = new Uint8Array(h.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = Number.parseInt(h.slice(i * 2, i * 2 + 2), 16);
  return out;
}

export function bytesToHex(bytes: Uint8Array): HexString {
  let s = "0x";
  for (const b of bytes) s += b.toString(16).padStart(2, "0");
  return s as HexString;
}

export function isHexString(text: string): text is HexString {
  return /^0x([0-9a-fA-F]{2})*$/.test(text);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const len = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(len);
  let off = 0;
  for (const p of parts) {
    out.set(p, off);
    off += p.length;
  }
  return out;
}

/** Signed, even-length hex: `0x0abc`, `-0x01`, `0x00`. */
export function bigintToHex(value: bigint): string {
  const negative = value < 0n;
  let h = (negative ? -value : value).toString(16);
  if (h.length % 2 !== 0) h = "0" + h;
  return `${negative ? "-" : ""}0x${h}`;
}

export function hexToBigint(text: string): bigint {
  const m = /^(-?)0x([0-9a-fA-F]+)$/.exec(text);
  if (!m) throw new MalformedDataError(`Invalid hex integer: ${JSON.stringify(text)}`);
  const magnitude = BigInt(`0x${m[2]}`);
  return m[1] === "-" ? -magnitude : magnitude;
}

export function bigIntTo32Le(x: bigint): Uint8Array {
  const out = new Uint8Array(32);
  let v = x;
  for (let i = 0; i < 32; i++) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

export function leBytesToBigInt(bytes: Uint8Array): bigint {
  let x = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) x = (x << 8n) + BigInt(bytes[i]!);
  return x;
}
