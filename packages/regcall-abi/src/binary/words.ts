import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

/** Width of a VM register word in bytes. */
export const WORD_SIZE = 8;

export const U64_MAX = (1n << 64n) - 1n;

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

/** Encode an unsigned integer as one big-endian word. */
export function encodeWord(value: bigint | number): Uint8Array {
  const v = typeof value === "bigint" ? value : BigInt(value);
  if (v < 0n || v > U64_MAX) {
    throw new RangeError(`word out of range: ${v}`);
  }
  const out = new Uint8Array(WORD_SIZE);
  new DataView(out.buffer).setBigUint64(0, v, false);
  return out;
}

export function decodeWord(buf: Uint8Array, offset: number): { value: bigint; next: number } {
  if (offset < 0 || offset + WORD_SIZE > buf.length) {
    throw new RangeError("word: eof");
  }
  const view = new DataView(buf.buffer, buf.byteOffset + offset, WORD_SIZE);
  return { value: view.getBigUint64(0, false), next: offset + WORD_SIZE };
}

/** Zero bytes needed to round `len` up to a whole number of words. */
export function paddingFor(len: number): number {
  const rem = len % WORD_SIZE;
  return rem === 0 ? 0 : WORD_SIZE - rem;
}

/** Left-pad with zeros (right-align) to `width` bytes. */
export function padStart(bytes: Uint8Array, width: number): Uint8Array {
  if (bytes.length >= width) return bytes;
  const out = new Uint8Array(width);
  out.set(bytes, width - bytes.length);
  return out;
}

/** Right-pad with zeros to `width` bytes. */
export function padEnd(bytes: Uint8Array, width: number): Uint8Array {
  if (bytes.length >= width) return bytes;
  const out = new Uint8Array(width);
  out.set(bytes, 0);
  return out;
}

export function toHex(bytes: Uint8Array): string {
  return `0x${bytesToHex(bytes)}`;
}

export function fromHex(hex: string): Uint8Array {
  const body = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
  return hexToBytes(body);
}
