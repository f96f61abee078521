/* ------------------------------------------------------------------
   Shared fixtures for envelope tests
   ------------------------------------------------------------------ */
import type { ByteWriter, PayloadCodec } from '../src/types/index.js';

/** Hand-assembled header: version field, headerSize, dataSize, then `extra`. */
export function rawHeader(
  version: string,
  headerSize: number,
  dataSize: number,
  extra: Uint8Array = new Uint8Array(0),
  maxLen = 16,
): Uint8Array {
  const out  = new Uint8Array(maxLen + 16 + extra.length);
  const view = new DataView(out.buffer);
  for (let i = 0; i < version.length; i++) out[i] = version.charCodeAt(i);
  view.setBigUint64(maxLen,     BigInt(headerSize), true);
  view.setBigUint64(maxLen + 8, BigInt(dataSize),   true);
  out.set(extra, maxLen + 16);
  return out;
}

export function join(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let off = 0;
  for (const p of parts) { out.set(p, off); off += p.length; }
  return out;
}

/** version "1.0.0", MAXLEN 16, payload 01 02 03: 35 bytes in total. */
export const SAMPLE_PAYLOAD = new Uint8Array([0x01, 0x02, 0x03]);
export const SAMPLE_ENVELOPE = join(rawHeader('1.0.0', 32, 3), SAMPLE_PAYLOAD);

/** Accepts the first `okWrites` writes, then reports zero bytes written. */
export class FlakyWriter implements ByteWriter {
  readonly accepted: Uint8Array[] = [];
  constructor(private okWrites: number) {}
  async write(bytes: Uint8Array): Promise<number> {
    if (this.okWrites-- <= 0) return 0;
    this.accepted.push(bytes.slice());
    return bytes.length;
  }
}

/** Codec whose encode always fails; used to prove nothing reaches the sink. */
export const brokenCodec: PayloadCodec<string> = {
  name: 'broken',
  encode() { throw new Error('encoder exploded'); },
  decode() { throw new Error('decoder exploded'); },
  encodedSize: () => 0,
};
