import type { PayloadCodec } from '../types/index.js';

/** Payload bytes pass through untouched (copied on both sides). */
export const rawCodec: PayloadCodec<Uint8Array> = {
  name: 'raw',
  encode: bytes => bytes.slice(),
  decode: bytes => bytes.slice(),
  encodedSize: bytes => bytes.byteLength,
};
