// packages/core/src/header/encoder.ts
import type { EnvelopeHeader, FormatDescriptor } from '../types/index.js';
import { OverflowError } from '../errors/index.js';
import { headerWidth } from './header.js';
import { encodeVersionTag } from './versionTag.js';
import { U64_BYTES } from './constants.js';

/**
 * Serialize the fields this software knows, nothing more. The whole header
 * is built in memory before a caller hands any of it to a sink.
 */
export function encodeHeader(
  header: EnvelopeHeader,
  format: FormatDescriptor,
): Uint8Array {
  const max = format.maxVersionLength;
  const out = new Uint8Array(headerWidth(format));
  const view = new DataView(out.buffer);

  encodeVersionTag(header.version, out.subarray(0, max));
  view.setBigUint64(max,             toU64(header.headerSize, 'headerSize'), true);
  view.setBigUint64(max + U64_BYTES, toU64(header.dataSize,   'dataSize'),   true);

  return out;
}

function toU64(n: number, field: string): bigint {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new OverflowError(`${field} must be a non-negative safe integer, got ${n}`);
  }
  return BigInt(n);
}
