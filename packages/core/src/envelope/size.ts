import type { FormatDescriptor, PayloadCodec } from '../types/index.js';
import { headerWidth } from '../header/header.js';

/** Header bytes in front of every payload; does not depend on the payload. */
export function envelopeHeaderSize(format: FormatDescriptor): number {
  return headerWidth(format);
}

/** Bytes `writeEnvelope` would produce for `value`, from the codec's size hook. */
export function envelopeSize<T>(
  value: T,
  codec: PayloadCodec<T>,
  format: FormatDescriptor,
): number {
  return envelopeHeaderSize(format) + codec.encodedSize(value);
}
