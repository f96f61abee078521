// packages/core/src/envelope/writer.ts
import type {
  ByteWriter,
  FormatDescriptor,
  PayloadCodec,
  RandomAccessSink,
} from '../types/index.js';
import { createHeader } from '../header/header.js';
import { encodeHeader } from '../header/encoder.js';
import { writeFull, writeFullAt } from '../io/full.js';

export interface PreparedEnvelope {
  header : Uint8Array;
  payload: Uint8Array;
}

/**
 * Encode the payload, then the header for it. Nothing touches a sink here,
 * so a codec failure leaves the sink as it was.
 */
export function prepareEnvelope<T>(
  value: T,
  codec: PayloadCodec<T>,
  format: FormatDescriptor,
): PreparedEnvelope {
  const payload = codec.encode(value);
  const header  = encodeHeader(createHeader(payload.byteLength, format), format);
  return { header, payload };
}

/**
 * Write header then payload. Resolves the total bytes written.
 *
 * Not atomic: if the payload write fails after the header went out, the
 * sink keeps a header announcing bytes that never follow.
 */
export async function writeEnvelope<T>(
  sink: ByteWriter,
  value: T,
  codec: PayloadCodec<T>,
  format: FormatDescriptor,
): Promise<number> {
  const { header, payload } = prepareEnvelope(value, codec, format);
  const nHeader = await writeFull(sink, header, 'header');
  const nData   = await writeFull(sink, payload, 'payload');
  return nHeader + nData;
}

/** {@link writeEnvelope} at an explicit offset of a random-access sink. */
export async function writeEnvelopeAt<T>(
  sink: RandomAccessSink,
  offset: number,
  value: T,
  codec: PayloadCodec<T>,
  format: FormatDescriptor,
): Promise<number> {
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new RangeError(`Invalid write offset: ${offset}`);
  }
  const { header, payload } = prepareEnvelope(value, codec, format);
  const nHeader = await writeFullAt(sink, offset, header, 'header');
  const nData   = await writeFullAt(sink, offset + nHeader, payload, 'payload');
  return nHeader + nData;
}
