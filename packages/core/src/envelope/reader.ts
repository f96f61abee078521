// packages/core/src/envelope/reader.ts
import type {
  ByteReader,
  EnvelopeHeader,
  FormatDescriptor,
  PayloadCodec,
  RandomAccessSource,
} from '../types/index.js';
import { decodeHeader } from '../header/decoder.js';
import { readFull } from '../io/full.js';
import { SectionReader } from '../io/SectionReader.js';
import { MAX_MARSHALLED_SIZE } from '../header/constants.js';
import {
  EndOfStreamError,
  InvalidHeaderError,
  UnexpectedEndOfStreamError,
} from '../errors/index.js';

export interface ReadAtResult<T> {
  value        : T;
  /** Header plus payload bytes; add it to the offset to reach the next envelope. */
  bytesConsumed: number;
}

export interface InspectResult {
  header: EnvelopeHeader;
  offset: number;
  /** Offset right after this envelope's payload. */
  next  : number;
}

/**
 * Payload bytes of the next envelope, undecoded.
 * @param budget given the decoded header, how many bytes the reader can
 * still deliver; a larger `dataSize` fails before anything is allocated
 */
export async function readPayload(
  reader: ByteReader,
  format: FormatDescriptor,
  budget?: (header: EnvelopeHeader) => number,
): Promise<{ header: EnvelopeHeader; payload: Uint8Array }> {
  const header = await decodeHeader(reader, format);
  if (budget) {
    const room = budget(header);
    if (header.dataSize > room) {
      throw new UnexpectedEndOfStreamError(
        `Payload needs ${header.dataSize} bytes, ${Math.max(room, 0)} available`,
      );
    }
  }
  const payload = await readFull(reader, allocate(header.dataSize), { what: 'payload' });
  return { header, payload };
}

function allocate(size: number): Uint8Array {
  try {
    return new Uint8Array(size);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new InvalidHeaderError(`dataSize ${size} cannot be buffered`);
    }
    throw err;
  }
}

/**
 * Read one envelope and decode its payload. A stream that is already at
 * its end rejects with `EndOfStreamError`; one that ends inside the
 * envelope rejects with `UnexpectedEndOfStreamError`.
 */
export async function readEnvelope<T>(
  reader: ByteReader,
  codec: PayloadCodec<T>,
  format: FormatDescriptor,
): Promise<T> {
  const { payload } = await readPayload(reader, format);
  return codec.decode(payload);
}

/**
 * Read the envelope starting at `offset`. The view handed to the sequential
 * reader ends `MAX_MARSHALLED_SIZE` bytes past `offset` at most.
 */
export async function readEnvelopeAt<T>(
  source: RandomAccessSource,
  offset: number,
  codec: PayloadCodec<T>,
  format: FormatDescriptor,
): Promise<ReadAtResult<T>> {
  const section = new SectionReader(source, offset, MAX_MARSHALLED_SIZE);
  const window  = Math.min(MAX_MARSHALLED_SIZE, source.length - offset);
  const { payload } = await readPayload(section, format, () => window - section.position);
  const value = codec.decode(payload);
  return { value, bytesConsumed: section.position };
}

/** Every envelope on a sequential stream, until a clean end of stream. */
export async function* readEnvelopes<T>(
  reader: ByteReader,
  codec: PayloadCodec<T>,
  format: FormatDescriptor,
): AsyncGenerator<T, void, undefined> {
  while (true) {
    let value: T;
    try {
      value = await readEnvelope(reader, codec, format);
    } catch (err) {
      if (err instanceof EndOfStreamError) return;
      throw err;
    }
    yield value;
  }
}

/** Header at `offset`, with the payload skipped rather than read. */
export async function inspectAt(
  source: RandomAccessSource,
  offset: number,
  format: FormatDescriptor,
): Promise<InspectResult> {
  const section = new SectionReader(source, offset, MAX_MARSHALLED_SIZE);
  const header  = await decodeHeader(section, format);
  const next    = offset + header.headerSize + header.dataSize;
  if (next > source.length) {
    throw new UnexpectedEndOfStreamError(
      `Payload at ${offset + header.headerSize} needs ${header.dataSize} bytes, ` +
      `source ends at ${source.length}`,
    );
  }
  return { header, offset, next };
}
