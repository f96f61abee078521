// packages/core/src/io/full.ts
import type { ByteReader, ByteWriter, RandomAccessSink } from '../types/index.js';
import {
  EndOfStreamError,
  ShortWriteError,
  UnexpectedEndOfStreamError,
} from '../errors/index.js';

export interface ReadFullOptions {
  /**
   * The read starts where an envelope may start. Zero bytes there is a clean
   * end of stream (`EndOfStreamError`) instead of a truncation.
   */
  boundary?: boolean;
  /** Names the field in error messages. */
  what?: string;
}

/**
 * Call `reader.read` until `buf` is full. Resolves `buf` for chaining.
 */
export async function readFull(
  reader: ByteReader,
  buf: Uint8Array,
  opts: ReadFullOptions = {},
): Promise<Uint8Array> {
  const what = opts.what ?? 'data';
  let filled = 0;

  while (filled < buf.length) {
    const n = await reader.read(buf.subarray(filled));
    if (n === 0) {
      if (filled === 0 && opts.boundary) {
        throw new EndOfStreamError(`End of stream before ${what}`);
      }
      throw new UnexpectedEndOfStreamError(
        `Stream ended after ${filled} of ${buf.length} bytes of ${what}`,
      );
    }
    filled += n;
  }
  return buf;
}

export async function writeFull(
  writer: ByteWriter,
  bytes: Uint8Array,
  what = 'data',
): Promise<number> {
  const n = await writer.write(bytes);
  if (n !== bytes.length) {
    throw new ShortWriteError(`Short write of ${what}: ${n} of ${bytes.length} bytes`);
  }
  return n;
}

export async function writeFullAt(
  sink: RandomAccessSink,
  offset: number,
  bytes: Uint8Array,
  what = 'data',
): Promise<number> {
  const n = await sink.write(offset, bytes);
  if (n !== bytes.length) {
    throw new ShortWriteError(
      `Short write of ${what} at offset ${offset}: ${n} of ${bytes.length} bytes`,
    );
  }
  return n;
}
