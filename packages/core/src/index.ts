// packages/core/src/index.ts

import './config/defaults.js';

import { resolveFormat } from './config/defaults.js';
import type {
  ByteReader,
  ByteWriter,
  EnvelopeHeader,
  FormatDescriptor,
  PayloadCodec,
  RandomAccessSink,
  RandomAccessSource,
} from './types/index.js';
import { writeEnvelope, writeEnvelopeAt } from './envelope/writer.js';
import {
  readEnvelope,
  readEnvelopeAt,
  readEnvelopes,
  inspectAt,
  type InspectResult,
  type ReadAtResult,
} from './envelope/reader.js';
import { envelopeHeaderSize, envelopeSize } from './envelope/size.js';
import { ByteSource, isRandomAccessSource } from './util/ByteSource.js';
import { createLogger, type Logger, type Verbosity } from './util/logger.js';
import { EndOfStreamError, EnvelopeError } from './errors/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring an Envelope instance.
 */
export interface EnvelopeOptions {
  /** Format generation to write and accept; a string picks a registered one */
  format?  : FormatDescriptor | string;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose? : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?  : (msg: string) => void;
}

/**
 * Writes values as self-describing envelopes (versioned header + payload)
 * and reads them back. Holds no stream state; every call works on the
 * stream it is given.
 */
export class Envelope<T> {
  readonly format: FormatDescriptor;
  private readonly log: Logger;

  constructor(
    private readonly codec: PayloadCodec<T>,
    opt: EnvelopeOptions = {},
  ) {
    this.format = resolveFormat(opt.format);
    this.log    = createLogger(opt.verbose ?? 0, opt.logger).child('envelope');
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Sizes
  // ════════════════════════════════════════════════════════════════════════

  /** Header bytes in front of every payload written by this instance. */
  headerSize(): number { return envelopeHeaderSize(this.format); }

  /** Total bytes `write(value)` produces, without serializing the value. */
  totalSize(value: T): number { return envelopeSize(value, this.codec, this.format); }

  // ════════════════════════════════════════════════════════════════════════
  //  Writing
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Append one envelope to a sequential sink.
   * @returns bytes written (header + payload)
   */
  async write(sink: ByteWriter, value: T): Promise<number> {
    this.log.log(2, `Writing ${this.codec.name} envelope, format ${this.format.version}`);
    try {
      const n = await writeEnvelope(sink, value, this.codec, this.format);
      this.log.log(3, `Wrote ${n} bytes`);
      return n;
    } catch (err) {
      this.fail('write', err);
      throw err;
    }
  }

  /**
   * Write one envelope at `offset` of a random-access sink.
   * @returns bytes written (header + payload)
   */
  async writeAt(sink: RandomAccessSink, offset: number, value: T): Promise<number> {
    this.log.log(2, `Writing ${this.codec.name} envelope at ${offset}`);
    try {
      const n = await writeEnvelopeAt(sink, offset, value, this.codec, this.format);
      this.log.log(3, `Wrote ${n} bytes at ${offset}`);
      return n;
    } catch (err) {
      this.fail('writeAt', err);
      throw err;
    }
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Reading
  // ════════════════════════════════════════════════════════════════════════

  /** Read the next envelope from a sequential source. */
  async read(source: ByteReader): Promise<T> {
    this.log.log(2, 'Reading envelope');
    try {
      return await readEnvelope(source, this.codec, this.format);
    } catch (err) {
      this.fail('read', err);
      throw err;
    }
  }

  /**
   * Read the envelope at `offset`. `bytesConsumed` is where the next one
   * starts, relative to `offset`.
   */
  async readAt(
    source: RandomAccessSource | Uint8Array | Blob,
    offset = 0,
  ): Promise<ReadAtResult<T>> {
    this.log.log(2, `Reading envelope at ${offset}`);
    try {
      const res = await readEnvelopeAt(toSource(source), offset, this.codec, this.format);
      this.log.log(3, `Consumed ${res.bytesConsumed} bytes at ${offset}`);
      return res;
    } catch (err) {
      this.fail('readAt', err);
      throw err;
    }
  }

  /** Every envelope left on a sequential source, in order. */
  async readAll(source: ByteReader): Promise<T[]> {
    const out: T[] = [];
    try {
      for await (const value of readEnvelopes(source, this.codec, this.format)) out.push(value);
    } catch (err) {
      this.fail('readAll', err);
      throw err;
    }
    this.log.log(2, `Read ${out.length} envelopes`);
    return out;
  }

  /** Async iterator over the envelopes of a sequential source. */
  iterate(source: ByteReader): AsyncGenerator<T, void, undefined> {
    return readEnvelopes(source, this.codec, this.format);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Headers of all back-to-back envelopes in `input`, payloads skipped.
   */
  static async inspect(
    input: RandomAccessSource | Uint8Array | Blob | string,
    format?: FormatDescriptor | string,
  ): Promise<InspectResult[]> {
    const src = toSource(input);
    const fmt = resolveFormat(format);
    const out: InspectResult[] = [];
    let offset = 0;
    while (offset < src.length) {
      const res = await inspectAt(src, offset, fmt);
      out.push(res);
      offset = res.next;
    }
    return out;
  }

  /** Header of the envelope at `offset`. */
  static async decodeHeader(
    input: RandomAccessSource | Uint8Array | Blob | string,
    offset = 0,
    format?: FormatDescriptor | string,
  ): Promise<EnvelopeHeader> {
    return (await inspectAt(toSource(input), offset, resolveFormat(format))).header;
  }

  private fail(op: string, err: unknown): void {
    const kind = err instanceof EnvelopeError ? err.name : 'Error';
    const msg  = err instanceof Error ? err.message : String(err);
    // clean end of stream
    this.log.log(err instanceof EndOfStreamError ? 2 : 0, `${op} failed: ${kind}: ${msg}`);
  }
}

function toSource(input: RandomAccessSource | Uint8Array | Blob | string): RandomAccessSource {
  if (input instanceof Uint8Array || typeof input === 'string') return new ByteSource(input);
  if (isRandomAccessSource(input)) return input;
  return new ByteSource(input);
}

// ────────────────────────────────────────────────────────────────────────────
//  Re-exports
// ────────────────────────────────────────────────────────────────────────────

export type {
  ByteReader,
  ByteWriter,
  EnvelopeHeader,
  FormatDescriptor,
  PayloadCodec,
  RandomAccessSink,
  RandomAccessSource,
} from './types/index.js';
export type { InspectResult, ReadAtResult } from './envelope/reader.js';
export type { Logger, Verbosity } from './util/logger.js';

export { createFormat, DEFAULT_FORMAT, resolveFormat } from './config/defaults.js';
export { FormatRegistry } from './config/FormatRegistry.js';
export { MAX_MARSHALLED_SIZE, U64_BYTES } from './header/constants.js';
export { createHeader, makeHeader, headerWidth, minimumHeaderSize } from './header/header.js';
export { encodeHeader } from './header/encoder.js';
export { decodeHeader } from './header/decoder.js';
export { encodeVersionTag, decodeVersionTag, isNewerVersion } from './header/versionTag.js';
export { prepareEnvelope, writeEnvelope, writeEnvelopeAt } from './envelope/writer.js';
export { readPayload, readEnvelope, readEnvelopeAt, readEnvelopes, inspectAt } from './envelope/reader.js';
export { envelopeHeaderSize, envelopeSize } from './envelope/size.js';
export { rawCodec } from './codec/raw.js';
export { jsonCodec } from './codec/json.js';
export { cborCodec } from './codec/cbor.js';
export { readFull, writeFull, writeFullAt } from './io/full.js';
export { SectionReader } from './io/SectionReader.js';
export { BufferReader, BufferWriter, MemorySink } from './io/memory.js';
export { ByteSource, isRandomAccessSource } from './util/ByteSource.js';
export { createLogger, toVerbosity } from './util/logger.js';
export { base64Encode, base64Decode, concat } from './util/bytes.js';
export * from './errors/index.js';
