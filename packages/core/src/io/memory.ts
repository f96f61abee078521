// packages/core/src/io/memory.ts
import type { ByteReader, ByteWriter, RandomAccessSink } from '../types/index.js';
import { concat } from '../util/bytes.js';

/**
 * Sequential reader over an in-memory buffer. `maxChunk` caps how much a
 * single `read` hands out, which mimics sockets and pipes.
 */
export class BufferReader implements ByteReader {
  #pos = 0;

  constructor(
    private readonly data: Uint8Array,
    private readonly maxChunk = Number.POSITIVE_INFINITY,
  ) {
    if (!(maxChunk >= 1)) throw new RangeError(`maxChunk must be >= 1, got ${maxChunk}`);
  }

  async read(buf: Uint8Array): Promise<number> {
    const n = Math.min(buf.length, this.maxChunk, this.data.length - this.#pos);
    if (n <= 0) return 0;
    buf.set(this.data.subarray(this.#pos, this.#pos + n));
    this.#pos += n;
    return n;
  }

  get position(): number  { return this.#pos; }
  get remaining(): number { return this.data.length - this.#pos; }
}

/** Collects everything written to it. */
export class BufferWriter implements ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  #length = 0;

  async write(bytes: Uint8Array): Promise<number> {
    this.chunks.push(bytes.slice());
    this.#length += bytes.length;
    return bytes.length;
  }

  get length(): number { return this.#length; }

  toUint8Array(): Uint8Array { return concat(...this.chunks); }
}

/**
 * Growable random-access sink. Writing past the end zero-fills the gap,
 * the way a sparse file reads back.
 */
export class MemorySink implements RandomAccessSink {
  #buf: Uint8Array;
  #length = 0;

  constructor(initialCapacity = 256) {
    this.#buf = new Uint8Array(Math.max(1, initialCapacity));
  }

  async write(offset: number, bytes: Uint8Array): Promise<number> {
    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw new RangeError(`Invalid write offset: ${offset}`);
    }
    const end = offset + bytes.length;
    this.ensureCapacity(end);
    this.#buf.set(bytes, offset);
    if (end > this.#length) this.#length = end;
    return bytes.length;
  }

  get length(): number { return this.#length; }

  /** Copy of the bytes written so far. */
  toUint8Array(): Uint8Array { return this.#buf.slice(0, this.#length); }

  private ensureCapacity(min: number): void {
    if (min <= this.#buf.length) return;
    let cap = this.#buf.length;
    while (cap < min) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.#buf.subarray(0, this.#length));
    this.#buf = next;
  }
}
