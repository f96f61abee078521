// packages/core/src/io/SectionReader.ts
import type { ByteReader, RandomAccessSource } from '../types/index.js';
import { InternalError } from '../errors/index.js';

/**
 * Sequential view of `[base, base + limit)` inside a random-access source.
 * Reads stop at whichever comes first, the limit or the end of the source.
 */
export class SectionReader implements ByteReader {
  #pos = 0;

  constructor(
    private readonly source: RandomAccessSource,
    private readonly base  : number,
    private readonly limit : number,
  ) {
    if (!Number.isSafeInteger(base) || base < 0) {
      throw new RangeError(`Section offset must be a non-negative integer, got ${base}`);
    }
    if (!Number.isSafeInteger(limit) || limit < 0) {
      throw new RangeError(`Section limit must be a non-negative integer, got ${limit}`);
    }
  }

  async read(buf: Uint8Array): Promise<number> {
    const avail = Math.min(
      buf.length,
      this.limit - this.#pos,
      this.source.length - (this.base + this.#pos),
    );
    if (avail <= 0) return 0;

    const chunk = await this.source.read(this.base + this.#pos, avail);
    buf.set(chunk);
    this.#pos += chunk.length;
    return chunk.length;
  }

  /** Bytes consumed since `base`. */
  get position(): number {
    if (!Number.isSafeInteger(this.#pos) || this.#pos < 0 || this.#pos > this.limit) {
      throw new InternalError(
        `Section position ${this.#pos} outside [0, ${this.limit}]`,
      );
    }
    return this.#pos;
  }
}
