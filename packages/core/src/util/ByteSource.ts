// packages/core/src/util/ByteSource.ts
import { base64Decode } from './bytes.js';
import { assertSliceBounds } from './range.js';
import type { RandomAccessSource } from '../types/index.js';

/**
 * Random-access view of Blob | Uint8Array | Base64-encoded string.
 * Blob slices are read on demand, so a large Blob of envelopes is never
 * loaded whole.
 */
export class ByteSource implements RandomAccessSource {
  #buf: Uint8Array | null = null;

  constructor(private readonly src: Blob | Uint8Array | string) {}

  /** Total byte length of the underlying data */
  get length(): number {
    if (this.src instanceof Uint8Array) return this.src.byteLength;
    if (typeof this.src === 'string')  return this.decoded().byteLength;
    return this.src.size;
  }

  /**
   * Read a slice *[offset, offset + len)* as Uint8Array.
   * The returned array is a fresh copy.
   */
  async read(offset: number, len: number): Promise<Uint8Array> {
    assertSliceBounds(this.length, offset, len);

    if (this.src instanceof Uint8Array) {
      return this.src.slice(offset, offset + len);
    }

    if (typeof this.src === 'string') {
      return this.decoded().slice(offset, offset + len);
    }

    const buf = await this.src.slice(offset, offset + len).arrayBuffer();
    return new Uint8Array(buf);
  }

  /** lazily decode Base64 text into a Uint8Array (once) */
  private decoded(): Uint8Array {
    if (typeof this.src !== 'string') throw new TypeError('ByteSource: not Base64 text');
    if (!this.#buf) this.#buf = base64Decode(this.src);
    return this.#buf;
  }
}

export function isRandomAccessSource(input: unknown): input is RandomAccessSource {
  return (
    typeof input === 'object' &&
    input !== null &&
    'read' in input &&
    'length' in input &&
    typeof input.read === 'function' &&
    typeof input.length === 'number'
  );
}
