/* ------------------------- Sequential streams ------------------------ */

/**
 * Pull-based byte stream. `read` copies at most `buf.length` bytes into
 * `buf` and resolves how many it copied; 0 means the stream has ended.
 * A short count is not an error.
 */
export interface ByteReader {
  read(buf: Uint8Array): Promise<number>;
}

/** Resolves how many bytes were accepted; anything short is a failure. */
export interface ByteWriter {
  write(bytes: Uint8Array): Promise<number>;
}

/* ------------------------- Positional streams ------------------------ */

export interface RandomAccessSource {
  /** total length in bytes */
  readonly length: number;
  /**
   * return a copy of bytes `[offset, offset + len)`
   * throws if the range is out of bounds
   */
  read(offset: number, len: number): Promise<Uint8Array>;
}

export interface RandomAccessSink {
  write(offset: number, bytes: Uint8Array): Promise<number>;
}

/* ------------------------- Payload codec ----------------------------- */

/**
 * Turns payload values into bytes and back. The envelope never looks
 * inside the bytes.
 */
export interface PayloadCodec<T> {
  readonly name: string;
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
  /** Byte length `encode(value)` would produce. */
  encodedSize(value: T): number;
}

/* ------------------------- Format generation ------------------------- */

/**
 * One generation of the envelope header: the version string written by
 * this software and the fixed capacity of the version field.
 */
export interface FormatDescriptor {
  readonly version: string;
  readonly maxVersionLength: number;
}

export interface EnvelopeHeader {
  readonly version    : string;
  /** Bytes occupied by the header as written, future fields included. */
  readonly headerSize : number;
  /** Bytes of payload that follow the header. */
  readonly dataSize   : number;
}
