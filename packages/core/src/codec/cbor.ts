// packages/core/src/codec/cbor.ts
import { Encoder } from 'cbor-x';
import type { PayloadCodec } from '../types/index.js';
import { PayloadCodecError } from '../errors/index.js';

/**
 * CBOR through cbor-x. Keeps Dates, Maps, Sets, typed arrays and BigInts.
 * cbor-x has no sizing API, so `encodedSize` encodes and measures.
 */
export function cborCodec<T>(guard?: (v: unknown) => v is T): PayloadCodec<T> {
  const cbor = new Encoder({ mapsAsObjects: true, useRecords: false });

  function encode(value: T): Uint8Array {
    try {
      const out: Uint8Array = cbor.encode(value);
      return new Uint8Array(out.buffer, out.byteOffset, out.byteLength).slice();
    } catch (err) {
      throw new PayloadCodecError(`CBOR encode failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return {
    name: 'cbor',
    encode,
    decode(bytes) {
      let value: T;
      try {
        value = cbor.decode(bytes);
      } catch (err) {
        throw new PayloadCodecError(`CBOR decode failed: ${err instanceof Error ? err.message : String(err)}`);
      }
      if (guard && !guard(value)) throw new PayloadCodecError('CBOR decode failed: unexpected shape');
      return value;
    },
    encodedSize: value => encode(value).byteLength,
  };
}
