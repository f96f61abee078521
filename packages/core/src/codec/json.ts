// packages/core/src/codec/json.ts
import type { PayloadCodec } from '../types/index.js';
import { PayloadCodecError } from '../errors/index.js';
import { utf8ByteLength } from '../util/bytes.js';

/**
 * UTF-8 JSON. Values must survive `JSON.stringify`; Dates, Maps and
 * BigInts do not.
 *
 * `guard` narrows what `JSON.parse` produced; without one the parsed value
 * is trusted to be a `T`.
 */
export function jsonCodec<T>(guard?: (v: unknown) => v is T): PayloadCodec<T> {
  const enc = new TextEncoder();
  const dec = new TextDecoder('utf-8', { fatal: true });

  function stringify(value: T): string {
    let text: string | undefined;
    try {
      text = JSON.stringify(value);
    } catch (err) {
      throw new PayloadCodecError(`JSON encode failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (text === undefined) throw new PayloadCodecError('JSON encode failed: value is not serializable');
    return text;
  }

  return {
    name: 'json',
    encode: value => enc.encode(stringify(value)),
    decode(bytes) {
      let parsed: T;
      try {
        parsed = JSON.parse(dec.decode(bytes));
      } catch (err) {
        throw new PayloadCodecError(`JSON decode failed: ${err instanceof Error ? err.message : String(err)}`);
      }
      if (guard && !guard(parsed)) throw new PayloadCodecError('JSON decode failed: unexpected shape');
      return parsed;
    },
    encodedSize: value => utf8ByteLength(stringify(value)),
  };
}
