import type { Readable, Writable } from 'node:stream';
import type { ByteReader, ByteWriter } from '../../core/src/types/index.js';
import { IOError } from '../../core/src/errors/index.js';

/**
 * Pull bytes out of a Node Readable. Chunks larger than the caller's buffer
 * are kept and handed out on later reads.
 */
export function fromNodeReadable(r: Readable): ByteReader {
  const it = r[Symbol.asyncIterator]();
  let pending: Uint8Array = new Uint8Array(0);
  let done = false;

  return {
    async read(buf) {
      if (buf.length === 0) return 0;
      while (pending.length === 0 && !done) {
        const next = await it.next();
        if (next.done) { done = true; break; }
        pending = toBytes(next.value);
      }
      if (pending.length === 0) return 0;
      const n = Math.min(buf.length, pending.length);
      buf.set(pending.subarray(0, n));
      pending = pending.subarray(n);
      return n;
    },
  };
}

/** Push bytes into a Node Writable, honouring back-pressure. */
export function fromNodeWritable(w: Writable): ByteWriter {
  return {
    write(bytes) {
      return new Promise<number>((resolve, reject) => {
        if (w.destroyed || w.writableEnded) {
          reject(new IOError('Write to a closed stream'));
          return;
        }
        w.write(bytes, err => (err ? reject(err) : resolve(bytes.length)));
      });
    },
  };
}

/** Finish a Writable and wait until everything is flushed. */
export function endWritable(w: Writable): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    w.once('error', reject);
    w.end(() => resolve());
  });
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === 'string') return new TextEncoder().encode(chunk);
  throw new IOError(`Unsupported stream chunk: ${typeof chunk}`);
}
