// packages/node-runtime/src/index.ts
import { Envelope, type EnvelopeOptions, type PayloadCodec } from '../../core/src/index.js';

export function createEnvelope<T>(codec: PayloadCodec<T>, cfg?: EnvelopeOptions): Envelope<T> {
  return new Envelope(codec, cfg);
}

export * from '../../core/src/index.js';
export { FileByteSource, FileByteSink } from './file.js';
export { fromNodeReadable, fromNodeWritable, endWritable } from './streamAdapter.js';
