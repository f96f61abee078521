import { Envelope } from '../src/index.js';
import { rawCodec } from '../src/codec/raw.js';
import { jsonCodec } from '../src/codec/json.js';
import { BufferReader, BufferWriter, MemorySink } from '../src/io/memory.js';
import { base64Encode } from '../src/util/bytes.js';
import {
  EndOfStreamError,
  UnexpectedEndOfStreamError,
  VersionError,
} from '../src/errors/index.js';
import { SAMPLE_ENVELOPE, SAMPLE_PAYLOAD, join } from './_helper.js';

describe('Envelope', () => {
  it('defaults to the registered current format', () => {
    const env = new Envelope(rawCodec);
    expect(env.format).toEqual({ version: '1.0.0', maxVersionLength: 16 });
    expect(env.headerSize()).toBe(32);
  });

  it('resolves registered format names and rejects unknown ones', () => {
    expect(new Envelope(rawCodec, { format: '1.0.0' }).format.version).toBe('1.0.0');
    expect(() => new Envelope(rawCodec, { format: '7.7.7' })).toThrow(VersionError);
  });

  it('logs progress at the configured verbosity', async () => {
    const sink: string[] = [];
    const env = new Envelope(rawCodec, { verbose: 3, logger: m => sink.push(m) });
    await env.write(new BufferWriter(), SAMPLE_PAYLOAD);
    expect(sink).toEqual([
      '2| [envelope] Writing raw envelope, format 1.0.0',
      '3| [envelope] Wrote 35 bytes',
    ]);
  });

  it('logs failures at level 0 and rethrows them', async () => {
    const sink: string[] = [];
    const env = new Envelope(rawCodec, { logger: m => sink.push(m) });
    await expect(env.read(new BufferReader(SAMPLE_ENVELOPE.subarray(0, 34))))
      .rejects.toThrow(UnexpectedEndOfStreamError);
    expect(sink).toEqual([
      '0| [envelope] read failed: UnexpectedEndOfStreamError: Stream ended after 2 of 3 bytes of payload',
    ]);
  });

  it('keeps a clean end of stream out of the error log', async () => {
    const quiet: string[] = [];
    await expect(new Envelope(rawCodec, { logger: m => quiet.push(m) }).read(new BufferReader(new Uint8Array(0))))
      .rejects.toThrow(EndOfStreamError);
    expect(quiet).toEqual([]);

    const chatty: string[] = [];
    await expect(new Envelope(rawCodec, { verbose: 2, logger: m => chatty.push(m) }).read(new BufferReader(new Uint8Array(0))))
      .rejects.toThrow(EndOfStreamError);
    expect(chatty).toEqual([
      '2| [envelope] Reading envelope',
      '2| [envelope] read failed: EndOfStreamError: End of stream before version',
    ]);
  });

  it('writes at offsets of a random-access sink', async () => {
    const env  = new Envelope(jsonCodec<string[]>());
    const sink = new MemorySink();
    const n1 = await env.writeAt(sink, 0, ['a']);
    await env.writeAt(sink, n1, ['b', 'c']);

    const first  = await env.readAt(sink.toUint8Array(), 0);
    const second = await env.readAt(sink.toUint8Array(), first.bytesConsumed);
    expect([first.value, second.value]).toEqual([['a'], ['b', 'c']]);
  });

  it('reads every envelope of a stream until a clean end', async () => {
    const env = new Envelope(jsonCodec<{ n: number }>());
    const w = new BufferWriter();
    for (let n = 0; n < 4; n++) await env.write(w, { n });
    const all = await env.readAll(new BufferReader(w.toUint8Array(), 5));
    expect(all).toEqual([{ n: 0 }, { n: 1 }, { n: 2 }, { n: 3 }]);
  });

  it('iterates lazily', async () => {
    const env = new Envelope(rawCodec);
    const seen: number[] = [];
    for await (const p of env.iterate(new BufferReader(join(SAMPLE_ENVELOPE, SAMPLE_ENVELOPE)))) {
      seen.push(p.length);
    }
    expect(seen).toEqual([3, 3]);
  });

  it('fails readAll when the last envelope is cut short', async () => {
    const bytes = join(SAMPLE_ENVELOPE, SAMPLE_ENVELOPE.subarray(0, 20));
    await expect(new Envelope(rawCodec).readAll(new BufferReader(bytes)))
      .rejects.toThrow(UnexpectedEndOfStreamError);
  });

  it('returns an empty list for an empty stream', async () => {
    expect(await new Envelope(rawCodec).readAll(new BufferReader(new Uint8Array(0)))).toEqual([]);
  });
});

describe('Envelope.inspect', () => {
  it('lists headers without decoding payloads', async () => {
    const all = await Envelope.inspect(join(SAMPLE_ENVELOPE, SAMPLE_ENVELOPE));
    expect(all).toEqual([
      { header: { version: '1.0.0', headerSize: 32, dataSize: 3 }, offset: 0,  next: 35 },
      { header: { version: '1.0.0', headerSize: 32, dataSize: 3 }, offset: 35, next: 70 },
    ]);
  });

  it('accepts Base64 text and Blobs', async () => {
    expect(await Envelope.inspect(base64Encode(SAMPLE_ENVELOPE))).toHaveLength(1);
    expect(await Envelope.inspect(new Blob([SAMPLE_ENVELOPE]))).toHaveLength(1);
  });

  it('reports a payload that runs past the end', async () => {
    await expect(Envelope.inspect(SAMPLE_ENVELOPE.subarray(0, 33)))
      .rejects.toThrow('Payload at 32 needs 3 bytes, source ends at 33');
  });

  it('decodes a single header at an offset', async () => {
    const h = await Envelope.decodeHeader(join(new Uint8Array(5), SAMPLE_ENVELOPE), 5);
    expect(h).toEqual({ version: '1.0.0', headerSize: 32, dataSize: 3 });
  });
});
