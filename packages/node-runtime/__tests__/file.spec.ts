import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileByteSink, FileByteSource } from '../src/file.js';
import { createEnvelope, rawCodec, jsonCodec, Envelope } from '../src/index.js';
import { FilesystemError } from '../../core/src/errors/index.js';

describe('file-backed envelopes', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'envelope-'));
  });

  afterAll(() => rm(dir, { recursive: true, force: true }));

  it('writes envelopes back to back and reads them by offset', async () => {
    const path = join(dir, 'records.bin');
    const env  = createEnvelope(jsonCodec<{ id: number; name: string }>());

    const sink = await FileByteSink.open(path, true);
    let offset = 0;
    try {
      for (const rec of [{ id: 1, name: 'one' }, { id: 2, name: 'two' }]) {
        offset += await env.writeAt(sink, offset, rec);
      }
    } finally {
      await sink.close();
    }

    const src = await FileByteSource.open(path);
    try {
      expect(src.length).toBe(offset);
      const first  = await env.readAt(src, 0);
      const second = await env.readAt(src, first.bytesConsumed);
      expect([first.value, second.value]).toEqual([{ id: 1, name: 'one' }, { id: 2, name: 'two' }]);
      expect(first.bytesConsumed + second.bytesConsumed).toBe(offset);

      const headers = await Envelope.inspect(src);
      expect(headers.map(h => h.offset)).toEqual([0, first.bytesConsumed]);
    } finally {
      await src.close();
    }
  });

  it('keeps existing bytes unless asked to truncate', async () => {
    const path = join(dir, 'append.bin');
    await writeFile(path, new Uint8Array([0xca, 0xfe]));

    const sink = await FileByteSink.open(path);
    try {
      await createEnvelope(rawCodec).writeAt(sink, await sink.size(), new Uint8Array([7]));
    } finally {
      await sink.close();
    }

    const bytes = new Uint8Array(await readFile(path));
    expect(bytes.length).toBe(2 + 33);
    expect(Array.from(bytes.subarray(0, 2))).toEqual([0xca, 0xfe]);
    expect(bytes[34]).toBe(7);
  });

  it('truncates when asked', async () => {
    const path = join(dir, 'fresh.bin');
    await writeFile(path, new Uint8Array(100));
    const sink = await FileByteSink.open(path, true);
    try {
      expect(await sink.size()).toBe(0);
    } finally {
      await sink.close();
    }
  });

  it('throws RangeError for reads past the end', async () => {
    const path = join(dir, 'short.bin');
    await writeFile(path, new Uint8Array([1, 2, 3]));
    const src = await FileByteSource.open(path);
    try {
      await expect(src.read(2, 5)).rejects.toThrow(RangeError);
      expect(Array.from(await src.read(1, 2))).toEqual([2, 3]);
    } finally {
      await src.close();
    }
  });

  it('throws FilesystemError for missing files', async () => {
    await expect(FileByteSource.open(join(dir, 'nope.bin'))).rejects.toThrow(FilesystemError);
  });
});
