// packages/node-runtime/src/file.ts
import { access, open, type FileHandle } from 'node:fs/promises';
import type { RandomAccessSink, RandomAccessSource } from '../../core/src/types/index.js';
import { assertSliceBounds } from '../../core/src/util/range.js';
import { FilesystemError } from '../../core/src/errors/index.js';

/** Random-access reads from a file; `length` is fixed at open time. */
export class FileByteSource implements RandomAccessSource {
  private constructor(
    private readonly fh: FileHandle,
    readonly length: number,
  ) {}

  static async open(path: string): Promise<FileByteSource> {
    let fh: FileHandle;
    try {
      fh = await open(path, 'r');
    } catch (err) {
      throw new FilesystemError(`Cannot open ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    try {
      const { size } = await fh.stat();
      return new FileByteSource(fh, size);
    } catch (err) {
      await fh.close();
      throw new FilesystemError(`Cannot stat ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async read(offset: number, len: number): Promise<Uint8Array> {
    assertSliceBounds(this.length, offset, len);
    const out = new Uint8Array(len);
    let filled = 0;
    while (filled < len) {
      const { bytesRead } = await this.fh.read(out, filled, len - filled, offset + filled);
      if (bytesRead === 0) {
        throw new FilesystemError(`File shrank while reading at ${offset + filled}`);
      }
      filled += bytesRead;
    }
    return out;
  }

  /** always call after finishing */
  async close(): Promise<void> { await this.fh.close(); }
}

/** Positional writes into a file. */
export class FileByteSink implements RandomAccessSink {
  private constructor(private readonly fh: FileHandle) {}

  /**
   * @param truncate start from an empty file instead of keeping its bytes
   */
  static async open(path: string, truncate = false): Promise<FileByteSink> {
    const flags = !truncate && (await exists(path)) ? 'r+' : 'w';
    try {
      return new FileByteSink(await open(path, flags));
    } catch (err) {
      throw new FilesystemError(`Cannot open ${path} for writing: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async write(offset: number, bytes: Uint8Array): Promise<number> {
    let written = 0;
    while (written < bytes.length) {
      const { bytesWritten } = await this.fh.write(bytes, written, bytes.length - written, offset + written);
      if (bytesWritten === 0) break;
      written += bytesWritten;
    }
    return written;
  }

  async size(): Promise<number> { return (await this.fh.stat()).size; }

  async close(): Promise<void> { await this.fh.close(); }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
