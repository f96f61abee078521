// packages/core/src/header/decoder.ts
import type { ByteReader, EnvelopeHeader, FormatDescriptor } from '../types/index.js';
import { ForwardCompatibilityError, InvalidHeaderError } from '../errors/index.js';
import { readFull } from '../io/full.js';
import { MAX_MARSHALLED_SIZE, U64_BYTES } from './constants.js';
import { makeHeader, minimumHeaderSize } from './header.js';
import { decodeVersionTag, isNewerVersion } from './versionTag.js';

/**
 * Read one header from `reader`, leaving it positioned at the payload.
 *
 * `headerSize` on the wire says how many bytes to consume, so fields
 * appended by a later generation are read and dropped. The version gate
 * still refuses anything newer than `format.version`, before either size is
 * read; that gate has to be relaxed before older readers get any use out of
 * the skip.
 */
export async function decodeHeader(
  reader: ByteReader,
  format: FormatDescriptor,
): Promise<EnvelopeHeader> {
  const max = format.maxVersionLength;

  const verBuf = await readFull(reader, new Uint8Array(max), { boundary: true, what: 'version' });
  const version = decodeVersionTag(verBuf);
  // sizes written by newer software are not trusted, not even for skipping
  if (isNewerVersion(version, format.version)) {
    throw new ForwardCompatibilityError(
      `Envelope version ${version} is newer than supported ${format.version}`,
    );
  }

  const sizeBuf = await readFull(reader, new Uint8Array(U64_BYTES), { what: 'headerSize' });
  const headerSize = readU64(sizeBuf, 0, 'headerSize');

  const min = minimumHeaderSize(format);
  if (headerSize < min) {
    throw new InvalidHeaderError(`headerSize ${headerSize} below minimum ${min}`);
  }
  if (headerSize > MAX_MARSHALLED_SIZE) {
    throw new InvalidHeaderError(`headerSize ${headerSize} exceeds ${MAX_MARSHALLED_SIZE}`);
  }

  // dataSize plus whatever later generations appended
  const rest = await readFull(
    reader,
    new Uint8Array(headerSize - max - U64_BYTES),
    { what: 'header fields' },
  );
  const dataSize = readU64(rest, 0, 'dataSize');

  return makeHeader(version, headerSize, dataSize, format);
}

function readU64(buf: Uint8Array, off: number, field: string): number {
  const v = new DataView(buf.buffer, buf.byteOffset + off, U64_BYTES).getBigUint64(0, true);
  if (v > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new InvalidHeaderError(`${field} ${v} is not addressable`);
  }
  return Number(v);
}
