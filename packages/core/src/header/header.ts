// packages/core/src/header/header.ts
import type { EnvelopeHeader, FormatDescriptor } from '../types/index.js';
import { ForwardCompatibilityError, OverflowError } from '../errors/index.js';
import { U64_BYTES } from './constants.js';
import { isNewerVersion } from './versionTag.js';

/*
 * Layout, little-endian. Append-only: existing fields never change type,
 * width or position, and new fields go after `dataSize`.
 *
 *   0                 MAXLEN  version     ASCII, zero-padded
 *   MAXLEN            8       headerSize  this header's bytes, future fields included
 *   MAXLEN + 8        8       dataSize    payload bytes that follow
 *   headerSize        dataSize  payload
 */

/** Bytes a header written by this software occupies. */
export function headerWidth(format: FormatDescriptor): number {
  return format.maxVersionLength + 2 * U64_BYTES;
}

/** Smallest `headerSize` a reader can accept: one that still holds `dataSize`. */
export function minimumHeaderSize(format: FormatDescriptor): number {
  return headerWidth(format);
}

/**
 * Checked constructor shared by the write and read paths.
 * @throws OverflowError when the version does not fit the field
 * @throws ForwardCompatibilityError when the version is newer than `format.version`
 */
export function makeHeader(
  version: string,
  headerSize: number,
  dataSize: number,
  format: FormatDescriptor,
): EnvelopeHeader {
  if (version.length >= format.maxVersionLength) {
    throw new OverflowError(
      `Version "${version}" overflows ${format.maxVersionLength}-byte version field`,
    );
  }
  if (isNewerVersion(version, format.version)) {
    throw new ForwardCompatibilityError(
      `Envelope version ${version} is newer than supported ${format.version}`,
    );
  }
  return Object.freeze({ version, headerSize, dataSize });
}

/** Header this software writes in front of `dataSize` payload bytes. */
export function createHeader(dataSize: number, format: FormatDescriptor): EnvelopeHeader {
  return makeHeader(format.version, headerWidth(format), dataSize, format);
}
