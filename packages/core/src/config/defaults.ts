import { FormatRegistry } from './FormatRegistry.js';
import { FormatDescriptor } from '../types/index.js';
import { OverflowError, VersionError } from '../errors/index.js';
import { DEFAULT_MAX_VERSION_LENGTH, DEFAULT_VERSION } from '../header/constants.js';

/**
 * Build a validated, frozen format descriptor. The version must be
 * printable ASCII and leave room for the terminating zero byte.
 */
export function createFormat(
  version: string,
  maxVersionLength: number = DEFAULT_MAX_VERSION_LENGTH,
): FormatDescriptor {
  if (!Number.isInteger(maxVersionLength) || maxVersionLength < 1) {
    throw new VersionError(`maxVersionLength must be a positive integer, got ${maxVersionLength}`);
  }
  if (!/^[\x20-\x7e]*$/.test(version)) {
    throw new VersionError(`Version must be printable ASCII: ${JSON.stringify(version)}`);
  }
  if (version.length >= maxVersionLength) {
    throw new OverflowError(
      `Version "${version}" needs ${version.length + 1} bytes, field holds ${maxVersionLength}`,
    );
  }
  return Object.freeze({ version, maxVersionLength });
}

export const DEFAULT_FORMAT: FormatDescriptor = createFormat(DEFAULT_VERSION, DEFAULT_MAX_VERSION_LENGTH);

FormatRegistry.register(DEFAULT_FORMAT);

/** Accepts a descriptor, a registered version string, or nothing (current). */
export function resolveFormat(format?: FormatDescriptor | string): FormatDescriptor {
  if (format === undefined) return FormatRegistry.current;
  if (typeof format === 'string') return FormatRegistry.get(format);
  return createFormat(format.version, format.maxVersionLength);
}
