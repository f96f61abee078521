// packages/core/src/header/versionTag.ts
import { OverflowError, VersionError } from '../errors/index.js';

/**
 * Copy `version` into the zero-filled `buf`, which is the whole version
 * field. At least one trailing zero byte always remains.
 */
export function encodeVersionTag(version: string, buf: Uint8Array): void {
  if (version.length >= buf.length) {
    throw new OverflowError(
      `Version "${version}" overflows ${buf.length}-byte version field`,
    );
  }
  buf.fill(0);
  for (let i = 0; i < version.length; i++) {
    const c = version.charCodeAt(i);
    if (c === 0 || c > 0x7f) {
      throw new VersionError(`Version tag must be ASCII without NUL: ${JSON.stringify(version)}`);
    }
    buf[i] = c;
  }
}

/** Text up to the first zero byte, or the whole field if there is none. */
export function decodeVersionTag(buf: Uint8Array): string {
  let end = buf.indexOf(0);
  if (end === -1) end = buf.length;
  let s = '';
  for (let i = 0; i < end; i++) s += String.fromCharCode(buf[i]);
  return s;
}

/** Plain code-unit ordering; "1.10.0" sorts before "1.9.0". */
export function isNewerVersion(candidate: string, current: string): boolean {
  return candidate > current;
}
