import { encodeVersionTag, decodeVersionTag, isNewerVersion } from '../../src/header/versionTag.js';
import { OverflowError, VersionError } from '../../src/errors/index.js';

describe('version tag', () => {
  it('zero-pads the field', () => {
    const buf = new Uint8Array(8).fill(0xee);
    encodeVersionTag('1.2', buf);
    expect(Array.from(buf)).toEqual([0x31, 0x2e, 0x32, 0, 0, 0, 0, 0]);
  });

  it('reads up to the first zero byte', () => {
    expect(decodeVersionTag(new Uint8Array([0x32, 0x2e, 0x30, 0, 0x39, 0x39]))).toBe('2.0');
  });

  it('reads the whole field when no terminator is present', () => {
    expect(decodeVersionTag(new Uint8Array([0x61, 0x62, 0x63]))).toBe('abc');
  });

  it('decodes an all-zero field as the empty string', () => {
    expect(decodeVersionTag(new Uint8Array(16))).toBe('');
  });

  it('throws OverflowError when the version fills the field', () => {
    expect(() => encodeVersionTag('1234', new Uint8Array(4))).toThrow(OverflowError);
    expect(() => encodeVersionTag('123', new Uint8Array(4))).not.toThrow();
  });

  it('refuses NUL and non-ASCII characters', () => {
    expect(() => encodeVersionTag('1\u00000', new Uint8Array(8))).toThrow(VersionError);
    expect(() => encodeVersionTag('1.é', new Uint8Array(8))).toThrow(VersionError);
  });

  it('orders versions by plain string comparison', () => {
    expect(isNewerVersion('1.0.1', '1.0.0')).toBe(true);
    expect(isNewerVersion('1.0.0', '1.0.0')).toBe(false);
    expect(isNewerVersion('0.9.0', '1.0.0')).toBe(false);
    expect(isNewerVersion('1.9.0', '1.10.0')).toBe(true);
  });
});
