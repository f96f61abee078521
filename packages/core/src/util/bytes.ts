import { PayloadCodecError } from "../errors/index.js";

/**
 * Tiny run-time test - are we really in Node
 */
function isNodeLike(): boolean {
  return (
    typeof process !== 'undefined' &&
    typeof process.versions === 'object' &&
    typeof process.versions.node === 'string'
  );
}

/* ------------------------------------------------------------------ */

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/* ----------  Base64  ---------------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  const data = concat(...chunks);

  if (isNodeLike()) return Buffer.from(data).toString('base64');

  let binary = '';
  for (let i = 0; i < data.length; i++) binary += String.fromCharCode(data[i]);
  return btoa(binary);
}

export function isBase64(text: string): boolean {
  return /^[A-Za-z0-9+/]+={0,2}$/.test(text) && text.length % 4 === 0;
}

export function base64Decode(b64: string): Uint8Array {
  if (!isBase64(b64)) {
    throw new PayloadCodecError(
      `Invalid Base64: length=${b64.length}, content='${b64.slice(0, 12)}…'`,
    );
  }

  if (isNodeLike()) return new Uint8Array(Buffer.from(b64, 'base64'));

  const bin = atob(b64);
  const out = new Uint8Array(bin.length);
  for (let i = 0; i < bin.length; i++) out[i] = bin.charCodeAt(i);
  return out;
}

/* ----------  UTF-8 length without encoding  ----------------------- */
export function utf8ByteLength(text: string): number {
  let n = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    if (c < 0x80)       n += 1;
    else if (c < 0x800) n += 2;
    else if (c >= 0xd800 && c <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) { n += 4; i++; }
      else n += 3;                          // lone surrogate → U+FFFD
    }
    else n += 3;
  }
  return n;
}
