import { EncodingError, DecodingError } from "../errors/index.js";

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
  try {
    return Buffer.from(concat(...chunks)).toString('base64');
  } catch {
    throw new EncodingError('Base64 Encoding Error');
  }
}

export function base64Decode(b64: string): Uint8Array {
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(b64) || b64.length % 4 !== 0) {
    throw new DecodingError(
      `Invalid Base64: length=${b64.length}, content='${b64.slice(0, 12)}…'`,
    );
  }
  return new Uint8Array(Buffer.from(b64, 'base64'));
}

/* ----------  Hex  ------------------------------------------------- */
export function hexEncode(u8: Uint8Array): string {
  let s = '';
  for (let i = 0; i < u8.length; i++) s += u8[i].toString(16).padStart(2, '0');
  return s;
}

export function hexDecode(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new DecodingError(`Invalid hex string of length ${hex.length}`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/** Overwrite a buffer we own; no-op for empty input. */
export function wipe(buf: Uint8Array | null | undefined): void {
  if (buf && buf.byteLength) buf.fill(0);
}
