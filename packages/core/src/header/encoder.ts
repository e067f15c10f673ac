// packages/core/src/header/encoder.ts
import {
  HEADER_MAGIC,
  FORMAT_VERSION,
  HEADER_BYTES,
  BASE_NONCE_BYTES,
  MAGIC_BYTES,
} from './constants.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Serialise the fixed 34-byte stream header.
 * All integers are big-endian.
 */
export function writeHeader(
  baseNonce  : Uint8Array,
  chunkSize  : number,
  algorithmId: number,
): Uint8Array {
  if (baseNonce.byteLength !== BASE_NONCE_BYTES) {
    throw new ConfigurationError(`Base nonce must be ${BASE_NONCE_BYTES} bytes, got ${baseNonce.byteLength}`);
  }
  if (!Number.isInteger(chunkSize) || chunkSize < 1 || chunkSize > 0xffff_ffff) {
    throw new ConfigurationError(`Chunk size out of range: ${chunkSize}`);
  }
  if (!Number.isInteger(algorithmId) || algorithmId < 0 || algorithmId > 0xff) {
    throw new ConfigurationError(`Algorithm id out of range: ${algorithmId}`);
  }

  const out = new Uint8Array(HEADER_BYTES);
  const dv  = new DataView(out.buffer);
  let o = 0;
  out.set(HEADER_MAGIC, o);          o += MAGIC_BYTES;
  out[o++] = FORMAT_VERSION;
  out[o++] = algorithmId;
  dv.setUint32(o, chunkSize, false); o += 4;
  out.set(baseNonce, o);
  return out;
}
