// packages/core/src/util/frame.ts
import { RecordTooLargeError, TruncatedRecordError } from '../errors/index.js';
import type { ByteQueue } from './ByteQueue.js';
import type { ReadResult } from '../types/index.js';

const LEN_BYTES = 4 as const;

export function encodeFrameLen(n: number): Uint8Array {
  if (!Number.isInteger(n) || n < 0 || n > 0xffff_ffff) {
    throw new RangeError(`Frame length out of range: ${n}`);
  }
  const hdr = new Uint8Array(LEN_BYTES);
  new DataView(hdr.buffer).setUint32(0, n, false);   // big‑endian
  return hdr;
}

export function decodeFrameLen(buf: Uint8Array, off = 0): number {
  if (buf.length - off < LEN_BYTES) {
    throw new RangeError('Not enough bytes for frame header');
  }
  return new DataView(buf.buffer, buf.byteOffset + off, LEN_BYTES)
           .getUint32(0, false);
}
export const FRAME_HEADER_BYTES = LEN_BYTES;

/** `[ len(4, BE) | ciphertext ]` */
export function writeRecord(ciphertext: Uint8Array): Uint8Array {
  const out = new Uint8Array(FRAME_HEADER_BYTES + ciphertext.byteLength);
  out.set(encodeFrameLen(ciphertext.byteLength));
  out.set(ciphertext, FRAME_HEADER_BYTES);
  return out;
}

/**
 * Read one length-prefixed record.
 *
 * The declared length is checked against `maxLength` before any body byte is
 * awaited, so an oversized prefix never makes the caller buffer it.
 * Truncation is only reported once `source` has ended.
 */
export function readRecord(source: ByteQueue, maxLength: number): ReadResult<Uint8Array> {
  if (source.length < FRAME_HEADER_BYTES) {
    if (!source.ended) return { status: 'pending' };
    if (source.length === 0) return { status: 'eof' };
    throw new TruncatedRecordError(`Input ended inside a length prefix (${source.length} B)`);
  }

  const declared = decodeFrameLen(source.peek(FRAME_HEADER_BYTES));
  if (declared > maxLength) {
    throw new RecordTooLargeError(`Record declares ${declared} B, limit ${maxLength} B`);
  }

  if (source.length - FRAME_HEADER_BYTES < declared) {
    if (!source.ended) return { status: 'pending' };
    throw new TruncatedRecordError(
      `Record declares ${declared} B, only ${source.length - FRAME_HEADER_BYTES} B before end of input`,
    );
  }

  source.take(FRAME_HEADER_BYTES);
  return { status: 'ok', value: source.take(declared) };
}
