// packages/core/src/header/decoder.ts
import {
  HEADER_MAGIC,
  FORMAT_VERSION,
  HEADER_BYTES,
  MAGIC_BYTES,
  BASE_NONCE_BYTES,
} from './constants.js';
import { MAX_CHUNK_SIZE } from '../config/defaults.js';
import { AlgorithmRegistry } from '../config/AlgorithmRegistry.js';
import { HeaderInvalidError } from '../errors/index.js';
import type { ByteQueue } from '../util/ByteQueue.js';
import type { ReadResult, StreamHeader } from '../types/index.js';

export interface HeaderLimits {
  /** Largest chunk size accepted from a header; defaults to MAX_CHUNK_SIZE */
  maxChunkSize?: number;
}

function hasMagic(buf: Uint8Array): boolean {
  for (let i = 0; i < MAGIC_BYTES; i++) {
    if (buf[i] !== HEADER_MAGIC[i]) return false;
  }
  return true;
}

/**
 * Parse and validate a complete header.
 * `buf` may be longer than the header; only the first 34 bytes are read.
 */
export function parseHeader(buf: Uint8Array, limits: HeaderLimits = {}): StreamHeader {
  if (buf.byteLength < HEADER_BYTES) {
    throw new HeaderInvalidError('truncated-header', `Header needs ${HEADER_BYTES} bytes, got ${buf.byteLength}`);
  }
  if (!hasMagic(buf)) {
    throw new HeaderInvalidError('bad-magic');
  }

  const dv        = new DataView(buf.buffer, buf.byteOffset, HEADER_BYTES);
  const version   = buf[4];
  const algoId    = buf[5];
  const chunkSize = dv.getUint32(6, false);
  const maxChunk  = limits.maxChunkSize ?? MAX_CHUNK_SIZE;

  if (version !== FORMAT_VERSION) {
    throw new HeaderInvalidError('unsupported-version', `Unsupported format version ${version}`);
  }
  if (!AlgorithmRegistry.has(algoId)) {
    throw new HeaderInvalidError('unsupported-algorithm', `Unknown algorithm id ${algoId}`);
  }
  if (chunkSize < 1 || chunkSize > maxChunk) {
    throw new HeaderInvalidError('invalid-chunk-size', `Chunk size ${chunkSize} outside 1..${maxChunk}`);
  }

  const raw = buf.slice(0, HEADER_BYTES);
  return {
    version,
    algorithm : AlgorithmRegistry.get(algoId),
    chunkSize,
    baseNonce : raw.slice(HEADER_BYTES - BASE_NONCE_BYTES),
    raw,
  };
}

/**
 * Incremental header read from a {@link ByteQueue}.
 * Reports `pending` until 34 bytes are buffered; a wrong magic is rejected as
 * soon as its four bytes are visible.
 */
export function readHeader(source: ByteQueue, limits: HeaderLimits = {}): ReadResult<StreamHeader> {
  if (source.length >= MAGIC_BYTES && !hasMagic(source.peek(MAGIC_BYTES))) {
    throw new HeaderInvalidError('bad-magic');
  }
  if (source.length < HEADER_BYTES) {
    if (source.ended) {
      throw new HeaderInvalidError(
        'truncated-header',
        `Input ended after ${source.length} of ${HEADER_BYTES} header bytes`,
      );
    }
    return { status: 'pending' };
  }
  // validate before consuming so a rejected header leaves the queue intact
  const header = parseHeader(source.peek(HEADER_BYTES), limits);
  source.take(HEADER_BYTES);
  return { status: 'ok', value: header };
}
