// packages/core/src/nonce/NonceSequencer.ts
import { ChunkIndexExhaustedError, ConfigurationError } from '../errors/index.js';
import { BASE_NONCE_BYTES } from '../header/constants.js';

/** Bytes of the base nonce carried into every chunk nonce */
export const NONCE_PREFIX_BYTES = 15 as const;

/** Largest chunk index a stream may use (u64) */
export const MAX_CHUNK_INDEX = 0xffff_ffff_ffff_ffffn;

/**
 * Per-chunk nonce derivation.
 *
 * ```
 *   nonce = baseNonce[0..15) ‖ index(u64, BE) ‖ finalFlag(0x00 | 0x01)
 * ```
 *
 * The suffix is disjoint from the prefix, so distinct `(index, isFinal)`
 * pairs can never collide within one stream. One instance per stream; the
 * only state is the base nonce, copied at construction.
 */
export class NonceSequencer {
  readonly #prefix: Uint8Array;

  constructor(baseNonce: Uint8Array) {
    if (baseNonce.byteLength !== BASE_NONCE_BYTES) {
      throw new ConfigurationError(`Base nonce must be ${BASE_NONCE_BYTES} bytes, got ${baseNonce.byteLength}`);
    }
    this.#prefix = baseNonce.slice(0, NONCE_PREFIX_BYTES);
  }

  derive(index: bigint, isFinal: boolean): Uint8Array {
    if (index < 0n || index > MAX_CHUNK_INDEX) {
      throw new ChunkIndexExhaustedError(`Chunk index ${index} outside u64 range`);
    }
    const nonce = new Uint8Array(BASE_NONCE_BYTES);
    nonce.set(this.#prefix, 0);
    new DataView(nonce.buffer).setBigUint64(NONCE_PREFIX_BYTES, index, false);
    nonce[BASE_NONCE_BYTES - 1] = isFinal ? 0x01 : 0x00;
    return nonce;
  }
}
