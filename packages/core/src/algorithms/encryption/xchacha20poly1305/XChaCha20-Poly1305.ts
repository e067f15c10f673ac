import { xchacha20poly1305 } from '@noble/ciphers/chacha.js';
import { BaseAEAD } from '../base/BaseAEAD.js';

/**
 * XChaCha20-Poly1305 backend (algorithm id `0x01`, the default).
 *
 * - Output is `ciphertext || tag(16)`; the nonce is not embedded, the
 *   stream derives it per chunk.
 * - No associated data: chunk position and finality are bound through the nonce.
 */
export class XChaCha20Poly1305 extends BaseAEAD {
  public static readonly KEY_LENGTH: number = 32;

  /** XChaCha20-Poly1305 nonce length in bytes. */
  public static readonly NONCE_LENGTH: number = 24;

  /** Poly1305 tag length in bytes. */
  public static readonly TAG_LENGTH: number = 16;

  public readonly KEY_LENGTH   = XChaCha20Poly1305.KEY_LENGTH;
  public readonly NONCE_LENGTH = XChaCha20Poly1305.NONCE_LENGTH;
  public readonly TAG_LENGTH   = XChaCha20Poly1305.TAG_LENGTH;

  constructor(key: Uint8Array) { super(key, XChaCha20Poly1305.KEY_LENGTH); }

  protected sealWithKey(key: Uint8Array, nonce: Uint8Array, plain: Uint8Array): Uint8Array {
    return xchacha20poly1305(key, nonce).encrypt(plain);
  }

  protected openWithKey(key: Uint8Array, nonce: Uint8Array, sealed: Uint8Array): Uint8Array {
    return xchacha20poly1305(key, nonce).decrypt(sealed);
  }
}
