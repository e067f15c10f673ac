import { xsalsa20poly1305 } from '@noble/ciphers/salsa.js';
import { BaseAEAD } from '../base/BaseAEAD.js';

/**
 * XSalsa20-Poly1305 backend (algorithm id `0x02`), the NaCl `secretbox`
 * construction. Same key, nonce and tag sizes as XChaCha20-Poly1305, so
 * records frame identically; the tag sits in front of the ciphertext.
 */
export class XSalsa20Poly1305 extends BaseAEAD {
  public static readonly KEY_LENGTH: number = 32;
  public static readonly NONCE_LENGTH: number = 24;
  public static readonly TAG_LENGTH: number = 16;

  public readonly KEY_LENGTH   = XSalsa20Poly1305.KEY_LENGTH;
  public readonly NONCE_LENGTH = XSalsa20Poly1305.NONCE_LENGTH;
  public readonly TAG_LENGTH   = XSalsa20Poly1305.TAG_LENGTH;

  constructor(key: Uint8Array) { super(key, XSalsa20Poly1305.KEY_LENGTH); }

  protected sealWithKey(key: Uint8Array, nonce: Uint8Array, plain: Uint8Array): Uint8Array {
    return xsalsa20poly1305(key, nonce).encrypt(plain);
  }

  protected openWithKey(key: Uint8Array, nonce: Uint8Array, sealed: Uint8Array): Uint8Array {
    return xsalsa20poly1305(key, nonce).decrypt(sealed);
  }
}
