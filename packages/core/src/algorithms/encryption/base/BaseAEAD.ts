// packages/core/src/algorithms/encryption/base/BaseAEAD.ts
import { AuthenticationFailureError, InvalidKeyError } from '../../../errors/index.js';
import type { AeadCipher } from '../../../types/index.js';

/**
 * ## BaseAEAD
 *
 * Shared shell for the 24-byte-nonce AEAD backends. It owns the raw key copy,
 * validates nonce and ciphertext lengths, and maps any failure of the
 * underlying library during `open` to {@link AuthenticationFailureError}.
 *
 * Subclasses implement only cipher-specific work
 * ({@link sealWithKey}, {@link openWithKey}).
 *
 * ### Key handling
 * - The constructor copies the caller's key; the caller may wipe its own buffer.
 * - {@link zeroKey} overwrites the copy. Later calls throw until a new instance
 *   is created.
 */
export abstract class BaseAEAD implements AeadCipher {
  public abstract readonly KEY_LENGTH: number;
  public abstract readonly NONCE_LENGTH: number;
  public abstract readonly TAG_LENGTH: number;

  private key: Uint8Array | null;

  constructor(key: Uint8Array, keyLength: number) {
    if (!(key instanceof Uint8Array) || key.byteLength !== keyLength) {
      throw new InvalidKeyError(`Key must be ${keyLength} bytes`);
    }
    this.key = new Uint8Array(key);
  }

  public seal(nonce: Uint8Array, plain: Uint8Array): Uint8Array {
    this.assertNonce(nonce);
    return this.sealWithKey(this.requireRawKey(), nonce, plain);
  }

  /**
   * @throws {AuthenticationFailureError} If the input is shorter than a tag or
   *  authentication fails for any reason (wrong key, nonce or tampered bytes).
   */
  public open(nonce: Uint8Array, sealed: Uint8Array): Uint8Array {
    this.assertNonce(nonce);
    if (sealed.byteLength < this.TAG_LENGTH) {
      throw new AuthenticationFailureError(`Sealed chunk shorter than tag (${sealed.byteLength} B)`);
    }
    const key = this.requireRawKey();
    try {
      return this.openWithKey(key, nonce, sealed);
    } catch {
      throw new AuthenticationFailureError('Tag mismatch');
    }
  }

  public zeroKey(): void {
    if (this.key) this.key.fill(0);
    this.key = null;
  }

  /** **Subclass hook:** returns `ciphertext` and tag, `TAG_LENGTH` bytes longer than `plain`. */
  protected abstract sealWithKey(key: Uint8Array, nonce: Uint8Array, plain: Uint8Array): Uint8Array;

  /** **Subclass hook:** may throw anything on failure; the base maps it. */
  protected abstract openWithKey(key: Uint8Array, nonce: Uint8Array, sealed: Uint8Array): Uint8Array;

  private assertNonce(nonce: Uint8Array): void {
    if (nonce.byteLength !== this.NONCE_LENGTH) {
      throw new RangeError(`Nonce must be ${this.NONCE_LENGTH} bytes, got ${nonce.byteLength}`);
    }
  }

  private requireRawKey(): Uint8Array {
    if (!this.key) throw new InvalidKeyError('Encryption key has been zeroed');
    return this.key;
  }
}
