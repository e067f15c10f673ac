/* ------------------------- AEAD backend ------------------------------ */

/**
 * A keyed AEAD primitive with a caller-supplied 24-byte nonce.
 * `open` throws {@link AuthenticationFailureError} on any tag mismatch.
 */
export interface AeadCipher {
  seal(nonce: Uint8Array, plain : Uint8Array): Uint8Array;
  open(nonce: Uint8Array, sealed: Uint8Array): Uint8Array;
  zeroKey(): void;
  readonly KEY_LENGTH: number;
  readonly NONCE_LENGTH: number;
  readonly TAG_LENGTH: number;
}

export interface CipherConstructor {
  /* static */ readonly KEY_LENGTH: number;
  /* static */ readonly NONCE_LENGTH: number;
  /* static */ readonly TAG_LENGTH: number;
  new (key: Uint8Array): AeadCipher;
}

/* ---------------------------------------------------------------------
   Closed set of sealing backends selectable through the header's
   algorithm byte. Every variant is a 256-bit key / 192-bit nonce /
   128-bit tag AEAD, so the framing is identical for all of them.
--------------------------------------------------------------------- */
export type AlgorithmDescriptor =
  | { readonly id: 0x01; readonly name: 'xchacha20-poly1305'; readonly cipher: CipherConstructor }
  | { readonly id: 0x02; readonly name: 'xsalsa20-poly1305';  readonly cipher: CipherConstructor };

export type AlgorithmId   = AlgorithmDescriptor['id'];
export type AlgorithmName = AlgorithmDescriptor['name'];

/* ------------------------- Stream header ----------------------------- */
export interface StreamHeader {
  readonly version    : number;
  readonly algorithm  : AlgorithmDescriptor;
  readonly chunkSize  : number;
  readonly baseNonce  : Uint8Array;
  /** The exact 34 bytes as they appeared on the wire */
  readonly raw        : Uint8Array;
}

/* ------------------------- Framer read results ----------------------- */

/**
 * `pending`: not enough bytes buffered yet, more may arrive.
 * `eof`:     the source ended cleanly on a unit boundary.
 */
export type ReadResult<T> =
  | { readonly status: 'ok'; readonly value: T }
  | { readonly status: 'pending' }
  | { readonly status: 'eof' };

