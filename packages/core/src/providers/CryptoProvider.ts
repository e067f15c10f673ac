import { randomBytes } from '@noble/ciphers/webcrypto.js';

/** Source of cryptographically secure randomness for base nonces. */
export interface CryptoProvider {
  getRandomValues(buf: Uint8Array): Uint8Array;
}

/** Runtime-agnostic provider backed by the platform's `crypto.getRandomValues`. */
export const webcryptoProvider: CryptoProvider = {
  getRandomValues(buf) {
    buf.set(randomBytes(buf.byteLength));
    return buf;
  },
};
