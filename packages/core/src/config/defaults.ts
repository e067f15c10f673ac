import { AlgorithmRegistry } from './AlgorithmRegistry.js';
import { XChaCha20Poly1305 } from '../algorithms/encryption/xchacha20poly1305/XChaCha20-Poly1305.js';
import { XSalsa20Poly1305 } from '../algorithms/encryption/xsalsa20poly1305/XSalsa20-Poly1305.js';

/** Plaintext bytes per chunk unless the caller picks another size */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Largest chunk size an encryptor accepts and, by default, the largest
 * header value a decryptor will honour. Bounds per-session memory.
 */
export const MAX_CHUNK_SIZE = 64 * 1024 * 1024;

AlgorithmRegistry.register({ id: 0x01, name: 'xchacha20-poly1305', cipher: XChaCha20Poly1305 });
AlgorithmRegistry.register({ id: 0x02, name: 'xsalsa20-poly1305',  cipher: XSalsa20Poly1305 });
