// packages/core/src/stream/StreamEncryptor.ts
import { DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE } from '../config/defaults.js';
import { AlgorithmRegistry } from '../config/AlgorithmRegistry.js';
import { writeHeader } from '../header/encoder.js';
import { BASE_NONCE_BYTES } from '../header/constants.js';
import { NonceSequencer } from '../nonce/NonceSequencer.js';
import { ByteQueue } from '../util/ByteQueue.js';
import { concat, wipe } from '../util/bytes.js';
import { writeRecord } from '../util/frame.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { webcryptoProvider, type CryptoProvider } from '../providers/CryptoProvider.js';
import {
  ChunkTooLargeError,
  ConfigurationError,
  SessionClosedError,
} from '../errors/index.js';
import type {
  AeadCipher,
  AlgorithmDescriptor,
  AlgorithmId,
  AlgorithmName,
} from '../types/index.js';

export interface EncryptorOptions {
  /** Plaintext bytes per chunk (1 … MAX_CHUNK_SIZE); defaults to 64 KiB */
  chunkSize? : number;
  /** Header algorithm id or name; defaults to XChaCha20-Poly1305 */
  algorithm? : AlgorithmId | AlgorithmName;
  /** CSPRNG for the base nonce */
  provider?  : CryptoProvider;
  logger?    : Logger;
}

export type EncryptorState = 'streaming' | 'finalized' | 'failed';

export function validateChunkSize(size: number): number {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigurationError(`Invalid chunkSize: ${size}. Must be a positive integer.`);
  }
  if (size > MAX_CHUNK_SIZE) {
    throw new ConfigurationError(`chunkSize cannot exceed ${MAX_CHUNK_SIZE} bytes.`);
  }
  return size;
}

/**
 * Plaintext → `header ‖ record*` state machine.
 *
 * Construction draws a fresh base nonce and builds the header; the header is
 * prepended to whatever the first call hands back. Every record but the last
 * is sealed with `isFinal = false`; only {@link finalize} seals the final one.
 *
 * Two ways to drive it:
 *   • {@link encryptChunk} seals exactly what it is given, immediately.
 *   • {@link processNext} buffers and holds back up to one chunk so that the
 *     last chunk of the input becomes the final record.
 */
export class StreamEncryptor {
  readonly header    : Uint8Array;
  readonly chunkSize : number;
  readonly algorithm : AlgorithmDescriptor;

  private readonly cipher  : AeadCipher;
  private readonly nonces  : NonceSequencer;
  private readonly pending = new ByteQueue();
  private readonly log     : Logger;

  private index         = 0n;
  private state         : EncryptorState = 'streaming';
  private headerEmitted = false;

  constructor(key: Uint8Array, opt: EncryptorOptions = {}) {
    this.chunkSize = validateChunkSize(opt.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.algorithm = opt.algorithm === undefined
      ? AlgorithmRegistry.current
      : AlgorithmRegistry.resolve(opt.algorithm);
    this.cipher    = new this.algorithm.cipher(key);
    this.log       = opt.logger ?? silentLogger;

    const provider  = opt.provider ?? webcryptoProvider;
    const baseNonce = provider.getRandomValues(new Uint8Array(BASE_NONCE_BYTES));
    this.nonces = new NonceSequencer(baseNonce);
    this.header = writeHeader(baseNonce, this.chunkSize, this.algorithm.id);

    this.log.log(1, `Encryptor open: ${this.algorithm.name}, chunk size ${this.chunkSize}`);
  }

  /** Index the next sealed chunk will carry */
  get chunkIndex(): bigint { return this.index; }

  get status(): EncryptorState { return this.state; }

  isFinished(): boolean { return this.state === 'finalized'; }

  /**
   * Seal `plain` as the next non-final chunk. Any input still buffered by
   * {@link processNext} is sealed first so order is preserved.
   * @throws {ChunkTooLargeError} If `plain` exceeds the chunk size (session stays usable).
   */
  encryptChunk(plain: Uint8Array): Uint8Array {
    this.assertOpen();
    this.assertChunkFits(plain);

    const out: Uint8Array[] = [this.takeHeader()];
    if (this.pending.length) out.push(this.sealPending(this.pending.length, false));
    out.push(this.seal(plain, false));
    return concat(...out);
  }

  /**
   * Buffer `buffer` and return every record that is now known not to be the
   * last one (plus the header on first use), or `null` if nothing is ready.
   */
  processNext(buffer: Uint8Array): Uint8Array | null {
    this.assertOpen();
    this.pending.push(new Uint8Array(buffer));

    const out: Uint8Array[] = [this.takeHeader()];
    while (this.pending.length > this.chunkSize) {
      out.push(this.sealPending(this.chunkSize, false));
    }
    const bytes = concat(...out);
    return bytes.byteLength ? bytes : null;
  }

  /**
   * Seal the remaining input (buffered bytes followed by `last`, possibly
   * empty) and close the session. The last record carries `isFinal = true`.
   */
  finalize(last: Uint8Array = new Uint8Array(0)): Uint8Array {
    this.assertOpen();
    this.assertChunkFits(last);
    this.pending.push(new Uint8Array(last));

    const out: Uint8Array[] = [this.takeHeader()];
    while (this.pending.length > this.chunkSize) {
      out.push(this.sealPending(this.chunkSize, false));
    }
    out.push(this.sealPending(this.pending.length, true));

    this.state = 'finalized';
    this.cipher.zeroKey();
    this.log.log(1, `Encryptor finalized after ${this.index} chunk(s)`);
    return concat(...out);
  }

  /** Discard buffered input and fail the session (e.g. the sink went away). */
  abort(): void {
    if (this.state !== 'streaming') return;
    this.fail();
  }

  // ---------------- internals ----------------

  private takeHeader(): Uint8Array {
    if (this.headerEmitted) return new Uint8Array(0);
    this.headerEmitted = true;
    return this.header;
  }

  private sealPending(n: number, isFinal: boolean): Uint8Array {
    const plain = this.pending.take(n);
    try {
      return this.seal(plain, isFinal);
    } finally {
      wipe(plain);
    }
  }

  private seal(plain: Uint8Array, isFinal: boolean): Uint8Array {
    let record: Uint8Array;
    try {
      const nonce = this.nonces.derive(this.index, isFinal);
      record = writeRecord(this.cipher.seal(nonce, plain));
    } catch (err) {
      this.fail();
      throw err;
    }
    this.log.log(3, `Sealed chunk ${this.index} (${plain.byteLength} B${isFinal ? ', final' : ''})`);
    this.index++;
    return record;
  }

  private assertChunkFits(plain: Uint8Array): void {
    if (plain.byteLength > this.chunkSize) {
      throw new ChunkTooLargeError(
        `Chunk of ${plain.byteLength} B exceeds chunk size ${this.chunkSize} B`,
      );
    }
  }

  private assertOpen(): void {
    if (this.state !== 'streaming') {
      throw new SessionClosedError(`Encryptor is ${this.state}`);
    }
  }

  private fail(): void {
    this.state = 'failed';
    this.pending.clear();
    this.cipher.zeroKey();
    this.log.log(2, `Encryptor failed at chunk ${this.index}`);
  }
}
