// packages/core/src/stream/StreamDecryptor.ts
import { readHeader } from '../header/decoder.js';
import { NonceSequencer } from '../nonce/NonceSequencer.js';
import { ByteQueue } from '../util/ByteQueue.js';
import { concat, wipe } from '../util/bytes.js';
import { readRecord } from '../util/frame.js';
import { silentLogger, type Logger } from '../util/logger.js';
import {
  AuthenticationFailureError,
  InvalidKeyError,
  SessionClosedError,
  StreamIntegrityError,
  TrailingDataError,
  TruncatedStreamError,
} from '../errors/index.js';
import type { AeadCipher, StreamHeader } from '../types/index.js';

/** Every registered backend takes a 256-bit key */
export const KEY_BYTES = 32 as const;

export interface DecryptorOptions {
  /** Reject headers announcing a larger chunk size; defaults to MAX_CHUNK_SIZE */
  maxChunkSize? : number;
  logger?       : Logger;
}

export type DecryptorState = 'init' | 'streaming' | 'complete' | 'failed';

/**
 * `header ‖ record*` → plaintext state machine.
 *
 * Feed it byte slices of any size through {@link processNext}; it returns the
 * plaintext of every record that completed and authenticated. Call
 * {@link finish} at end of input: a stream is only valid once a record opened
 * under the final-chunk nonce, whatever the transport says about EOF.
 *
 * Any integrity failure moves the session to `failed` for good and the
 * plaintext of the failing call is dropped.
 */
export class StreamDecryptor {
  private readonly queue = new ByteQueue();
  private readonly log   : Logger;
  private readonly maxChunkSize? : number;

  private key       : Uint8Array | null;
  private cipher    : AeadCipher | null = null;
  private nonces    : NonceSequencer | null = null;
  private parsed    : StreamHeader | null = null;
  private index     = 0n;
  private state     : DecryptorState = 'init';

  constructor(key: Uint8Array, opt: DecryptorOptions = {}) {
    if (!(key instanceof Uint8Array) || key.byteLength !== KEY_BYTES) {
      throw new InvalidKeyError(`Key must be ${KEY_BYTES} bytes`);
    }
    this.key          = new Uint8Array(key);
    this.maxChunkSize = opt.maxChunkSize;
    this.log          = opt.logger ?? silentLogger;
  }

  /** Parsed header, once enough bytes arrived */
  get header(): StreamHeader | null { return this.parsed; }

  /** Number of chunks authenticated so far */
  get chunkIndex(): bigint { return this.index; }

  get status(): DecryptorState { return this.state; }

  isFinished(): boolean { return this.state === 'complete'; }

  /**
   * Append `buffer` and return the plaintext of every record it completed,
   * or `null` if none did.
   * @throws {StreamIntegrityError} On any framing, authentication or trailing-data failure.
   * @throws {SessionClosedError} If the session already failed.
   */
  processNext(buffer: Uint8Array): Uint8Array | null {
    if (this.state === 'complete') {
      if (buffer.byteLength) {
        this.fail(new TrailingDataError(`${buffer.byteLength} B after the final chunk`));
      }
      return null;
    }
    this.assertUsable();
    this.queue.push(new Uint8Array(buffer));
    return this.drain();
  }

  /**
   * Signal end of input. Succeeds only if the final chunk was authenticated
   * and nothing but whole records preceded it.
   * @throws {HeaderInvalidError | TruncatedRecordError | TruncatedStreamError}
   */
  finish(): void {
    if (this.state === 'complete') return;
    this.assertUsable();
    this.queue.end();
    this.drain();
  }

  /** Drop buffered bytes and key material; the session becomes `failed`. */
  abort(): void {
    if (this.state === 'complete' || this.state === 'failed') return;
    this.state = 'failed';
    this.wipeSession();
    this.log.log(2, `Decryptor aborted at chunk ${this.index}`);
  }

  // ---------------- internals ----------------

  private drain(): Uint8Array | null {
    const out: Uint8Array[] = [];
    try {
      if (this.state === 'init') {
        const r = readHeader(this.queue, { maxChunkSize: this.maxChunkSize });
        if (r.status !== 'ok') return null;
        this.begin(r.value);
      }

      while (this.state === 'streaming') {
        const r = readRecord(this.queue, this.maxRecordLength());
        if (r.status === 'pending') break;
        if (r.status === 'eof') {
          throw new TruncatedStreamError(`Input ended after ${this.index} chunk(s) without a final chunk`);
        }
        out.push(this.openRecord(r.value));
      }

      if (this.state === 'complete' && this.queue.length) {
        throw new TrailingDataError(`${this.queue.length} B after the final chunk`);
      }
    } catch (err) {
      for (const p of out) wipe(p);
      this.fail(err);
    }
    return out.length ? concat(...out) : null;
  }

  private begin(header: StreamHeader): void {
    const key = this.requireKey();
    this.cipher = new header.algorithm.cipher(key);
    this.nonces = new NonceSequencer(header.baseNonce);
    this.parsed = header;
    this.state  = 'streaming';
    wipe(key);
    this.key = null;
    this.log.log(1, `Decryptor open: ${header.algorithm.name}, chunk size ${header.chunkSize}`);
  }

  /**
   * Open under the locally tracked index. The non-final nonce is tried first;
   * a record that only opens as final ends the stream.
   */
  private openRecord(sealed: Uint8Array): Uint8Array {
    const cipher = this.requireCipher();
    const nonces = this.requireNonces();

    for (const isFinal of [false, true]) {
      let plain: Uint8Array;
      try {
        plain = cipher.open(nonces.derive(this.index, isFinal), sealed);
      } catch (err) {
        if (err instanceof AuthenticationFailureError) continue;
        throw err;
      }

      this.log.log(3, `Opened chunk ${this.index} (${plain.byteLength} B${isFinal ? ', final' : ''})`);
      this.index++;
      if (isFinal) {
        this.state = 'complete';
        cipher.zeroKey();
        this.log.log(1, `Decryptor complete after ${this.index} chunk(s)`);
      }
      return plain;
    }
    throw new AuthenticationFailureError(`Chunk ${this.index} failed authentication`);
  }

  private maxRecordLength(): number {
    return this.requireHeader().chunkSize + this.requireCipher().TAG_LENGTH;
  }

  private fail(err: unknown): never {
    this.state = 'failed';
    this.wipeSession();
    if (err instanceof StreamIntegrityError) {
      this.log.log(2, `Decryption failed: ${err.name}: ${err.detail}`);
    }
    throw err;
  }

  private wipeSession(): void {
    this.queue.clear();
    this.cipher?.zeroKey();
    wipe(this.key);
    this.key = null;
  }

  private assertUsable(): void {
    if (this.state === 'failed') throw new SessionClosedError('Decryptor has failed');
  }

  private requireKey(): Uint8Array {
    if (!this.key) throw new InvalidKeyError('Decryption key has been zeroed');
    return this.key;
  }
  private requireCipher(): AeadCipher {
    if (!this.cipher) throw new SessionClosedError('Header not read yet');
    return this.cipher;
  }
  private requireNonces(): NonceSequencer {
    if (!this.nonces) throw new SessionClosedError('Header not read yet');
    return this.nonces;
  }
  private requireHeader(): StreamHeader {
    if (!this.parsed) throw new SessionClosedError('Header not read yet');
    return this.parsed;
  }
}
