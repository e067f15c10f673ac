// packages/core/src/stream/sessions.ts
import { StreamEncryptor, type EncryptorOptions } from './StreamEncryptor.js';
import { StreamDecryptor, type DecryptorOptions } from './StreamDecryptor.js';
import { StreamIOError } from '../errors/index.js';
import { silentLogger, type Logger } from '../util/logger.js';
import type { StreamHeader } from '../types/index.js';

/**
 * Encryptor bound to a WHATWG sink. The header is written when the session
 * opens; each call appends records; {@link finalize} writes the final record
 * and closes the sink.
 */
export class EncryptorSession {
  private constructor(
    private readonly encryptor: StreamEncryptor,
    private readonly writer: WritableStreamDefaultWriter<Uint8Array>,
  ) {}

  static async open(
    sink: WritableStream<Uint8Array>,
    key : Uint8Array,
    opt : EncryptorOptions = {},
  ): Promise<EncryptorSession> {
    const session = new EncryptorSession(new StreamEncryptor(key, opt), sink.getWriter());
    const head = session.encryptor.processNext(new Uint8Array(0));
    if (head) await session.write(head);
    return session;
  }

  get header(): Uint8Array { return this.encryptor.header; }

  isFinished(): boolean { return this.encryptor.isFinished(); }

  /** Encrypt and write; returns the bytes handed to the sink (or `null`). */
  async processNext(buffer: Uint8Array): Promise<Uint8Array | null> {
    const out = this.encryptor.processNext(buffer);
    if (out) await this.write(out);
    return out;
  }

  async finalize(): Promise<void> {
    await this.write(this.encryptor.finalize());
    try {
      await this.writer.close();
    } catch (err) {
      throw new StreamIOError('Closing the sink failed', err);
    }
  }

  private async write(bytes: Uint8Array): Promise<void> {
    try {
      await this.writer.write(bytes);
    } catch (err) {
      this.encryptor.abort();
      throw new StreamIOError('Writing to the sink failed', err);
    }
  }
}

/**
 * Decryptor pulling from a WHATWG source. {@link processNext} resolves with
 * the next authenticated plaintext, or `null` once the final chunk was
 * verified and the source ended with nothing after it.
 *
 * Source failures surface as {@link StreamIOError}; ciphertext failures as
 * the decryptor's integrity errors. Either one ends the session.
 */
export class DecryptorSession implements AsyncIterable<Uint8Array> {
  private done = false;

  private constructor(
    private readonly decryptor: StreamDecryptor,
    private readonly reader: ReadableStreamDefaultReader<Uint8Array>,
    private readonly log: Logger,
  ) {}

  static open(
    source: ReadableStream<Uint8Array>,
    key   : Uint8Array,
    opt   : DecryptorOptions = {},
  ): DecryptorSession {
    return new DecryptorSession(
      new StreamDecryptor(key, opt),
      source.getReader(),
      opt.logger ?? silentLogger,
    );
  }

  get header(): StreamHeader | null { return this.decryptor.header; }

  isFinished(): boolean { return this.done && this.decryptor.isFinished(); }

  async processNext(): Promise<Uint8Array | null> {
    if (this.done) return null;

    for (;;) {
      const next = await this.readNext();
      try {
        if (next.done) {
          this.reader.releaseLock();
          this.done = true;
          this.decryptor.finish();
          return null;
        }
        const plain = this.decryptor.processNext(next.value);
        if (plain && plain.byteLength) return plain;
      } catch (err) {
        await this.release(err);
        throw err;
      }
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    for (;;) {
      const chunk = await this.processNext();
      if (chunk === null) return;
      yield chunk;
    }
  }

  private async readNext() {
    try {
      return await this.reader.read();
    } catch (err) {
      this.done = true;
      this.decryptor.abort();
      throw new StreamIOError('Reading from the source failed', err);
    }
  }

  private async release(reason: unknown): Promise<void> {
    if (this.done) return;
    this.done = true;
    await this.reader.cancel(reason).catch((err: unknown) => {
      this.log.log(2, `Cancelling the source failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  }
}

export function openEncryptor(
  sink: WritableStream<Uint8Array>,
  key : Uint8Array,
  opt : EncryptorOptions = {},
): Promise<EncryptorSession> {
  return EncryptorSession.open(sink, key, opt);
}

/** The chunk size is taken from the stream header, never from the caller. */
export function openDecryptor(
  source: ReadableStream<Uint8Array>,
  key   : Uint8Array,
  opt   : DecryptorOptions = {},
): DecryptorSession {
  return DecryptorSession.open(source, key, opt);
}
