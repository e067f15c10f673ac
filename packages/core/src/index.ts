// packages/core/src/index.ts

import { DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE } from './config/defaults.js';
import { AlgorithmRegistry } from './config/AlgorithmRegistry.js';
import { parseHeader } from './header/decoder.js';
import { HEADER_BYTES } from './header/constants.js';
import { StreamEncryptor, validateChunkSize } from './stream/StreamEncryptor.js';
import { StreamDecryptor } from './stream/StreamDecryptor.js';
import { EncryptTransform } from './stream/EncryptTransform.js';
import { DecryptTransform } from './stream/DecryptTransform.js';
import { collectStream, readableFrom, type ChunkInput } from './util/stream.js';
import { base64Decode, base64Encode, hexEncode } from './util/bytes.js';
import { decodeFrameLen, FRAME_HEADER_BYTES } from './util/frame.js';
import { ByteSource, type RandomAccessSource } from './util/ByteSource.js';
import { createLogger, type Logger, type Verbosity } from './util/logger.js';
import type { CryptoProvider } from './providers/CryptoProvider.js';
import type { AlgorithmDescriptor, AlgorithmId, AlgorithmName } from './types/index.js';
import { HeaderInvalidError } from './errors/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring SealStream instances.
 */
export interface SealStreamOptions {
  /** Algorithm for new streams (id or name); defaults to XChaCha20-Poly1305 */
  algorithm?    : AlgorithmId | AlgorithmName;
  /** Plaintext bytes per chunk; defaults to 64 KiB */
  chunkSize?    : number;
  /** Largest chunk size accepted from a header when decrypting */
  maxChunkSize? : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?      : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?       : (msg: string) => void;
}

/** Header fields plus framing statistics; produced without a key. */
export interface InspectResult {
  version        : number;
  algorithm      : AlgorithmName;
  algorithmId    : AlgorithmId;
  chunkSize      : number;
  baseNonce      : string;           // hex
  headerLength   : number;
  records        : number;
  ciphertextBytes: number;           // sum of record lengths, tags included
  plaintextBytes : number;           // what decryption would yield if every record authenticates
  trailingBytes  : number;           // bytes that do not form a whole record
}

/**
 * SealStream provides high-level chunked encryption for buffers, text,
 * blobs and WHATWG streams on top of {@link StreamEncryptor} and
 * {@link StreamDecryptor}.
 */
export class SealStream {
  private algorithm    : AlgorithmDescriptor;
  private chunkSize    : number;
  private maxChunkSize : number;

  private readonly log : Logger;

  constructor(
    private readonly provider: CryptoProvider,
    opt: SealStreamOptions = {},
  ) {
    this.algorithm    = opt.algorithm === undefined
      ? AlgorithmRegistry.current
      : AlgorithmRegistry.resolve(opt.algorithm);
    this.chunkSize    = validateChunkSize(opt.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.maxChunkSize = opt.maxChunkSize ?? MAX_CHUNK_SIZE;
    this.log          = createLogger(opt.verbose ?? 0, opt.logger);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Check whether the input starts with a valid stream header.
   */
  static async isSealed(input: string | Uint8Array | Blob): Promise<boolean> {
    try {
      const src = new ByteSource(input);
      if (src.length < HEADER_BYTES) return false;
      parseHeader(await src.read(0, HEADER_BYTES));
      return true;
    } catch {
      return false;
    }
  }

  static isRandomAccessSource(input: unknown): input is RandomAccessSource {
    return (
      typeof input === 'object' &&
      input !== null &&
      'read' in input &&
      typeof input.read === 'function' &&
      'length' in input &&
      typeof input.length === 'number'
    );
  }

  /**
   * Parse the header and walk the record length prefixes.
   * This never decrypts, so it cannot tell whether the last record is final.
   */
  static async inspect(
    input: string | Uint8Array | Blob | RandomAccessSource,
  ): Promise<InspectResult> {
    const src: RandomAccessSource = SealStream.isRandomAccessSource(input)
      ? input
      : new ByteSource(input);

    const total = src.length;
    if (total < HEADER_BYTES) {
      throw new HeaderInvalidError('truncated-header', `Input holds ${total} of ${HEADER_BYTES} header bytes`);
    }
    const header = parseHeader(await src.read(0, HEADER_BYTES));
    const tagLen = header.algorithm.cipher.TAG_LENGTH;
    const maxLen = header.chunkSize + tagLen;

    let offset = HEADER_BYTES;
    let records = 0;
    let ciphertextBytes = 0;

    while (offset + FRAME_HEADER_BYTES <= total) {
      const len = decodeFrameLen(await src.read(offset, FRAME_HEADER_BYTES));
      if (len < tagLen || len > maxLen || offset + FRAME_HEADER_BYTES + len > total) break;
      records++;
      ciphertextBytes += len;
      offset += FRAME_HEADER_BYTES + len;
    }

    return {
      version        : header.version,
      algorithm      : header.algorithm.name,
      algorithmId    : header.algorithm.id,
      chunkSize      : header.chunkSize,
      baseNonce      : hexEncode(header.baseNonce),
      headerLength   : HEADER_BYTES,
      records,
      ciphertextBytes,
      plaintextBytes : ciphertextBytes - records * tagLen,
      trailingBytes  : total - offset,
    };
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Setters / getters for run-time flexibility
  // ════════════════════════════════════════════════════════════════════════

  /** Change the algorithm used for future encryptions. Decryption follows the header. */
  setAlgorithm(ref: AlgorithmId | AlgorithmName): void { this.algorithm = AlgorithmRegistry.resolve(ref); }
  getAlgorithm(): AlgorithmName                       { return this.algorithm.name; }

  setChunkSize(bytes: number): number {
    this.chunkSize = validateChunkSize(bytes);
    return this.chunkSize;
  }
  getChunkSize(): number                     { return this.chunkSize; }

  setVerbose(level: Verbosity): void         { this.log.level = level; }
  getVerbose(): Verbosity                    { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  State machines
  // ════════════════════════════════════════════════════════════════════════

  createEncryptor(key: Uint8Array): StreamEncryptor {
    return new StreamEncryptor(key, {
      chunkSize : this.chunkSize,
      algorithm : this.algorithm.id,
      provider  : this.provider,
      logger    : this.log,
    });
  }

  createDecryptor(key: Uint8Array): StreamDecryptor {
    return new StreamDecryptor(key, { maxChunkSize: this.maxChunkSize, logger: this.log });
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Buffers and text
  // ════════════════════════════════════════════════════════════════════════

  async encrypt(data: Uint8Array | string, key: Uint8Array): Promise<Uint8Array> {
    const plain = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    this.log.log(2, `Encrypting ${plain.byteLength} B`);
    return collectStream(
      readableFrom(plain, this.chunkSize).pipeThrough(this.createEncryptionStream(key)),
    );
  }

  async decrypt(data: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
    this.log.log(2, `Decrypting ${data.byteLength} B`);
    return collectStream(
      readableFrom(data, this.chunkSize).pipeThrough(this.createDecryptionStream(key)),
    );
  }

  /** Encrypt UTF-8 text and return the sealed stream as Base64. */
  async encryptText(text: string, key: Uint8Array): Promise<string> {
    return base64Encode(await this.encrypt(text, key));
  }

  async decryptText(b64: string, key: Uint8Array): Promise<string> {
    const plain = await this.decrypt(base64Decode(b64), key);
    return new TextDecoder().decode(plain);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Blobs
  // ════════════════════════════════════════════════════════════════════════

  async encryptBlob(file: Blob, key: Uint8Array): Promise<Blob> {
    const sealed = await collectStream(file.stream().pipeThrough(this.createEncryptionStream(key)));
    return new Blob([sealed], { type: 'application/octet-stream' });
  }

  async decryptBlob(file: Blob, key: Uint8Array): Promise<Blob> {
    const plain = await collectStream(file.stream().pipeThrough(this.createDecryptionStream(key)));
    return new Blob([plain], { type: 'application/octet-stream' });
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Streams
  // ════════════════════════════════════════════════════════════════════════

  /** Plaintext in, `header ‖ record*` out. */
  createEncryptionStream(key: Uint8Array): TransformStream<ChunkInput, Uint8Array> {
    return new EncryptTransform(this.createEncryptor(key)).toTransformStream();
  }

  /** `header ‖ record*` in, plaintext out. Errors on the first integrity failure. */
  createDecryptionStream(key: Uint8Array): TransformStream<ChunkInput, Uint8Array> {
    return new DecryptTransform(this.createDecryptor(key)).toTransformStream();
  }
}

export { StreamEncryptor, validateChunkSize, type EncryptorOptions, type EncryptorState } from './stream/StreamEncryptor.js';
export { StreamDecryptor, KEY_BYTES, type DecryptorOptions, type DecryptorState } from './stream/StreamDecryptor.js';
export { EncryptTransform } from './stream/EncryptTransform.js';
export { DecryptTransform } from './stream/DecryptTransform.js';
export { openEncryptor, openDecryptor, EncryptorSession, DecryptorSession } from './stream/sessions.js';
export { NonceSequencer, MAX_CHUNK_INDEX, NONCE_PREFIX_BYTES } from './nonce/NonceSequencer.js';
export { writeHeader } from './header/encoder.js';
export { parseHeader, readHeader } from './header/decoder.js';
export { HEADER_BYTES, HEADER_MAGIC, FORMAT_VERSION } from './header/constants.js';
export { writeRecord, readRecord } from './util/frame.js';
export { ByteQueue } from './util/ByteQueue.js';
export { AlgorithmRegistry } from './config/AlgorithmRegistry.js';
export { DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE } from './config/defaults.js';
export { createLogger, silentLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export { concat, base64Encode, base64Decode, hexEncode, hexDecode } from './util/bytes.js';
export { ByteSource, type RandomAccessSource } from './util/ByteSource.js';
export { collectStream, readableFrom, type ChunkInput } from './util/stream.js';
export { webcryptoProvider, type CryptoProvider } from './providers/CryptoProvider.js';
export * from './errors/index.js';
export type * from './types/index.js';
