import { StreamEncryptor } from '../src/stream/StreamEncryptor.js';
import { StreamDecryptor } from '../src/stream/StreamDecryptor.js';
import { concat } from '../src/util/bytes.js';
import { encodeFrameLen } from '../src/util/frame.js';
import { createLogger } from '../src/util/logger.js';
import {
  AuthenticationFailureError,
  HeaderInvalidError,
  InvalidKeyError,
  RecordTooLargeError,
  SessionClosedError,
  StreamIntegrityError,
  TrailingDataError,
  TruncatedRecordError,
  TruncatedStreamError,
} from '../src/errors/index.js';
import { KEY, OTHER_KEY, bytes, feed, fixedProvider } from './_helper.js';

/*
 * 40 B at chunk size 16:
 *   header      [  0,  34)
 *   record 0    [ 34,  70)   len 32
 *   record 1    [ 70, 106)   len 32
 *   record 2    [106, 134)   len 24, final
 */
function sealed40(): Uint8Array {
  const enc = new StreamEncryptor(KEY, { chunkSize: 16, provider: fixedProvider });
  return concat(enc.processNext(bytes(40)) ?? new Uint8Array(0), enc.finalize());
}

describe('StreamDecryptor', () => {
  it('recovers the plaintext whatever the slice size', () => {
    const s = sealed40();
    expect(s.length).toBe(134);
    for (const step of [1, 3, 34, 35, 134]) {
      expect(feed(new StreamDecryptor(KEY), s, step)).toEqual(bytes(40));
    }
  });

  it('exposes the parsed header and completes', () => {
    const dec = new StreamDecryptor(KEY);
    expect(dec.header).toBeNull();
    feed(dec, sealed40());
    expect(dec.header?.chunkSize).toBe(16);
    expect(dec.chunkIndex).toBe(3n);
    expect(dec.isFinished()).toBe(true);
  });

  it('returns nothing until a record is complete', () => {
    const s   = sealed40();
    const dec = new StreamDecryptor(KEY);
    expect(dec.processNext(s.subarray(0, 69))).toBeNull();
    expect(dec.processNext(s.subarray(69, 70))).toEqual(bytes(16));
  });

  it('rejects a flipped ciphertext bit', () => {
    const s = sealed40();
    s[50] ^= 0x80;
    expect(() => feed(new StreamDecryptor(KEY), s)).toThrow(AuthenticationFailureError);
  });

  it('rejects a modified base nonce', () => {
    const s = sealed40();
    s[20] ^= 0x01;
    expect(() => feed(new StreamDecryptor(KEY), s)).toThrow(AuthenticationFailureError);
  });

  it('rejects the wrong key with the generic message', () => {
    expect(() => feed(new StreamDecryptor(OTHER_KEY), sealed40())).toThrow('stream invalid or tampered');
  });

  it('rejects swapped records', () => {
    const s = sealed40();
    const swapped = concat(s.subarray(0, 34), s.subarray(70, 106), s.subarray(34, 70), s.subarray(106));
    expect(() => feed(new StreamDecryptor(KEY), swapped)).toThrow(AuthenticationFailureError);
  });

  it('rejects a dropped middle record', () => {
    const s = sealed40();
    const dropped = concat(s.subarray(0, 70), s.subarray(106));
    expect(() => feed(new StreamDecryptor(KEY), dropped)).toThrow(AuthenticationFailureError);
  });

  it('detects a stream cut on a record boundary', () => {
    const dec = new StreamDecryptor(KEY);
    expect(dec.processNext(sealed40().subarray(0, 106))).toEqual(bytes(32));
    expect(() => dec.finish()).toThrow(TruncatedStreamError);
    expect(dec.status).toBe('failed');
  });

  it('detects a stream cut inside a record', () => {
    expect(() => feed(new StreamDecryptor(KEY), sealed40().subarray(0, 120))).toThrow(TruncatedRecordError);
  });

  it('detects a stream cut inside the header', () => {
    expect(() => feed(new StreamDecryptor(KEY), sealed40().subarray(0, 20))).toThrow(HeaderInvalidError);
  });

  it('rejects bytes after the final record', () => {
    const s = concat(sealed40(), new Uint8Array([1, 2, 3]));
    expect(() => new StreamDecryptor(KEY).processNext(s)).toThrow(TrailingDataError);

    const dec = new StreamDecryptor(KEY);
    dec.processNext(sealed40());
    expect(dec.isFinished()).toBe(true);
    expect(dec.processNext(new Uint8Array(0))).toBeNull();
    expect(() => dec.processNext(new Uint8Array([0]))).toThrow(TrailingDataError);
  });

  it('rejects a length prefix above chunk size + tag', () => {
    const s = sealed40();
    s.set(encodeFrameLen(33), 34);
    expect(() => feed(new StreamDecryptor(KEY), s)).toThrow(RecordTooLargeError);
  });

  it('honours its own chunk size limit', () => {
    expect(() => feed(new StreamDecryptor(KEY, { maxChunkSize: 8 }), sealed40())).toThrow(HeaderInvalidError);
  });

  it('stays failed after an integrity error', () => {
    const s = sealed40();
    s[40] ^= 1;
    const dec = new StreamDecryptor(KEY);
    expect(() => dec.processNext(s)).toThrow(StreamIntegrityError);
    expect(() => dec.processNext(new Uint8Array(1))).toThrow(SessionClosedError);
    expect(() => dec.finish()).toThrow(SessionClosedError);
  });

  it('logs the failure detail but never the key', () => {
    const lines: string[] = [];
    const s = sealed40();
    s[40] ^= 1;
    const dec = new StreamDecryptor(KEY, { logger: createLogger(2, m => lines.push(m)) });
    expect(() => dec.processNext(s)).toThrow(AuthenticationFailureError);
    expect(lines).toEqual([
      '1| Decryptor open: xchacha20-poly1305, chunk size 16',
      '2| Decryption failed: AuthenticationFailureError: Chunk 0 failed authentication',
    ]);
  });

  it('validates the key size', () => {
    expect(() => new StreamDecryptor(new Uint8Array(16))).toThrow(InvalidKeyError);
  });
});
