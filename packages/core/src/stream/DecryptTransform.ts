// packages/core/src/stream/DecryptTransform.ts
import { ensureUint8Array, type ChunkInput } from '../util/stream.js';
import type { StreamDecryptor } from './StreamDecryptor.js';

/**
 * Counterpart to EncryptTransform.
 * Streams `header ‖ record*` → authenticated plaintext.
 *
 * The stream errors (and stays errored) on the first integrity failure;
 * closing the writable side without a final chunk errors it as truncated.
 */
export class DecryptTransform {
  constructor(private readonly decryptor: StreamDecryptor) {}

  toTransformStream(): TransformStream<ChunkInput, Uint8Array> {
    return new TransformStream<ChunkInput, Uint8Array>({
      transform: async (chunk, ctl) => {
        const plain = this.decryptor.processNext(await ensureUint8Array(chunk));
        if (plain) ctl.enqueue(plain);
      },
      flush: () => {
        this.decryptor.finish();
      },
    });
  }
}
