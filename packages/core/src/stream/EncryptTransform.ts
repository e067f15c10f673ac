// packages/core/src/stream/EncryptTransform.ts
import { ensureUint8Array, type ChunkInput } from '../util/stream.js';
import type { StreamEncryptor } from './StreamEncryptor.js';

/**
 * TransformStream that:
 *   • feeds plaintext of any slice size into a {@link StreamEncryptor}
 *   • emits the header, then one `[4-byte length ‖ sealed chunk]` per chunk
 *   • seals the final chunk on flush
 */
export class EncryptTransform {
  constructor(private readonly encryptor: StreamEncryptor) {}

  toTransformStream(): TransformStream<ChunkInput, Uint8Array> {
    return new TransformStream<ChunkInput, Uint8Array>({
      transform: async (chunk, ctl) => {
        const out = this.encryptor.processNext(await ensureUint8Array(chunk));
        if (out) ctl.enqueue(out);
      },
      flush: ctl => {
        ctl.enqueue(this.encryptor.finalize());
      },
    });
  }
}
