import { concat } from './bytes.js';

export type ChunkInput = Uint8Array | ArrayBuffer | Blob;

export async function ensureUint8Array(src: ChunkInput): Promise<Uint8Array> {
  if (src instanceof Uint8Array)  return src;
  if (src instanceof ArrayBuffer) return new Uint8Array(src);
  return new Uint8Array(await src.arrayBuffer());
}

/** Drain a readable into one buffer, optionally after `prefix`. */
export async function collectStream(
  rs: ReadableStream<Uint8Array>,
  prefix?: Uint8Array,
): Promise<Uint8Array> {
  const reader = rs.getReader();
  const chunks: Uint8Array[] = prefix && prefix.length ? [prefix] : [];
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return concat(...chunks);
}

/** A readable that yields `bytes` in slices of at most `sliceSize`. */
export function readableFrom(bytes: Uint8Array, sliceSize = 64 * 1024): ReadableStream<Uint8Array> {
  let offset = 0;
  return new ReadableStream<Uint8Array>({
    pull(ctl) {
      if (offset >= bytes.byteLength) {
        ctl.close();
        return;
      }
      ctl.enqueue(bytes.slice(offset, offset + sliceSize));
      offset += sliceSize;
    },
  });
}
