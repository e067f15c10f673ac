// packages/core/src/util/ByteSource.ts
import { base64Decode } from './bytes.js';

/** Anything that can hand out byte ranges by offset */
export interface RandomAccessSource {
  readonly length: number;
  read(offset: number, len: number): Promise<Uint8Array>;
}

/**
 * Unified accessor for Blob | Uint8Array | Base64-encoded string.
 * Blob slices are read on demand, so inspecting a large sealed file never
 * loads it wholesale.
 */
export class ByteSource implements RandomAccessSource {
  #buf: Uint8Array | null = null;

  constructor(private readonly src: Blob | Uint8Array | string) {}

  /** Total byte length of the underlying data */
  get length(): number {
    if (this.src instanceof Uint8Array) return this.src.byteLength;
    if (typeof this.src === 'string')  return this.decoded().byteLength;
    return this.src.size;
  }

  /**
   * Read a slice *[offset, offset + len)* as a fresh copy.
   */
  async read(offset: number, len: number): Promise<Uint8Array> {
    if (offset < 0 || len < 0 || offset + len > this.length) {
      throw new RangeError('read() slice exceeds data bounds');
    }
    if (this.src instanceof Uint8Array) {
      return this.src.slice(offset, offset + len);
    }
    if (typeof this.src === 'string') {
      return this.decoded().slice(offset, offset + len);
    }
    const buf = await this.src.slice(offset, offset + len).arrayBuffer();
    return new Uint8Array(buf);
  }

  /** lazily decode Base64 text (once) */
  private decoded(): Uint8Array {
    if (typeof this.src !== 'string') throw new TypeError('Not a Base64 source');
    if (!this.#buf) this.#buf = base64Decode(this.src);
    return this.#buf;
  }
}
