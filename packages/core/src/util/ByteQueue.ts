// packages/core/src/util/ByteQueue.ts

/**
 * Append-only FIFO of byte slices used as the framer's read source.
 *
 * Producers `push()` whatever slice sizes their transport delivers and call
 * `end()` once no more input will arrive. Consumers `peek()`/`take()` exact
 * byte counts; neither ever returns fewer bytes than requested.
 */
export class ByteQueue {
  private chunks: Uint8Array[] = [];
  private head = 0;           // read offset into chunks[0]
  private size = 0;
  #ended = false;

  /** Number of buffered, unread bytes */
  get length(): number { return this.size; }

  /** True once the producer declared end-of-input */
  get ended(): boolean { return this.#ended; }

  push(bytes: Uint8Array): void {
    if (this.#ended) throw new RangeError('push() after end()');
    if (!bytes.byteLength) return;
    this.chunks.push(bytes);
    this.size += bytes.byteLength;
  }

  end(): void { this.#ended = true; }

  /** Copy of the next `n` bytes without consuming them. */
  peek(n: number): Uint8Array {
    return this.copy(n, false);
  }

  /** Remove and return the next `n` bytes. */
  take(n: number): Uint8Array {
    return this.copy(n, true);
  }

  /** Drop everything buffered. Slices are the caller's, so they are not wiped. */
  clear(): void {
    this.chunks = [];
    this.head = 0;
    this.size = 0;
  }

  private copy(n: number, consume: boolean): Uint8Array {
    if (!Number.isInteger(n) || n < 0 || n > this.size) {
      throw new RangeError(`Cannot read ${n} bytes, ${this.size} buffered`);
    }
    const out = new Uint8Array(n);
    let written = 0;
    let idx  = 0;
    let head = this.head;

    while (written < n) {
      const c     = this.chunks[idx];
      const avail = c.byteLength - head;
      const want  = Math.min(avail, n - written);
      out.set(c.subarray(head, head + want), written);
      written += want;
      if (want === avail) { idx++; head = 0; }
      else head += want;
    }

    if (consume) {
      this.chunks = this.chunks.slice(idx);
      this.head   = head;
      this.size  -= n;
    }
    return out;
  }
}
