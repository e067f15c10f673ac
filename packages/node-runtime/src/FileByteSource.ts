// packages/node-runtime/src/FileByteSource.ts
import { open, type FileHandle } from 'node:fs/promises';
import type { RandomAccessSource } from '../../core/src/index.js';

/**
 * Random-access reads from a file on disk; only the requested ranges are
 * loaded. Remember to {@link close} it.
 */
export class FileByteSource implements RandomAccessSource {
  private constructor(
    private readonly fh: FileHandle,
    readonly length: number,
  ) {}

  static async open(path: string): Promise<FileByteSource> {
    const fh = await open(path, 'r');
    try {
      const { size } = await fh.stat();
      return new FileByteSource(fh, size);
    } catch (err) {
      await fh.close();
      throw err;
    }
  }

  async read(offset: number, len: number): Promise<Uint8Array> {
    if (offset < 0 || len < 0 || offset + len > this.length) {
      throw new RangeError('read() slice exceeds data bounds');
    }
    const buf = new Uint8Array(len);
    let filled = 0;
    while (filled < len) {
      const { bytesRead } = await this.fh.read(buf, filled, len - filled, offset + filled);
      if (bytesRead === 0) throw new RangeError(`File shrank while reading at ${offset + filled}`);
      filled += bytesRead;
    }
    return buf;
  }

  close(): Promise<void> {
    return this.fh.close();
  }
}
