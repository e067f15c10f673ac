import { Readable, Writable } from 'node:stream';

/** Node streams to WHATWG streams, in one place */
export function toWebReadable(r: Readable): ReadableStream<Uint8Array> {
  return Readable.toWeb(r);
}
export function toWebWritable(w: Writable): WritableStream<Uint8Array> {
  return Writable.toWeb(w);
}
