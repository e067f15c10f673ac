import { openDecryptor, openEncryptor, type DecryptorSession } from '../src/stream/sessions.js';
import { concat } from '../src/util/bytes.js';
import { readableFrom } from '../src/util/stream.js';
import {
  AuthenticationFailureError,
  SessionClosedError,
  StreamIOError,
  StreamIntegrityError,
  TruncatedStreamError,
} from '../src/errors/index.js';
import { KEY, bytes, fixedProvider } from './_helper.js';

function collector() {
  const chunks: Uint8Array[] = [];
  let closed = false;
  const sink = new WritableStream<Uint8Array>({
    write(c) { chunks.push(c); },
    close()  { closed = true; },
  });
  return { sink, bytes: () => concat(...chunks), isClosed: () => closed };
}

async function drain(session: DecryptorSession): Promise<Uint8Array> {
  const out: Uint8Array[] = [];
  for await (const p of session) out.push(p);
  return concat(...out);
}

async function sealWithSession(plain: Uint8Array): Promise<Uint8Array> {
  const c = collector();
  const enc = await openEncryptor(c.sink, KEY, { chunkSize: 16, provider: fixedProvider });
  await enc.processNext(plain);
  await enc.finalize();
  return c.bytes();
}

describe('encryptor session', () => {
  it('writes the header on open and closes the sink on finalize', async () => {
    const c = collector();
    const enc = await openEncryptor(c.sink, KEY, { chunkSize: 16, provider: fixedProvider });
    expect(c.bytes()).toEqual(enc.header);

    expect((await enc.processNext(bytes(40)))?.length).toBe(72);
    await enc.finalize();
    expect(enc.isFinished()).toBe(true);
    expect(c.isClosed()).toBe(true);
    expect(c.bytes().length).toBe(134);
    await expect(enc.processNext(bytes(1))).rejects.toThrow(SessionClosedError);
  });

  it('wraps sink failures as I/O errors', async () => {
    const broken = new WritableStream<Uint8Array>({
      write() { throw new Error('disk full'); },
    });
    const err = await openEncryptor(broken, KEY).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StreamIOError);
    expect(err).not.toBeInstanceOf(StreamIntegrityError);
  });
});

describe('decryptor session', () => {
  it('yields plaintext chunk by chunk and ends on the final chunk', async () => {
    const sealed  = await sealWithSession(bytes(40));
    const session = openDecryptor(readableFrom(sealed, 5), KEY);

    expect(await session.processNext()).toEqual(bytes(16));
    expect(session.header?.chunkSize).toBe(16);
    expect(await drain(session)).toEqual(bytes(40).subarray(16));
    expect(session.isFinished()).toBe(true);
    expect(await session.processNext()).toBeNull();
  });

  it('reports truncation at the end of the source', async () => {
    const sealed = await sealWithSession(bytes(40));
    const session = openDecryptor(readableFrom(sealed.subarray(0, 106)), KEY);
    await expect(drain(session)).rejects.toThrow(TruncatedStreamError);
  });

  it('reports tampering and cancels the source', async () => {
    const sealed = await sealWithSession(bytes(40));
    sealed[80] ^= 4;

    let cancelled: unknown;
    let offset = 0;
    const source = new ReadableStream<Uint8Array>({
      pull(ctl) {
        if (offset >= sealed.length) { ctl.close(); return; }
        ctl.enqueue(sealed.slice(offset, offset + 36));
        offset += 36;
      },
      cancel(reason) { cancelled = reason; },
    });

    await expect(drain(openDecryptor(source, KEY))).rejects.toThrow(AuthenticationFailureError);
    expect(cancelled).toBeInstanceOf(AuthenticationFailureError);
  });

  it('wraps source failures as I/O errors', async () => {
    const source = new ReadableStream<Uint8Array>({
      pull(ctl) { ctl.error(new Error('connection reset')); },
    });
    const err = await openDecryptor(source, KEY).processNext().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StreamIOError);
    expect(err).not.toBeInstanceOf(StreamIntegrityError);
  });
});
