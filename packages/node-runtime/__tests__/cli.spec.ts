import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable, Writable } from 'node:stream';
import { run, PKG_VERSION } from '../src/program.js';
import { KEY_ENV } from '../src/keyfile.js';

const HEX = 'ab'.repeat(32);

function capture() {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _enc, cb) { chunks.push(chunk); cb(); },
  });
  return {
    stream,
    bytes: () => new Uint8Array(Buffer.concat(chunks)),
    text : () => Buffer.concat(chunks).toString('utf8'),
  };
}

/* ------------------------------------------------------------------ */
/*  In-process runner: same argv as the binary, injected STDIO         */
/* ------------------------------------------------------------------ */
async function cli(
  args : string[],
  input?: Uint8Array | string,
  env  : NodeJS.ProcessEnv = { [KEY_ENV]: HEX },
) {
  const out = capture();
  const err = capture();
  const data = input === undefined ? [] : [typeof input === 'string' ? Buffer.from(input) : Buffer.from(input)];
  const code = await run(args, { stdin: Readable.from(data), stdout: out.stream, stderr: err.stream, env });
  return { code, stdout: out.bytes(), text: out.text(), stderr: err.text() };
}

describe('sealstream (CLI)', () => {
  let dir: string;

  beforeAll(async () => { dir = await mkdtemp(join(tmpdir(), 'sealstream-cli-')); });
  afterAll(async () => { await rm(dir, { recursive: true, force: true }); });

  it('encrypt | decrypt round-trip over STDIO', async () => {
    const enc = await cli(['encrypt', '-'], 'hello');
    expect(enc.code).toBe(0);
    expect(enc.stdout.length).toBe(34 + 4 + 5 + 16);
    expect(new TextDecoder().decode(enc.stdout.subarray(0, 4))).toBe('SAEA');

    const dec = await cli(['decrypt', '-'], enc.stdout);
    expect(dec.code).toBe(0);
    expect(dec.text).toBe('hello');
  });

  it('encrypts files with the chosen chunk size and algorithm', async () => {
    const plainPath = join(dir, 'plain.bin');
    const encPath   = join(dir, 'plain.bin.seal');
    const outPath   = join(dir, 'plain.out');
    const plain     = Buffer.alloc(5000, 0x5a);
    await writeFile(plainPath, plain);

    const enc = await cli(['encrypt', plainPath, '-o', encPath, '-c', '1024', '-a', 'xsalsa20-poly1305']);
    expect(enc.code).toBe(0);
    const sealed = await readFile(encPath);
    expect(sealed[5]).toBe(0x02);
    expect(sealed.readUInt32BE(6)).toBe(1024);
    expect(sealed.length).toBe(5000 + 34 + 5 * 20);

    const dec = await cli(['decrypt', encPath, '-o', outPath]);
    expect(dec.code).toBe(0);
    expect((await readFile(outPath)).equals(plain)).toBe(true);
  });

  it('fails with the generic message on tampering and removes the partial output', async () => {
    const encPath = join(dir, 'tamper.seal');
    const outPath = join(dir, 'tamper.out');
    const enc = await cli(['encrypt', '-', '-c', '16'], 'x'.repeat(100));
    const sealed = Buffer.from(enc.stdout);
    sealed[sealed.length - 3] ^= 0x01;   // inside the final record
    await writeFile(encPath, sealed);

    const dec = await cli(['decrypt', encPath, '-o', outPath]);
    expect(dec.code).toBe(1);
    expect(dec.stderr).toBe('Error: stream invalid or tampered\n');
    expect(existsSync(outPath)).toBe(false);
  });

  it('reads the key from --key-file', async () => {
    const keyPath = join(dir, 'other.key');
    await writeFile(keyPath, new Uint8Array(32).fill(1));

    const enc = await cli(['encrypt', '-'], 'secret text');
    const wrong = await cli(['-k', keyPath, 'decrypt', '-'], enc.stdout);
    expect(wrong.code).toBe(1);
    expect(wrong.stderr).toBe('Error: stream invalid or tampered\n');

    const own = await cli(['encrypt', '-', '--key-file', keyPath], 'secret text', {});
    const ok  = await cli(['decrypt', '-', '-k', keyPath], own.stdout, {});
    expect(ok.text).toBe('secret text');
  });

  it('refuses to run without a key', async () => {
    const res = await cli(['encrypt', '-'], 'x', {});
    expect(res.code).toBe(1);
    expect(res.stderr).toBe(`Error: No key given: use --key-file or set ${KEY_ENV}\n`);
  });

  it('reports a missing input file', async () => {
    const missing = join(dir, 'nope.bin');
    const res = await cli(['encrypt', missing]);
    expect(res.code).toBe(1);
    expect(res.stderr).toBe(`Error: input file not found: ${missing}\n`);
  });

  it('inspect prints header and record statistics for files and Base64 STDIN', async () => {
    const enc  = await cli(['encrypt', '-'], 'hello');
    const path = join(dir, 'hello.seal');
    await writeFile(path, enc.stdout);

    const expected = {
      version: 1,
      algorithm: 'xchacha20-poly1305',
      algorithmId: 1,
      chunkSize: 65536,
      headerLength: 34,
      records: 1,
      ciphertextBytes: 21,
      plaintextBytes: 5,
      trailingBytes: 0,
    };

    const fromFile = await cli(['inspect', path]);
    expect(fromFile.code).toBe(0);
    const meta = JSON.parse(fromFile.text);
    expect(meta).toMatchObject(expected);
    expect(meta.baseNonce).toMatch(/^[0-9a-f]{48}$/);

    const fromStdin = await cli(['inspect'], Buffer.from(enc.stdout).toString('base64') + '\n');
    expect(JSON.parse(fromStdin.text)).toEqual(meta);
  });

  it('keygen prints a hex key that encrypt accepts', async () => {
    const gen = await cli(['keygen'], undefined, {});
    expect(gen.text).toMatch(/^[0-9a-f]{64}\n$/);

    const enc = await cli(['encrypt', '-'], 'k', { [KEY_ENV]: gen.text.trim() });
    expect(enc.code).toBe(0);
  });

  it('logs to STDERR with repeated -v', async () => {
    const res = await cli(['-v', '-v', 'encrypt', '-'], 'hi');
    expect(res.code).toBe(0);
    expect(res.stderr).toBe(
      '1| Encryptor open: xchacha20-poly1305, chunk size 65536\n' +
      '1| Encryptor finalized after 1 chunk(s)\n',
    );
  });

  it('rejects an invalid chunk size', async () => {
    const res = await cli(['encrypt', '-', '-c', '0'], 'x');
    expect(res.code).toBe(1);
    expect(res.stderr).toContain('Chunk size must be a positive integer');
  });

  it('prints the version', async () => {
    const res = await cli(['--version']);
    expect(res.code).toBe(0);
    expect(res.text).toBe(`${PKG_VERSION}\n`);
  });
});
