// packages/node-runtime/src/program.ts
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { createReadStream, createWriteStream, existsSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';
import {
  AlgorithmRegistry,
  DEFAULT_CHUNK_SIZE,
  KEY_BYTES,
  SealStream,
  StreamIOError,
  base64Decode,
  collectStream,
  hexEncode,
  toVerbosity,
  type ChunkInput,
  type InspectResult,
} from '../../core/src/index.js';
import { FileByteSource } from './FileByteSource.js';
import { loadKey } from './keyfile.js';
import { createSealStream } from './index.js';
import { nodeProvider } from './provider.js';
import { toWebReadable, toWebWritable } from './streamAdapter.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

/** Everything the CLI touches outside the file system */
export interface CliIO {
  stdin : Readable;
  stdout: Writable;
  stderr: Writable;
  env   : NodeJS.ProcessEnv;
}

type GlobalOpts = {
  keyFile? : string;
  verbose  : number;
};

type EncryptOpts = {
  out       : string;
  chunkSize : number;
  algorithm : string;
};

type OutOpts = {
  out: string;
};

const BASE64_TEXT = /^[A-Za-z0-9+/]+={0,2}$/;

function parseChunkSize(v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Chunk size must be a positive integer');
  }
  return n;
}

/**
 * Build a fresh `sealstream` program bound to `io`. Actions throw instead of
 * exiting; {@link run} turns errors into exit codes.
 */
export function buildProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name('sealstream')
    .version(PKG_VERSION)
    .description(
      'Chunked authenticated stream encryption\n' +
      'Algorithms: ' + AlgorithmRegistry.list().map(a => a.name).join(', '),
    )
    .exitOverride()
    .configureOutput({
      writeOut: s => { io.stdout.write(s); },
      writeErr: s => { io.stderr.write(s); },
    })
    .addOption(
      new Option('-k, --key-file <path>', 'file holding the key (64 hex chars or 32 raw bytes)'),
    )
    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_: string, previous: number) => previous + 1),
    );

  const globals = (): GlobalOpts => program.opts<GlobalOpts>();

  const makeSealStream = (extra: { chunkSize?: number; algorithm?: string } = {}): SealStream => {
    const { verbose } = globals();
    return createSealStream({
      chunkSize : extra.chunkSize,
      algorithm : extra.algorithm === undefined ? undefined : AlgorithmRegistry.resolve(extra.algorithm).id,
      verbose   : toVerbosity(verbose),
      logger    : msg => { io.stderr.write(msg + '\n'); },
    });
  };

  const openInput = (src: string): ReadableStream<Uint8Array> => {
    if (src === '-') return toWebReadable(io.stdin);
    if (!existsSync(src)) throw new StreamIOError(`input file not found: ${src}`);
    return toWebReadable(createReadStream(src));
  };

  /**
   * Pipe `src` through `ts` into `out`. STDOUT stays open afterwards so the
   * host can keep writing to it. With `removePartial`, a failed run deletes
   * the output file once its descriptor is closed.
   */
  const pump = async (
    src: string,
    ts : TransformStream<ChunkInput, Uint8Array>,
    out: string,
    removePartial = false,
  ): Promise<void> => {
    const input = openInput(src);
    const sink  = out === '-' ? io.stdout : createWriteStream(out);

    const results = await Promise.allSettled([
      input.pipeTo(ts.writable),
      ts.readable.pipeTo(toWebWritable(sink), { preventClose: out === '-' }),
    ]);
    for (const r of results) {
      if (r.status !== 'rejected') continue;
      if (out !== '-') {
        await whenClosed(sink);
        if (removePartial) await rm(out, { force: true });
      }
      throw r.reason;
    }
  };

  program
    .command('encrypt <src>')
    .description('Encrypt file; use - for STDIN, --out - for STDOUT')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .addOption(
      new Option('-c, --chunk-size <bytes>', 'plaintext bytes per chunk')
        .argParser(parseChunkSize)
        .default(DEFAULT_CHUNK_SIZE, String(DEFAULT_CHUNK_SIZE)),
    )
    .addOption(
      new Option('-a, --algorithm <name>', 'AEAD algorithm')
        .choices(AlgorithmRegistry.list().map(a => a.name))
        .default(AlgorithmRegistry.current.name),
    )
    .action(async (src: string, cmd: EncryptOpts) => {
      const key  = await loadKey(globals().keyFile, io.env);
      const seal = makeSealStream({ chunkSize: cmd.chunkSize, algorithm: cmd.algorithm });
      await pump(src, seal.createEncryptionStream(key), cmd.out);
    });

  program
    .command('decrypt <src>')
    .description('Decrypt file; use - for STDIN, --out - for STDOUT')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .action(async (src: string, cmd: OutOpts) => {
      const key  = await loadKey(globals().keyFile, io.env);
      const seal = makeSealStream();
      // a partial plaintext file must not look like a successful decryption
      await pump(src, seal.createDecryptionStream(key), cmd.out, true);
    });

  program
    .command('inspect [src]')
    .description('Show header information and record statistics; omit arg or use - to read from STDIN')
    .action(async (src?: string) => {
      let meta: InspectResult;
      if (!src || src === '-') {
        meta = await SealStream.inspect(await readStdin(io.stdin));
      } else {
        if (!existsSync(src)) throw new StreamIOError(`input file not found: ${src}`);
        const file = await FileByteSource.open(src);
        try {
          meta = await SealStream.inspect(file);
        } finally {
          await file.close();
        }
      }
      io.stdout.write(JSON.stringify(meta, null, 2) + '\n');
    });

  program
    .command('keygen')
    .description('Generate a random 256-bit key as hex')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .action(async (cmd: OutOpts) => {
      const key = nodeProvider.getRandomValues(new Uint8Array(KEY_BYTES));
      const hex = hexEncode(key) + '\n';
      key.fill(0);
      if (cmd.out === '-') {
        io.stdout.write(hex);
      } else {
        await writeFile(cmd.out, hex, { mode: 0o600, flag: 'wx' });
      }
    });

  return program;
}

function whenClosed(s: Writable): Promise<void> {
  return s.closed ? Promise.resolve() : new Promise(resolve => { s.once('close', () => resolve()); });
}

/** Binary stream, or the same bytes as Base64 text */
async function readStdin(stdin: Readable): Promise<Uint8Array> {
  const raw = await collectStream(toWebReadable(stdin));
  if (await SealStream.isSealed(raw)) return raw;

  const text = new TextDecoder().decode(raw).trim();
  return BASE64_TEXT.test(text) && text.length % 4 === 0 ? base64Decode(text) : raw;
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 * Resolves with the process exit code; never rejects.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    // commander already printed its own message
    if (err instanceof CommanderError) return err.exitCode;
    io.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
