// packages/node-runtime/src/keyfile.ts
import { readFile } from 'node:fs/promises';
import {
  ConfigurationError,
  InvalidKeyError,
  KEY_BYTES,
  StreamIOError,
  hexDecode,
} from '../../core/src/index.js';

/** Environment variable consulted when no key file is given (64 hex chars) */
export const KEY_ENV = 'SEALSTREAM_KEY';

const HEX_KEY = /^[0-9a-fA-F]{64}$/;

/**
 * Accepts exactly 32 raw bytes, or 64 hex characters with optional
 * surrounding whitespace.
 */
export function parseKeyMaterial(raw: Uint8Array): Uint8Array {
  if (raw.byteLength === KEY_BYTES) return new Uint8Array(raw);

  const text = new TextDecoder().decode(raw).trim();
  if (!HEX_KEY.test(text)) {
    throw new InvalidKeyError(`Key must be ${KEY_BYTES} raw bytes or ${KEY_BYTES * 2} hex characters`);
  }
  return hexDecode(text);
}

export async function loadKey(
  keyFile: string | undefined,
  env    : NodeJS.ProcessEnv,
): Promise<Uint8Array> {
  if (keyFile !== undefined) {
    let raw: Uint8Array;
    try {
      raw = await readFile(keyFile);
    } catch (err) {
      throw new StreamIOError(`Cannot read key file: ${keyFile}`, err);
    }
    return parseKeyMaterial(raw);
  }

  const fromEnv = env[KEY_ENV];
  if (fromEnv === undefined || fromEnv === '') {
    throw new ConfigurationError(`No key given: use --key-file or set ${KEY_ENV}`);
  }
  return parseKeyMaterial(new TextEncoder().encode(fromEnv));
}
