// packages/node-runtime/src/index.ts
import { SealStream, type SealStreamOptions } from '../../core/src/index.js';
import { nodeProvider }                       from './provider.js';

export function createSealStream(cfg?: SealStreamOptions): SealStream {
  return new SealStream(nodeProvider, cfg);
}

export * from '../../core/src/index.js';
export { nodeProvider } from './provider.js';
export { toWebReadable, toWebWritable } from './streamAdapter.js';
export { loadKey, parseKeyMaterial, KEY_ENV } from './keyfile.js';
