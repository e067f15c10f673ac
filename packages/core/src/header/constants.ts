// packages/core/src/header/constants.ts

/** "SAEA" */
export const HEADER_MAGIC = new Uint8Array([0x53, 0x41, 0x45, 0x41]);

export const FORMAT_VERSION = 0x01;

export const MAGIC_BYTES      = 4 as const;
export const VERSION_BYTES    = 1 as const;
export const ALGO_BYTES       = 1 as const;
export const CHUNK_SIZE_BYTES = 4 as const;
export const BASE_NONCE_BYTES = 24 as const;

/** magic ‖ version ‖ algo_id ‖ chunk_size ‖ base_nonce */
export const HEADER_BYTES =
  MAGIC_BYTES + VERSION_BYTES + ALGO_BYTES + CHUNK_SIZE_BYTES + BASE_NONCE_BYTES;
