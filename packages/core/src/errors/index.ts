const DISABLE_STACKTRACE : boolean = true;

/** Public wording for every integrity failure; the concrete class is not surfaced to end users. */
export const INTEGRITY_MESSAGE = 'stream invalid or tampered';

export class SealStreamError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/* ------------------------------------------------------------------ */
/*  Integrity failures: framing, truncation, authentication            */
/* ------------------------------------------------------------------ */

/**
 * Base for every failure that means "these bytes are not a valid stream".
 * The message is identical for all subclasses; `detail` is for diagnostics.
 */
export abstract class StreamIntegrityError extends SealStreamError {
  constructor(readonly detail: string) {
    super(INTEGRITY_MESSAGE);
  }
}

export type HeaderInvalidReason =
  | 'truncated-header'
  | 'bad-magic'
  | 'unsupported-version'
  | 'unsupported-algorithm'
  | 'invalid-chunk-size';

export class HeaderInvalidError extends StreamIntegrityError {
  constructor(readonly reason: HeaderInvalidReason, detail: string = reason) {
    super(detail);
  }
}

export class TruncatedRecordError       extends StreamIntegrityError {}
export class RecordTooLargeError        extends StreamIntegrityError {}
export class AuthenticationFailureError extends StreamIntegrityError {}
export class TruncatedStreamError       extends StreamIntegrityError {}
export class TrailingDataError          extends StreamIntegrityError {}

/* ------------------------------------------------------------------ */
/*  Session and caller errors                                          */
/* ------------------------------------------------------------------ */

export class SessionClosedError       extends SealStreamError {}
export class ChunkTooLargeError       extends SealStreamError {}
export class ChunkIndexExhaustedError extends SealStreamError {}
export class InvalidKeyError          extends SealStreamError {}
export class ConfigurationError       extends SealStreamError {}
export class EncodingError            extends SealStreamError {}
export class DecodingError            extends SealStreamError {}

/** Failure of the underlying byte source or sink, never of the ciphertext itself. */
export class StreamIOError extends SealStreamError {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}
