/**
 * Error classes raised while turning a caption file into speech blocks
 */

/**
 * Base class for all caption pipeline errors
 */
export class CaptionError extends Error {
  code: string;
  details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CaptionError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.message} (code: ${this.code})`;
  }
}

/**
 * No timestamp-like line was found, so the header could not be repaired
 */
export class PreprocessError extends CaptionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PREPROCESS_FAILED', details);
    this.name = 'PreprocessError';
  }
}

/**
 * The repaired caption text could not be read as a cue sequence
 */
export class CueParseError extends CaptionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CUE_PARSE_FAILED', details);
    this.name = 'CueParseError';
  }
}

/**
 * Known-speaker list missing or unreadable
 */
export class SpeakerListError extends CaptionError {
  constructor(filePath: string, cause: string) {
    super(`Could not read speaker list ${filePath}: ${cause}`, 'SPEAKER_LIST_UNREADABLE', { filePath });
    this.name = 'SpeakerListError';
  }
}

export function isCaptionError(error: unknown): error is CaptionError {
  return error instanceof CaptionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Log fields for a failure; caption errors carry their code and details. */
export function errorMeta(error: unknown): Record<string, unknown> {
  if (isCaptionError(error)) {
    return { error: error.message, code: error.code, ...(error.details ? { details: error.details } : {}) };
  }
  return { error: errorMessage(error) };
}
