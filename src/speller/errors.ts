/**
 * Speller error taxonomy.
 *
 * Query-time failures are InvalidInputError / EngineNotReadyError.
 * Build-time failures are DataIntegrityError and abort the build.
 */

export type SpellerErrorCode =
  | "INVALID_INPUT"
  | "ENGINE_NOT_READY"
  | "DATA_INTEGRITY";

export class SpellerError extends Error {
  readonly code: SpellerErrorCode;

  constructor(code: SpellerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends SpellerError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export class EngineNotReadyError extends SpellerError {
  constructor(message = "Dictionary snapshot has not been loaded") {
    super("ENGINE_NOT_READY", message);
  }
}

export class DataIntegrityError extends SpellerError {
  constructor(message: string) {
    super("DATA_INTEGRITY", message);
  }
}

export function isSpellerError(error: unknown): error is SpellerError {
  return error instanceof SpellerError;
}
