/**
 * Error types of the normalization engine
 *
 * Parsers never throw these to library callers: each attempt reports its
 * error inside a ParseResult and the dispatcher turns a double failure into
 * a ParseFailure.
 *
 * @module main/email/errors
 */

export abstract class EmailParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The bytes could not be opened as an Outlook structured container
 */
export class ContainerParseError extends EmailParseError {}

/**
 * The bytes could not be read as an RFC-822 message
 */
export class TextParseError extends EmailParseError {}

/**
 * Both the container attempt and the text attempt failed
 */
export class ParseFailure extends EmailParseError {
  constructor(
    readonly filename: string,
    readonly containerError: ContainerParseError,
    readonly textError: TextParseError
  ) {
    super(`Unable to parse ${filename} as an Outlook or RFC-822 message`);
  }
}

/**
 * Outcome of one parse attempt
 */
export type ParseResult<T, E extends EmailParseError = EmailParseError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends EmailParseError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Bytes that were decoded with a fallback charset instead of the declared one
 *
 * Degradations are logged, never raised.
 */
export interface DecodeDegradation {
  stage: 'header' | 'content' | 'parameter';
  declaredCharset?: string;
  usedCharset: string;
}
