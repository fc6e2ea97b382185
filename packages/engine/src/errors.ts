import type {
  ParseError,
  ParseFailure,
  ParseSuccess,
  Position,
  RenderErrorKind,
} from "./types.js";
import type { Cursor } from "./cursor.js";

/** Error thrown when a document or template cannot be rendered */
export class RenderError extends Error {
  readonly kind: RenderErrorKind;
  readonly position?: Position;

  constructor(kind: RenderErrorKind, message: string, position?: Position) {
    super(position ? `${message} (line ${position.line}, offset ${position.offset})` : message);
    this.name = "RenderError";
    this.kind = kind;
    this.position = position;
  }

  static fromFailure(failure: ParseFailure, fallback: RenderErrorKind): RenderError {
    return new RenderError(failure.kind ?? fallback, failure.message, failure.position);
  }
}

export function success<T>(value: T, rest: Cursor): ParseSuccess<T> {
  return { ok: true, value, rest };
}

export function failure(
  message: string,
  at: Cursor | Position,
  kind?: RenderErrorKind
): ParseError {
  const position = "position" in at ? at.position : at;
  return { ok: false, error: { message, position, kind } };
}
