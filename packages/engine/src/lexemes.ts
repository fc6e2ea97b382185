/**
 * Primitive parsers shared by the metadata, title and placeholder grammars.
 *
 * Each parser takes a cursor and returns a ParseResult. None of them
 * consume input when they fail.
 */

import type { Cursor } from "./cursor.js";
import { failure, success } from "./errors.js";
import type { MetaEntry, ParseResult, ParseSuccess } from "./types.js";

/** Marks a token as a variable reference */
export const SIGIL = "£";

const IDENTIFIER = /[A-Za-z][A-Za-z0-9_]*/y;
const BLANKS = /[ \t]*/y;
const WHITESPACE = /\s*/y;
const COMMENT_MARKER = /[ \t]*(?:\/\/|#)[ \t]*/y;

/** Skip spaces and tabs (never newlines). */
export function skipBlanks(cursor: Cursor): Cursor {
  return cursor.advance(cursor.match(BLANKS)?.length ?? 0);
}

/** Skip any whitespace, newlines included. */
export function skipWhitespace(cursor: Cursor): Cursor {
  return cursor.advance(cursor.match(WHITESPACE)?.length ?? 0);
}

/**
 * Parse an identifier: a letter followed by letters, digits or underscores.
 */
export function parseIdentifier(cursor: Cursor): ParseResult<string> {
  const name = cursor.match(IDENTIFIER);
  if (!name) {
    return failure("Expected an identifier starting with a letter", cursor);
  }
  return success(name, cursor.advance(name.length));
}

/**
 * Parse a variable reference like `£title`, returning the bare name.
 */
export function parseVariable(cursor: Cursor): ParseResult<string> {
  if (!cursor.startsWith(SIGIL)) {
    return failure(`Expected a variable starting with ${SIGIL}`, cursor);
  }
  const name = parseIdentifier(cursor.advance(SIGIL.length));
  if (!name.ok) {
    return failure("Expected a variable name starting with a letter", name.error.position);
  }
  return name;
}

/**
 * Parse the rest of the current line.
 *
 * The line ending is consumed but not returned. End of input also ends
 * the line.
 */
export function parseUntilEol(cursor: Cursor): ParseSuccess<string> {
  const newline = cursor.indexOf("\n");
  const end = newline === -1 ? cursor.source.length : newline;
  let line = cursor.source.slice(cursor.offset, end);
  if (line.endsWith("\r")) line = line.slice(0, -1);
  const rest = cursor.seek(newline === -1 ? end : end + 1);
  return success(line, rest);
}

/**
 * Parse a metadata comment line (`// …` or `# …`), returning its text.
 */
export function parseMetaComment(cursor: Cursor): ParseResult<string> {
  const marker = cursor.match(COMMENT_MARKER);
  if (!marker) {
    return failure("Expected a comment starting with // or #", cursor);
  }
  const line = parseUntilEol(cursor.advance(marker.length));
  return success(line.value.trimEnd(), line.rest);
}

/**
 * Parse a double-quoted string.
 *
 * The string may span lines. Backslash escapes are kept verbatim, so
 * `"I said \"hi\""` yields `I said \"hi\"`.
 */
export function parseQuotedString(cursor: Cursor): ParseResult<string> {
  if (cursor.peek() !== '"') {
    return failure("Expected a quoted string", cursor);
  }
  const { source } = cursor;
  let i = cursor.offset + 1;
  while (i < source.length) {
    const char = source[i];
    if (char === "\\") {
      i += 2;
      continue;
    }
    if (char === '"') {
      const value = source.slice(cursor.offset + 1, i);
      return success(value, cursor.seek(i + 1));
    }
    i++;
  }
  return failure("Unterminated quoted string", cursor);
}

/**
 * Parse a `key = value` metadata line.
 *
 * The key may carry the variable sigil, which is dropped. The value is
 * either a quoted string or everything up to the end of the line.
 */
export function parseMetaKeyValue(cursor: Cursor): ParseResult<MetaEntry> {
  let current = skipBlanks(cursor);
  if (current.startsWith(SIGIL)) {
    current = current.advance(SIGIL.length);
  }

  const key = parseIdentifier(current);
  if (!key.ok) return key;

  current = skipBlanks(key.rest);
  if (current.peek() !== "=") {
    return failure(`Expected "=" after "${key.value}"`, current);
  }
  current = skipBlanks(current.advance(1));

  if (current.peek() === '"') {
    const quoted = parseQuotedString(current);
    if (!quoted.ok) return quoted;
    const trailing = parseUntilEol(quoted.rest);
    if (trailing.value.trim() !== "") {
      return failure("Unexpected text after quoted value", skipBlanks(quoted.rest));
    }
    return success({ key: key.value, value: quoted.value }, trailing.rest);
  }

  const line = parseUntilEol(current);
  return success({ key: key.value, value: line.value.trimEnd() }, line.rest);
}
