/**
 * Document title extraction.
 *
 * The title is the first thing after the metadata block: either a Markdown
 * heading (`# Title`) or an HTML `<h1>Title</h1>`.
 */

import type { Cursor } from "./cursor.js";
import { failure, RenderError, success } from "./errors.js";
import { skipWhitespace } from "./lexemes.js";
import type { ParseResult, TitledDocument } from "./types.js";

const ATX_HEADING = /#[ \t]+/y;
const HTML_HEADING_OPEN = /<h1(?:\s[^>]*)?>/iy;
const HTML_HEADING_CLOSE = /<\/h1\s*>/i;

/**
 * Parse a level-one heading, returning its text without markup.
 *
 * Leading whitespace is skipped. The line ending after the heading is left
 * in place, so the rest of the document starts with it.
 */
export function parseTitle(cursor: Cursor): ParseResult<string> {
  const start = skipWhitespace(cursor);

  const atx = start.match(ATX_HEADING);
  if (atx) {
    const text = start.advance(atx.length);
    const newline = text.indexOf("\n");
    const end = text.seek(newline === -1 ? text.source.length : newline);
    return success(text.sliceTo(end).trim(), end);
  }

  const open = start.match(HTML_HEADING_OPEN);
  if (open) {
    const inner = start.advance(open.length);
    const close = HTML_HEADING_CLOSE.exec(inner.fragment);
    if (!close) {
      return failure("Expected </h1> to close the title", inner, "MissingTitle");
    }
    const title = inner.fragment.slice(0, close.index).trim();
    return success(title, inner.advance(close.index + close[0].length));
  }

  return failure("Expected a title (`# Title` or `<h1>Title</h1>`)", start, "MissingTitle");
}

/**
 * Split a Markdown document (metadata already removed) into title and body.
 *
 * @throws RenderError of kind `MissingTitle` when no heading is found
 */
export function extractTitle(cursor: Cursor): TitledDocument {
  const result = parseTitle(cursor);
  if (!result.ok) {
    throw RenderError.fromFailure(result.error, "MissingTitle");
  }
  return { title: result.value, body: result.rest.fragment };
}
