/**
 * Metadata block parser.
 *
 * A Markdown document may open with a block of `key = value` lines wrapped
 * in one of three marker pairs:
 *
 * ```
 * :meta            <meta>            <?meta   (or <?)
 * title = Hello    title = Hello     title = Hello
 * :meta            </meta>           ?>
 * ```
 */

import type { Cursor } from "./cursor.js";
import { failure, RenderError, success } from "./errors.js";
import {
  parseMetaComment,
  parseMetaKeyValue,
  parseUntilEol,
  skipBlanks,
  skipWhitespace,
} from "./lexemes.js";
import type { MetaEntry, ParseResult } from "./types.js";

/** Bracket style of a metadata block */
export type MetaMarkerStyle = "colon" | "tag" | "processing";

/** Longest token first, so `<?meta` wins over `<?` */
const OPEN_MARKERS: ReadonlyArray<{ token: string; style: MetaMarkerStyle }> = [
  { token: ":meta", style: "colon" },
  { token: "<meta>", style: "tag" },
  { token: "<?meta", style: "processing" },
  { token: "<?", style: "processing" },
];

const CLOSE_MARKERS: ReadonlyArray<{ token: string; style: MetaMarkerStyle }> = [
  { token: ":meta", style: "colon" },
  { token: "</meta>", style: "tag" },
  { token: "?>", style: "processing" },
];

interface Marker {
  token: string;
  style: MetaMarkerStyle;
  /** Cursor just past the marker's line */
  rest: Cursor;
}

/**
 * Match a marker that sits alone on its line (trailing blanks allowed).
 */
function matchMarkerLine(
  cursor: Cursor,
  markers: ReadonlyArray<{ token: string; style: MetaMarkerStyle }>
): Marker | null {
  const start = skipBlanks(cursor);
  for (const { token, style } of markers) {
    if (!start.startsWith(token)) continue;
    const line = parseUntilEol(start.advance(token.length));
    if (line.value.trim() !== "") continue;
    return { token, style, rest: line.rest };
  }
  return null;
}

/**
 * Parse an optional metadata block.
 *
 * Returns `null` as the value when the document has no metadata block, in
 * which case the cursor is returned untouched. A block that is present but
 * broken (mismatched markers, a bad line, no closing marker) is a failure
 * of kind `MalformedMetadataBlock`.
 */
export function parseMetaSection(cursor: Cursor): ParseResult<MetaEntry[] | null> {
  const opening = matchMarkerLine(skipWhitespace(cursor), OPEN_MARKERS);
  if (!opening) {
    return success(null, cursor);
  }

  const entries: MetaEntry[] = [];
  let current = opening.rest;

  while (!current.atEnd) {
    const line = parseUntilEol(current);
    if (line.value.trim() === "") {
      current = line.rest;
      continue;
    }

    const closing = matchMarkerLine(current, CLOSE_MARKERS);
    if (closing) {
      if (closing.style !== opening.style) {
        return failure(
          `Metadata block opened with "${opening.token}" cannot be closed with "${closing.token}"`,
          skipBlanks(current),
          "MalformedMetadataBlock"
        );
      }
      return success(entries, closing.rest);
    }

    const comment = parseMetaComment(current);
    if (comment.ok) {
      current = comment.rest;
      continue;
    }

    const entry = parseMetaKeyValue(current);
    if (!entry.ok) {
      return failure(entry.error.message, entry.error.position, "MalformedMetadataBlock");
    }
    entries.push(entry.value);
    current = entry.rest;
  }

  return failure(
    `Metadata block opened with "${opening.token}" is never closed`,
    skipWhitespace(cursor),
    "MalformedMetadataBlock"
  );
}

/**
 * Parse the metadata block at the start of a Markdown document.
 *
 * @returns The entries (empty when there is no block) and the cursor where
 *   the document proper begins.
 * @throws RenderError when a block is present but malformed
 */
export function readMetadata(cursor: Cursor): { entries: MetaEntry[]; rest: Cursor } {
  const result = parseMetaSection(cursor);
  if (!result.ok) {
    throw RenderError.fromFailure(result.error, "MalformedMetadataBlock");
  }
  return { entries: result.value ?? [], rest: result.rest };
}
