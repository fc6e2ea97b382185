/**
 * Placeholder locator for HTML templates.
 *
 * A placeholder is `{{ £name | filter | filter }}`. The locator reports every
 * occurrence with the span it covers in the original template.
 */

import { Cursor } from "./cursor.js";
import { failure, RenderError, success } from "./errors.js";
import { parseFilters } from "./filters.js";
import { parseVariable, SIGIL, skipWhitespace } from "./lexemes.js";
import type { ParseResult, Placeholder } from "./types.js";

const OPEN = "{{";
const CLOSE = "}}";

/**
 * Parse a single placeholder starting at `{{`.
 */
export function parsePlaceholder(cursor: Cursor): ParseResult<Placeholder> {
  if (!cursor.startsWith(OPEN)) {
    return failure(`Expected "${OPEN}"`, cursor);
  }

  const variable = parseVariable(skipWhitespace(cursor.advance(OPEN.length)));
  if (!variable.ok) return variable;

  const filters = parseFilters(variable.rest);
  if (!filters.ok) return filters;

  const close = skipWhitespace(filters.rest);
  if (!close.startsWith(CLOSE)) {
    return failure(`Expected "${CLOSE}" to close the placeholder for ${SIGIL}${variable.value}`, close);
  }
  const end = close.advance(CLOSE.length);

  return success(
    { name: variable.value, filters: filters.value, selection: cursor.spanTo(end) },
    end
  );
}

/** True when the `{{` at the cursor is followed (after whitespace) by the sigil. */
function opensPlaceholder(cursor: Cursor): boolean {
  return skipWhitespace(cursor.advance(OPEN.length)).startsWith(SIGIL);
}

/**
 * Find every placeholder in a template.
 *
 * The list is returned last-first, so that substituting in list order never
 * moves a span that is still waiting to be replaced. A `{{` that is not
 * followed by the sigil is plain template text.
 *
 * @throws RenderError of kind `MalformedPlaceholder`
 */
export function parsePlaceholderLocations(template: string | Cursor): Placeholder[] {
  const placeholders: Placeholder[] = [];
  let current = typeof template === "string" ? Cursor.from(template) : template;

  for (;;) {
    const next = current.indexOf(OPEN);
    if (next === -1) break;
    const start = current.seek(next);

    if (!opensPlaceholder(start)) {
      current = start.advance(1);
      continue;
    }

    const placeholder = parsePlaceholder(start);
    if (!placeholder.ok) {
      throw RenderError.fromFailure(placeholder.error, "MalformedPlaceholder");
    }
    placeholders.push(placeholder.value);
    current = placeholder.rest;
  }

  return placeholders.reverse();
}
