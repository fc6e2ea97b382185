import type { MarkdownDocument } from "./document.js";
import type { VariablePrecedence, VariableTable } from "./types.js";

export interface VariableOptions {
  /**
   * Which side wins when the metadata declares `title` or `content`.
   * Defaults to "metadata".
   */
  precedence?: VariablePrecedence;
}

/**
 * Build the variable table for one render.
 *
 * Holds every metadata entry (a repeated key keeps its last value) plus the
 * derived `title` and `content`. `content` is the raw body; a placeholder
 * turns it into HTML with the `markdown` filter.
 */
export function createVariables(
  document: MarkdownDocument,
  options: VariableOptions = {}
): VariableTable {
  const precedence = options.precedence ?? "metadata";

  const derived = new Map<string, string>();
  if (document.title !== null) derived.set("title", document.title);
  derived.set("content", document.body);

  const variables = new Map<string, string>();
  const apply = (entries: Iterable<[string, string]>) => {
    for (const [key, value] of entries) variables.set(key, value);
  };
  const meta = document.meta.map((entry): [string, string] => [entry.key, entry.value]);

  if (precedence === "metadata") {
    apply(derived);
    apply(meta);
  } else {
    apply(meta);
    apply(derived);
  }
  return variables;
}
