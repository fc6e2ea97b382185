/**
 * Template substitution.
 */

import { parseMarkdownDocument } from "./document.js";
import { RenderError } from "./errors.js";
import { applyFilters } from "./filters.js";
import { parsePlaceholderLocations } from "./placeholders.js";
import { createVariables, type VariableOptions } from "./variables.js";
import type { FilterContext, Placeholder, VariableTable } from "./types.js";

export interface RenderOptions extends VariableOptions, FilterContext {}

export interface RenderResult {
  html: string;
  /** Placeholders substituted, last-first */
  placeholders: Placeholder[];
  variables: VariableTable;
}

/**
 * Replace `text[start, end)` with `replacement`.
 */
export function replaceSubstring(text: string, start: number, end: number, replacement: string): string {
  return text.slice(0, start) + replacement + text.slice(end);
}

function resolvePlaceholder(
  placeholder: Placeholder,
  variables: VariableTable,
  context: FilterContext
): string {
  const { name, filters, selection } = placeholder;
  const value = variables.get(name);
  if (value === undefined) {
    throw new RenderError("UndefinedVariable", `Undefined variable "${name}"`, selection.start);
  }

  try {
    return applyFilters(value, filters, context);
  } catch (err) {
    if (err instanceof RenderError && !err.position) {
      throw new RenderError(err.kind, `${err.message} in "${name}"`, selection.start);
    }
    throw err;
  }
}

/**
 * Substitute every placeholder in a template.
 *
 * Placeholders are replaced from the end of the template towards the start,
 * so the spans of those not yet replaced stay valid. Any failure aborts the
 * whole render.
 */
export function renderTemplate(
  template: string,
  variables: VariableTable,
  context: FilterContext
): string {
  return substitute(template, parsePlaceholderLocations(template), variables, context);
}

function substitute(
  template: string,
  placeholders: readonly Placeholder[],
  variables: VariableTable,
  context: FilterContext
): string {
  let output = template;
  for (const placeholder of placeholders) {
    const value = resolvePlaceholder(placeholder, variables, context);
    const { start, end } = placeholder.selection;
    output = replaceSubstring(output, start.offset, end.offset, value);
  }
  return output;
}

/**
 * Render a Markdown document into an HTML template.
 *
 * Runs metadata, title and body extraction, placeholder location, variable
 * table construction and substitution, in that order.
 */
export function renderDocument(markdown: string, template: string, options: RenderOptions): RenderResult {
  const document = parseMarkdownDocument(markdown);
  const placeholders = parsePlaceholderLocations(template);
  const variables = createVariables(document, options);
  const html = substitute(template, placeholders, variables, options);
  return { html, placeholders, variables };
}
