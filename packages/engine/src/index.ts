/**
 * Rendering engine for pagewright.
 *
 * Parses a Markdown source (optional metadata block, title, body), finds the
 * `{{ £name | filter }}` placeholders of an HTML template and substitutes
 * their filtered values.
 *
 * @example
 * ```ts
 * import { renderDocument } from "@pagewright/engine";
 *
 * const { html } = renderDocument(
 *   ":meta\nauthor = Jane Roe\n:meta\n# Hello\nWelcome.",
 *   "<h1>{{ £title | uppercase }}</h1><p>{{ £author }}</p>",
 *   { renderMarkdown: (body) => body }
 * );
 * // <h1>HELLO</h1><p>Jane Roe</p>
 * ```
 */

// Types
export type {
  Position,
  Span,
  MetaEntry,
  TextCase,
  Filter,
  FilterType,
  Placeholder,
  VariableTable,
  VariablePrecedence,
  RenderErrorKind,
  ParseFailure,
  ParseSuccess,
  ParseError,
  ParseResult,
  FilterContext,
  TitledDocument,
} from "./types.js";

// Cursor and errors
export { Cursor } from "./cursor.js";
export { RenderError } from "./errors.js";

// Lexical parsers
export {
  SIGIL,
  parseIdentifier,
  parseVariable,
  parseUntilEol,
  parseMetaComment,
  parseQuotedString,
  parseMetaKeyValue,
} from "./lexemes.js";

// Metadata, title, document
export { parseMetaSection, readMetadata, type MetaMarkerStyle } from "./meta.js";
export { parseTitle, extractTitle } from "./title.js";
export { parseMarkdownDocument, type MarkdownDocument } from "./document.js";

// Placeholders and filters
export { parsePlaceholder, parsePlaceholderLocations } from "./placeholders.js";
export {
  FILTER_NAMES,
  MAX_PRECISION,
  parseFilterKeyValue,
  parseFilterArgs,
  parseFilter,
  parseFilters,
  renderFilter,
  applyFilters,
  type FilterArgument,
} from "./filters.js";
export { parseTextCase, convertCase, splitWords } from "./text-case.js";

// Rendering
export { createVariables, type VariableOptions } from "./variables.js";
export {
  replaceSubstring,
  renderTemplate,
  renderDocument,
  type RenderOptions,
  type RenderResult,
} from "./render.js";
