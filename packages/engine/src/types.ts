/**
 * Core types for the pagewright rendering engine.
 */

import type { Cursor } from "./cursor.js";

/** Location in the original source text */
export interface Position {
  /** 1-based line number */
  line: number;
  /** Absolute index into the source (UTF-16 code units) */
  offset: number;
}

/** Half-open range `[start.offset, end.offset)` over the source */
export interface Span {
  start: Position;
  end: Position;
}

/** One `key = value` line of a metadata block */
export interface MetaEntry {
  key: string;
  value: string;
}

/** Case conversions offered by the text filter */
export type TextCase =
  | "lower"
  | "upper"
  | "title"
  | "kebab"
  | "snake"
  | "pascal"
  | "camel"
  | "invert";

/** The closed set of filters a placeholder can apply */
export type Filter =
  | { type: "ceil" }
  | { type: "floor" }
  | { type: "round"; precision: number }
  | { type: "text"; case: TextCase }
  | { type: "markdown" }
  | { type: "replace"; find: string; replacement: string; limit: number | null }
  | { type: "reverse" }
  | { type: "truncate"; characters: number; trail: string };

export type FilterType = Filter["type"];

/** A `{{ £name | filter }}` occurrence in a template */
export interface Placeholder {
  name: string;
  filters: Filter[];
  /** Covers `{{` through `}}` inclusive */
  selection: Span;
}

/** Resolved variable values for one render */
export type VariableTable = ReadonlyMap<string, string>;

/** Which side wins when metadata declares `title` or `content` */
export type VariablePrecedence = "metadata" | "derived";

/** Reasons a parse or render can fail */
export type RenderErrorKind =
  | "MalformedMetadataBlock"
  | "MissingTitle"
  | "MalformedPlaceholder"
  | "UndefinedVariable"
  | "InvalidFilterInput";

/** Why a parser did not match */
export interface ParseFailure {
  /** What the parser was looking for, or what went wrong */
  message: string;
  position: Position;
  /** Set when the failure is a hard error rather than "no match" */
  kind?: RenderErrorKind;
}

export interface ParseSuccess<T> {
  ok: true;
  value: T;
  /** Cursor just past the consumed input */
  rest: Cursor;
}

export interface ParseError {
  ok: false;
  error: ParseFailure;
}

export type ParseResult<T> = ParseSuccess<T> | ParseError;

/** Capabilities filters delegate to */
export interface FilterContext {
  /** Render CommonMark text to an HTML fragment */
  renderMarkdown: (body: string) => string;
}

/** Result of splitting a Markdown document into title and body */
export interface TitledDocument {
  title: string;
  body: string;
}
