/**
 * Filter grammar and evaluation.
 *
 * A filter is written `name`, `name = value` or
 * `name = key: value, key: value`. The set of filters is closed; each one is
 * described by a definition listing its parameters, the parameter an
 * unlabelled value goes to, and how to build the Filter from its arguments.
 */

import type { Cursor } from "./cursor.js";
import { failure, RenderError, success } from "./errors.js";
import { parseIdentifier, parseQuotedString, skipBlanks, skipWhitespace } from "./lexemes.js";
import { convertCase, parseTextCase } from "./text-case.js";
import type { Filter, FilterContext, ParseResult, TextCase } from "./types.js";

/** One argument as written: `key: value`, or a bare value with no key */
export interface FilterArgument {
  key: string | null;
  value: string;
}

/** Stops at `,`, `|`, `}}` or the end of the line */
const BARE_VALUE = /(?:[^,|}\n]|\}(?!\}))*/y;
const UINT = /^\d+$/;
/** sign, whole digits, fraction digits, exponent; at least one digit */
const NUMBER = /^([+-]?)(?=\.?\d)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/** Largest `precision` accepted by round */
export const MAX_PRECISION = 100;
/** Largest exponent magnitude expanded into digits */
const MAX_EXPONENT = 1000;

/**
 * Reads named arguments for a filter definition, remembering the first
 * value that does not have the expected shape.
 */
class ArgumentReader {
  problem: string | null = null;

  constructor(
    private readonly filter: string,
    private readonly values: ReadonlyMap<string, string>
  ) {}

  string(param: string, fallback: string): string {
    return this.values.get(param) ?? fallback;
  }

  uint(param: string, fallback: number, max?: number): number {
    return this.optionalUint(param, max) ?? fallback;
  }

  optionalUint(param: string, max = Number.MAX_SAFE_INTEGER): number | null {
    const raw = this.values.get(param);
    if (raw === undefined) return null;
    const value = Number(raw);
    if (!UINT.test(raw) || !Number.isSafeInteger(value)) {
      this.reject(`"${param}" of ${this.filter} must be a whole number, got "${raw}"`);
      return null;
    }
    if (value > max) {
      this.reject(`"${param}" of ${this.filter} must be at most ${max}, got "${raw}"`);
      return null;
    }
    return value;
  }

  textCase(param: string, fallback: TextCase): TextCase {
    const raw = this.values.get(param);
    if (raw === undefined) return fallback;
    const textCase = parseTextCase(raw);
    if (!textCase) {
      this.reject(`Unknown text case "${raw}"`);
      return fallback;
    }
    return textCase;
  }

  private reject(message: string): void {
    this.problem ??= message;
  }
}

interface FilterDefinition {
  params: readonly string[];
  /** Parameter that receives an unlabelled value */
  positional?: string;
  build: (args: ArgumentReader) => Filter;
}

const FILTERS: Record<string, FilterDefinition> = {
  ceil: { params: [], build: () => ({ type: "ceil" }) },
  floor: { params: [], build: () => ({ type: "floor" }) },
  round: {
    params: ["precision"],
    positional: "precision",
    build: (args) => ({ type: "round", precision: args.uint("precision", 0, MAX_PRECISION) }),
  },
  text: {
    params: ["case"],
    positional: "case",
    build: (args) => ({ type: "text", case: args.textCase("case", "lower") }),
  },
  lowercase: { params: [], build: () => ({ type: "text", case: "lower" }) },
  uppercase: { params: [], build: () => ({ type: "text", case: "upper" }) },
  markdown: { params: [], build: () => ({ type: "markdown" }) },
  replace: {
    params: ["find", "replacement", "limit"],
    positional: "find",
    build: (args) => ({
      type: "replace",
      find: args.string("find", ""),
      replacement: args.string("replacement", ""),
      limit: args.optionalUint("limit"),
    }),
  },
  reverse: { params: [], build: () => ({ type: "reverse" }) },
  truncate: {
    params: ["characters", "trail"],
    positional: "characters",
    build: (args) => ({
      type: "truncate",
      characters: args.uint("characters", 100),
      trail: args.string("trail", "..."),
    }),
  },
};

/** Names accepted after `|`, in lower case */
export const FILTER_NAMES: readonly string[] = Object.keys(FILTERS);

function parseArgumentValue(cursor: Cursor): ParseResult<string> {
  const start = skipBlanks(cursor);
  if (start.peek() === '"') {
    const quoted = parseQuotedString(start);
    if (!quoted.ok) return quoted;
    return success(quoted.value, skipBlanks(quoted.rest));
  }
  const raw = start.match(BARE_VALUE) ?? "";
  const value = raw.trim();
  if (value === "") {
    return failure("Expected a filter argument value", start);
  }
  return success(value, start.advance(raw.length));
}

/**
 * Parse a labelled argument such as `characters: 20`.
 */
export function parseFilterKeyValue(cursor: Cursor): ParseResult<FilterArgument> {
  const start = skipBlanks(cursor);
  const key = parseIdentifier(start);
  if (!key.ok) return key;

  const colon = skipBlanks(key.rest);
  if (colon.peek() !== ":") {
    return failure(`Expected ":" after "${key.value}"`, colon);
  }

  const value = parseArgumentValue(colon.advance(1));
  if (!value.ok) return value;
  return success({ key: key.value, value: value.value }, value.rest);
}

function hasLabel(cursor: Cursor): boolean {
  const key = parseIdentifier(skipBlanks(cursor));
  return key.ok && skipBlanks(key.rest).peek() === ":";
}

/**
 * Parse a comma-separated argument list. Each item is either `key: value`
 * or a bare value.
 */
export function parseFilterArgs(cursor: Cursor): ParseResult<FilterArgument[]> {
  const args: FilterArgument[] = [];
  let current = cursor;

  for (;;) {
    if (hasLabel(current)) {
      const named = parseFilterKeyValue(current);
      if (!named.ok) return named;
      args.push(named.value);
      current = named.rest;
    } else {
      const value = parseArgumentValue(current);
      if (!value.ok) return value;
      args.push({ key: null, value: value.value });
      current = value.rest;
    }

    if (current.peek() !== ",") break;
    current = current.advance(1);
  }

  return success(args, current);
}

function collectArguments(
  name: string,
  definition: FilterDefinition,
  args: FilterArgument[],
  at: Cursor
): ParseResult<Map<string, string>> {
  const values = new Map<string, string>();
  const named = new Set<string>();

  for (const [index, arg] of args.entries()) {
    if (arg.key === null) {
      if (index > 0) {
        return failure(`Unlabelled argument to ${name} must come first`, at);
      }
      if (!definition.positional) {
        return failure(`Filter ${name} takes no arguments`, at);
      }
      // Labelled arguments come later and override this one
      values.set(definition.positional, arg.value);
      continue;
    }

    if (!definition.params.includes(arg.key)) {
      return failure(
        definition.params.length === 0
          ? `Filter ${name} takes no arguments`
          : `Unknown argument "${arg.key}" for ${name} (expected ${definition.params.join(", ")})`,
        at
      );
    }
    if (named.has(arg.key)) {
      return failure(`Argument "${arg.key}" given twice to ${name}`, at);
    }
    named.add(arg.key);
    values.set(arg.key, arg.value);
  }

  return success(values, at);
}

/**
 * Parse one filter (without its leading `|`).
 */
export function parseFilter(cursor: Cursor): ParseResult<Filter> {
  const start = skipBlanks(cursor);
  const name = parseIdentifier(start);
  if (!name.ok) {
    return failure("Expected a filter name", start);
  }

  const key = name.value.toLowerCase();
  if (!Object.hasOwn(FILTERS, key)) {
    return failure(`Unknown filter "${name.value}"`, start);
  }
  const definition = FILTERS[key];

  let args: FilterArgument[] = [];
  let rest = name.rest;
  const equals = skipBlanks(name.rest);
  if (equals.peek() === "=") {
    const parsed = parseFilterArgs(equals.advance(1));
    if (!parsed.ok) return parsed;
    args = parsed.value;
    rest = parsed.rest;
  }

  const values = collectArguments(key, definition, args, start);
  if (!values.ok) return values;

  const reader = new ArgumentReader(key, values.value);
  const filter = definition.build(reader);
  if (reader.problem) {
    return failure(reader.problem, start);
  }
  return success(filter, rest);
}

/**
 * Parse a filter pipeline: zero or more `| filter` in application order.
 */
export function parseFilters(cursor: Cursor): ParseResult<Filter[]> {
  const filters: Filter[] = [];
  let current = cursor;

  for (;;) {
    const pipe = skipWhitespace(current);
    if (pipe.peek() !== "|") break;
    const filter = parseFilter(pipe.advance(1));
    if (!filter.ok) return filter;
    filters.push(filter.value);
    current = filter.rest;
  }

  return success(filters, current);
}

// Evaluation

/** A decimal number as digit strings, exponent already applied */
interface Decimal {
  negative: boolean;
  /** No leading zeros, "0" when empty */
  whole: string;
  fraction: string;
}

function outOfRange(value: string, filter: string): RenderError {
  return new RenderError("InvalidFilterInput", `${filter} cannot handle "${value}": number out of range`);
}

/**
 * Read a number without going through a float, shifting the digits by the
 * exponent so `1.5e3` becomes whole "1500".
 */
function parseDecimal(value: string, filter: string): Decimal {
  const text = value.trim();
  const parsed = NUMBER.exec(text);
  if (!parsed) {
    throw new RenderError("InvalidFilterInput", `${filter} expects a number, got "${value}"`);
  }
  if (!Number.isFinite(Number(text))) {
    throw outOfRange(value, filter);
  }

  const [, sign, whole, fraction = "", exponent = "0"] = parsed;
  const shift = Number(exponent);
  if (Math.abs(shift) > MAX_EXPONENT) {
    throw outOfRange(value, filter);
  }

  let digits = whole + fraction;
  let point = whole.length + shift;
  if (point < 0) {
    digits = "0".repeat(-point) + digits;
    point = 0;
  }
  digits = digits.padEnd(point, "0");

  return {
    negative: sign === "-",
    whole: digits.slice(0, point).replace(/^0+/, "") || "0",
    fraction: digits.slice(point),
  };
}

function formatSigned(negative: boolean, magnitude: bigint, digits: string): string {
  // Never "-0"
  return (negative && magnitude !== 0n ? "-" : "") + digits;
}

/**
 * ceil or floor on the digits: drop the fraction, then step away from zero
 * when it was not zero and the direction calls for it.
 */
function toInteger(value: string, filter: "ceil" | "floor"): string {
  const { negative, whole, fraction } = parseDecimal(value, filter);
  let magnitude = BigInt(whole);
  const exact = /^0*$/.test(fraction);
  if (!exact && negative === (filter === "floor")) {
    magnitude += 1n;
  }
  return formatSigned(negative, magnitude, magnitude.toString());
}

/**
 * Round half away from zero on the decimal digits themselves, so that
 * `1.005` rounds to `1.01` at two places.
 */
function roundDecimal(value: string, precision: number): string {
  if (!Number.isSafeInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
    throw new RenderError(
      "MalformedPlaceholder",
      `"precision" of round must be a whole number up to ${MAX_PRECISION}, got ${precision}`
    );
  }
  const { negative, whole, fraction } = parseDecimal(value, "round");

  const digits = fraction.padEnd(precision + 1, "0");
  let scaled = BigInt(whole + digits.slice(0, precision));
  if (digits.charCodeAt(precision) >= "5".charCodeAt(0)) {
    scaled += 1n;
  }

  const padded = scaled.toString().padStart(precision + 1, "0");
  const integer = padded.slice(0, padded.length - precision);
  const decimals = padded.slice(padded.length - precision);
  return formatSigned(negative, scaled, integer + (precision > 0 ? `.${decimals}` : ""));
}

function replace(value: string, find: string, replacement: string, limit: number | null): string {
  if (find === "") return value;
  if (limit === null) return value.split(find).join(replacement);

  let result = "";
  let from = 0;
  for (let count = 0; count < limit; count++) {
    const index = value.indexOf(find, from);
    if (index === -1) break;
    result += value.slice(from, index) + replacement;
    from = index + find.length;
  }
  return result + value.slice(from);
}

function truncate(value: string, characters: number, trail: string): string {
  const chars = Array.from(value);
  if (chars.length <= characters) return value;
  return chars.slice(0, characters).join("") + trail;
}

/**
 * Apply one filter to a value.
 *
 * @throws RenderError of kind `InvalidFilterInput` when a numeric filter
 *   gets text that is not a decimal number, or one too large to print
 */
export function renderFilter(value: string, filter: Filter, context: FilterContext): string {
  switch (filter.type) {
    case "ceil":
    case "floor":
      return toInteger(value, filter.type);
    case "round":
      return roundDecimal(value, filter.precision);
    case "text":
      return convertCase(value, filter.case);
    case "markdown":
      return context.renderMarkdown(value);
    case "replace":
      return replace(value, filter.find, filter.replacement, filter.limit);
    case "reverse":
      return Array.from(value).reverse().join("");
    case "truncate":
      return truncate(value, filter.characters, filter.trail);
  }
}

/** Fold a pipeline over a value, left to right. */
export function applyFilters(value: string, filters: readonly Filter[], context: FilterContext): string {
  return filters.reduce((current, filter) => renderFilter(current, filter, context), value);
}
