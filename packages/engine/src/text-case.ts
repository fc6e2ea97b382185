import type { TextCase } from "./types.js";

const CASE_NAMES: Record<string, TextCase> = {
  lower: "lower",
  upper: "upper",
  title: "title",
  kebab: "kebab",
  snake: "snake",
  pascal: "pascal",
  camel: "camel",
  invert: "invert",
};

/**
 * Resolve a case name as written in a template.
 *
 * Letter case, `-`/`_`/space separators and a trailing `case` are ignored,
 * so `kebab-case`, `PascalCase`, `snake_case` and `lowercase` all resolve.
 */
export function parseTextCase(name: string): TextCase | null {
  let key = name.toLowerCase().replace(/[-_\s]/g, "");
  if (key.endsWith("case") && key.length > "case".length) {
    key = key.slice(0, -"case".length);
  }
  return Object.hasOwn(CASE_NAMES, key) ? CASE_NAMES[key] : null;
}

/**
 * Split text into words: runs of letters and digits, further split where a
 * lower-case letter or digit is followed by an upper-case letter.
 */
export function splitWords(text: string): string[] {
  const runs = text.match(/[\p{L}\p{N}]+/gu) ?? [];
  return runs.flatMap((run) => run.replace(/([\p{Ll}\p{N}])(\p{Lu})/gu, "$1 $2").split(" "));
}

function capitalize(word: string): string {
  const [first = "", ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join("").toLowerCase();
}

/** Upper-cases the first code point, leaving the rest as written */
function upperFirst(word: string): string {
  const [first = "", ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join("");
}

function invertCase(text: string): string {
  return Array.from(text, (char) => {
    const upper = char.toUpperCase();
    const lower = char.toLowerCase();
    if (char === upper && char !== lower) return lower;
    if (char === lower && char !== upper) return upper;
    return char;
  }).join("");
}

export function convertCase(text: string, textCase: TextCase): string {
  switch (textCase) {
    case "lower":
      return text.toLowerCase();
    case "upper":
      return text.toUpperCase();
    case "title":
      return text.replace(/\S+/g, upperFirst);
    case "kebab":
      return splitWords(text).map((word) => word.toLowerCase()).join("-");
    case "snake":
      return splitWords(text).map((word) => word.toLowerCase()).join("_");
    case "pascal":
      return splitWords(text).map(capitalize).join("");
    case "camel":
      return splitWords(text)
        .map((word, index) => (index === 0 ? word.toLowerCase() : capitalize(word)))
        .join("");
    case "invert":
      return invertCase(text);
  }
}
