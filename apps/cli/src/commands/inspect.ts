import { resolve } from "node:path";
import { CliError, ERROR_CODES, hasFlag, output, readTextFile, type OutputOptions } from "@pagewright/core";
import {
  SIGIL,
  parseMarkdownDocument,
  parsePlaceholderLocations,
  type Filter,
} from "@pagewright/engine";
import type { CommandEnv } from "./render.js";

export function inspectHelp(): string {
  return `pagewright inspect <target> <file>

Show what pagewright parses out of a file.

Targets:
  template <file.html>  List placeholders in document order
  markdown <file.md>    Show metadata, title and body size

Options:
  --json                JSON output
`;
}

function quote(value: string): string {
  return /^[^,|"}\n]+$/.test(value) && value.trim() === value ? value : JSON.stringify(value);
}

/**
 * Write a filter back in template syntax, with every argument labelled.
 */
export function formatFilter(filter: Filter): string {
  switch (filter.type) {
    case "round":
      return `round = precision: ${filter.precision}`;
    case "text":
      return `text = case: ${filter.case}`;
    case "replace": {
      const args = [`find: ${quote(filter.find)}`, `replacement: ${quote(filter.replacement)}`];
      if (filter.limit !== null) args.push(`limit: ${filter.limit}`);
      return `replace = ${args.join(", ")}`;
    }
    case "truncate":
      return `truncate = characters: ${filter.characters}, trail: ${quote(filter.trail)}`;
    default:
      return filter.type;
  }
}

async function inspectTemplate(path: string, file: string, opts: OutputOptions): Promise<void> {
  const template = await readTextFile(path);
  const placeholders = parsePlaceholderLocations(template).reverse();

  if (opts.json) {
    output(
      {
        template: file,
        placeholders: placeholders.map(({ name, filters, selection }) => ({
          name,
          line: selection.start.line,
          start: selection.start.offset,
          end: selection.end.offset,
          filters: filters.map(formatFilter),
        })),
      },
      opts
    );
    return;
  }

  if (placeholders.length === 0) {
    output("No placeholders found.", opts);
    return;
  }
  for (const { name, filters, selection } of placeholders) {
    const where = `${selection.start.line}:${selection.start.offset}-${selection.end.offset}`;
    const pipeline = [`${SIGIL}${name}`, ...filters.map(formatFilter)].join(" | ");
    output(`${where.padEnd(14)} ${pipeline}`, opts);
  }
}

async function inspectMarkdown(path: string, file: string, opts: OutputOptions): Promise<void> {
  const document = parseMarkdownDocument(await readTextFile(path));

  if (opts.json) {
    output(
      {
        markdown: file,
        meta: document.meta,
        title: document.title,
        bodyLength: document.body.length,
      },
      opts
    );
    return;
  }

  const lines = [`Title: ${document.title ?? "(from metadata)"}`];
  if (document.meta.length > 0) {
    lines.push("Metadata:");
    for (const { key, value } of document.meta) {
      lines.push(`  ${key} = ${JSON.stringify(value)}`);
    }
  }
  lines.push(`Body: ${document.body.length} characters`);
  output(lines.join("\n"), opts);
}

export async function handleInspect(
  args: string[],
  flags: Record<string, string | boolean | string[]>,
  opts: OutputOptions,
  env: CommandEnv
): Promise<void> {
  const [target, file] = args;
  if (hasFlag(flags, "help") || !target) {
    output(inspectHelp(), opts);
    return;
  }
  if (!file) {
    throw new CliError(ERROR_CODES.USAGE, `Usage: pagewright inspect ${target} <file>`);
  }

  const path = resolve(env.cwd, file);
  switch (target) {
    case "template":
      await inspectTemplate(path, file, opts);
      break;
    case "markdown":
      await inspectMarkdown(path, file, opts);
      break;
    default:
      throw new CliError(ERROR_CODES.USAGE, `Unknown inspect target: ${target}`, { target });
  }
}
