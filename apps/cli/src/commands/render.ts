import { basename, extname, join, relative, resolve } from "node:path";
import {
  CliError,
  ERROR_CODES,
  createMarkdownRenderer,
  getFlag,
  getLogger,
  hasFlag,
  output,
  readTextFile,
  writeTextFile,
  type Config,
  type OutputOptions,
} from "@pagewright/core";
import {
  RenderError,
  renderDocument,
  type RenderOptions,
  type RenderResult,
  type VariablePrecedence,
} from "@pagewright/engine";

/** What commands get besides their arguments */
export interface CommandEnv {
  config: Config;
  cwd: string;
}

/** One rendered Markdown file */
export interface RenderedPage {
  input: string;
  output: string | null;
  placeholders: number;
  html: string;
}

const PRECEDENCES: readonly VariablePrecedence[] = ["metadata", "derived"];

export function renderHelp(): string {
  return `pagewright render <file.md...> --template <file.html> [options]

Render Markdown documents into an HTML template.

Options:
  --template <file>     HTML template (default: render.template from config)
  --out <dir>           Output directory (default: render.outDir, or the current directory)
  --stdout              Print the HTML instead of writing a file (one input only)
  --precedence <side>   metadata (default) or derived: which wins for title/content
  --json                JSON output
`;
}

function parsePrecedence(value: string | undefined, fallback: VariablePrecedence): VariablePrecedence {
  if (value === undefined) return fallback;
  const match = PRECEDENCES.find((p) => p === value);
  if (!match) {
    throw new CliError(ERROR_CODES.USAGE, `--precedence must be one of: ${PRECEDENCES.join(", ")}`, {
      precedence: value,
    });
  }
  return match;
}

/**
 * Render one document, turning engine errors into CLI errors that name the
 * input file.
 */
function renderPage(
  input: string,
  markdown: string,
  template: string,
  templatePath: string,
  options: RenderOptions
): RenderResult {
  try {
    return renderDocument(markdown, template, options);
  } catch (err) {
    if (!(err instanceof RenderError)) throw err;
    getLogger().render({ eventType: "error", input, template: templatePath, message: err.message });
    throw new CliError(ERROR_CODES.RENDER, `${input}: ${err.message}`, {
      file: input,
      kind: err.kind,
      line: err.position?.line,
      offset: err.position?.offset,
    });
  }
}

export async function handleRender(
  args: string[],
  flags: Record<string, string | boolean | string[]>,
  opts: OutputOptions,
  env: CommandEnv
): Promise<RenderedPage[]> {
  if (hasFlag(flags, "help")) {
    output(renderHelp(), opts);
    return [];
  }

  if (args.length === 0) {
    throw new CliError(ERROR_CODES.USAGE, "Usage: pagewright render <file.md...> --template <file.html>");
  }

  const templatePath = getFlag(flags, "template") ?? env.config.render?.template;
  if (!templatePath) {
    throw new CliError(ERROR_CODES.USAGE, "--template is required (or set render.template in config)");
  }

  const toStdout = hasFlag(flags, "stdout");
  if (toStdout && args.length > 1) {
    throw new CliError(ERROR_CODES.USAGE, "--stdout takes a single input file", { inputs: args });
  }

  const precedence = parsePrecedence(
    getFlag(flags, "precedence"),
    env.config.render?.precedence ?? "metadata"
  );
  const outDir = resolve(env.cwd, getFlag(flags, "out") ?? env.config.render?.outDir ?? ".");
  const renderMarkdown = createMarkdownRenderer(env.config.markdown);
  const logger = getLogger();

  const template = await readTextFile(resolve(env.cwd, templatePath));
  const pages: RenderedPage[] = [];

  for (const input of args) {
    const inputPath = resolve(env.cwd, input);
    const markdown = await readTextFile(inputPath);
    const startTime = Date.now();

    const result = renderPage(input, markdown, template, templatePath, { renderMarkdown, precedence });

    let outputPath: string | null = null;
    if (!toStdout) {
      outputPath = join(outDir, `${basename(input, extname(input))}.html`);
      await writeTextFile(outputPath, result.html);
    }

    logger.render({
      eventType: "render",
      input,
      template: templatePath,
      output: outputPath ?? undefined,
      placeholders: result.placeholders.length,
      durationMs: Date.now() - startTime,
    });

    pages.push({
      input,
      output: outputPath,
      placeholders: result.placeholders.length,
      html: result.html,
    });
  }

  if (toStdout) {
    const [page] = pages;
    if (opts.json) {
      output({ input: page.input, html: page.html }, opts);
    } else {
      process.stdout.write(page.html);
    }
    return pages;
  }

  if (opts.json) {
    output(
      {
        rendered: pages.map(({ input, output: file, placeholders }) => ({ input, output: file, placeholders })),
      },
      opts
    );
  } else {
    for (const page of pages) {
      const target = page.output ? relative(env.cwd, page.output) : "-";
      output(`Rendered ${page.input} -> ${target} (${page.placeholders} placeholders)`, opts);
    }
  }
  return pages;
}
