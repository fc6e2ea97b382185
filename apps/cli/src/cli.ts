import {
  CliError,
  ERROR_CODES,
  Logger,
  configureLogging,
  getCurrentVersion,
  getLogger,
  hasFlag,
  loadConfig,
  output,
  parseArgs,
} from "@pagewright/core";
import { handleInspect, inspectHelp } from "./commands/inspect.js";
import { handleRender, renderHelp, type CommandEnv } from "./commands/render.js";

const VERSION = getCurrentVersion();

/** Flags that never take a value */
const BOOLEAN_FLAGS = ["json", "no-log", "help", "version", "stdout"];

export interface RunOptions {
  cwd?: string;
  /** Overrides ~/.pagewright/config.json */
  globalConfigPath?: string;
  /** Overrides ~/.pagewright/logs */
  globalLogDir?: string;
}

export function rootHelp(): string {
  return `pagewright v${VERSION}

pagewright <command>

Commands:
  render      Render Markdown documents into an HTML template
  inspect     Show placeholders of a template or the parts of a document
  version     Show version

Global options:
  --json             JSON output
  --no-log           Disable logging for this command
  --help, -h         Show help
  --version, -v      Show version
`;
}

function commandHelp(command: string): string {
  switch (command) {
    case "render":
      return renderHelp();
    case "inspect":
      return inspectHelp();
    default:
      return rootHelp();
  }
}

/**
 * Run one CLI invocation. Failures are thrown for the caller to report.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<void> {
  const parsed = parseArgs(argv, BOOLEAN_FLAGS);
  const [command, ...rest] = parsed._;
  const json = hasFlag(parsed.flags, "json");
  const noLog = hasFlag(parsed.flags, "no-log");
  const helpRequested = hasFlag(parsed.flags, "help") || hasFlag(parsed.flags, "h");
  const versionRequested = hasFlag(parsed.flags, "version") || hasFlag(parsed.flags, "v");
  const opts = { json };
  const cwd = options.cwd ?? process.cwd();
  const startTime = Date.now();

  const { config, projectRoot } = await loadConfig({ globalPath: options.globalConfigPath, cwd });

  if (noLog) {
    Logger.disable();
  } else {
    Logger.enable();
    configureLogging({
      level: config.logging?.level ?? "info",
      enableGlobal: config.logging?.global ?? true,
      enableProject: config.logging?.project ?? true,
      projectDir: projectRoot ?? cwd,
      globalDir: options.globalLogDir,
    });
  }

  const logger = getLogger();

  if (versionRequested) {
    output({ version: VERSION }, opts);
    return;
  }

  if (!command) {
    output(rootHelp(), opts);
    return;
  }

  if (helpRequested) {
    output(commandHelp(command), opts);
    return;
  }

  logger.command({
    command: [command, ...rest],
    args: rest,
    flags: parsed.flags,
    cwd,
  });

  const env: CommandEnv = { config, cwd };

  try {
    switch (command) {
      case "render":
        await handleRender(rest, parsed.flags, opts, env);
        break;
      case "inspect":
        await handleInspect(rest, parsed.flags, opts, env);
        break;
      case "version":
        output({ version: VERSION }, opts);
        break;
      default:
        throw new CliError(ERROR_CODES.USAGE, `Unknown command: ${command}. Run pagewright --help.`, {
          command,
        });
    }

    logger.result({
      command: [command, ...rest],
      exitCode: 0,
      durationMs: Date.now() - startTime,
    });
  } catch (err) {
    const context = { command: [command, ...rest] };
    if (err instanceof CliError) {
      logger.errorWithCode(err.code, err.message, context);
    } else {
      logger.error(err instanceof Error ? err : new Error(String(err)), context);
    }
    logger.result({
      command: [command, ...rest],
      exitCode: 1,
      durationMs: Date.now() - startTime,
    });
    throw err;
  } finally {
    await logger.flush();
  }
}
