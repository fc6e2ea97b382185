import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import os from "node:os";
import { z } from "zod";

const LoggingConfigSchema = z
  .object({
    /** Log level: off, error, warn, info, debug */
    level: z.enum(["off", "error", "warn", "info", "debug"]),
    /** Enable global logs (~/.pagewright/logs/) */
    global: z.boolean(),
    /** Enable project-level logs (.pagewright/logs/) */
    project: z.boolean(),
  })
  .partial();

const RenderConfigSchema = z
  .object({
    /** Default HTML template, relative to the config's project root */
    template: z.string(),
    /** Directory rendered pages are written to */
    outDir: z.string(),
    /** Which side wins when metadata declares title or content */
    precedence: z.enum(["metadata", "derived"]),
  })
  .partial();

const MarkdownConfigSchema = z
  .object({
    html: z.boolean(),
    linkify: z.boolean(),
    typographer: z.boolean(),
    taskLists: z.boolean(),
  })
  .partial();

export const ConfigSchema = z.object({
  logging: LoggingConfigSchema.optional(),
  render: RenderConfigSchema.optional(),
  markdown: MarkdownConfigSchema.optional(),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/** Thrown for unreadable or invalid configuration files */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const CONFIG_DIR = join(os.homedir(), ".pagewright");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export interface LoadConfigOptions {
  /** Global config file (default ~/.pagewright/config.json) */
  globalPath?: string;
  /** Directory to search upwards from for .pagewright/config.json */
  cwd?: string;
}

/** A loaded configuration and where it came from */
export interface LoadedConfig {
  config: Config;
  /** Directory holding the project's .pagewright folder, if one was found */
  projectRoot: string | null;
}

/**
 * Find the nearest `.pagewright/config.json` at or above `from`.
 */
export function findProjectConfig(from: string): string | null {
  let dir = resolve(from);
  for (;;) {
    const candidate = join(dir, ".pagewright", "config.json");
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export async function readConfigFile(path: string): Promise<Config> {
  if (!existsSync(path)) {
    return {};
  }
  const raw = await readFile(path, "utf8");

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid JSON in ${path}: ${reason}`, path);
  }

  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(`Invalid config in ${path} at ${where}: ${issue.message}`, path);
  }
  return parsed.data;
}

/**
 * Overlay `override` on `base`, section by section.
 */
export function mergeConfig(base: Config, override: Config): Config {
  return {
    logging: { ...base.logging, ...override.logging },
    render: { ...base.render, ...override.render },
    markdown: { ...base.markdown, ...override.markdown },
  };
}

/**
 * Load the global config and overlay the nearest project config.
 *
 * Relative paths in the project's `render` section are resolved against the
 * project root.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const globalConfig = await readConfigFile(options.globalPath ?? CONFIG_PATH);

  const projectPath = findProjectConfig(options.cwd ?? process.cwd());
  if (!projectPath) {
    return { config: mergeConfig({}, globalConfig), projectRoot: null };
  }

  const projectRoot = dirname(dirname(projectPath));
  const projectConfig = await readConfigFile(projectPath);
  const render = projectConfig.render;
  if (render) {
    if (render.template) render.template = resolve(projectRoot, render.template);
    if (render.outDir) render.outDir = resolve(projectRoot, render.outDir);
  }

  return { config: mergeConfig(globalConfig, projectConfig), projectRoot };
}
