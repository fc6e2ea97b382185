import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ConfigError,
  findProjectConfig,
  loadConfig,
  mergeConfig,
  readConfigFile,
} from "./config.js";

describe("config", () => {
  let tempDir: string;
  let globalPath: string;
  let projectDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "pagewright-config-test-"));
    globalPath = join(tempDir, "home", "config.json");
    projectDir = join(tempDir, "site");
    await mkdir(join(tempDir, "home"), { recursive: true });
    await mkdir(join(projectDir, ".pagewright"), { recursive: true });
    await mkdir(join(projectDir, "posts", "2024"), { recursive: true });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("readConfigFile", () => {
    test("returns an empty config for a missing file", async () => {
      expect(await readConfigFile(join(tempDir, "missing.json"))).toEqual({});
    });

    test("rejects invalid JSON", async () => {
      await writeFile(globalPath, "{ not json");
      await expect(readConfigFile(globalPath)).rejects.toBeInstanceOf(ConfigError);
    });

    test("rejects values of the wrong type", async () => {
      await writeFile(globalPath, JSON.stringify({ logging: { level: "loud" } }));
      await expect(readConfigFile(globalPath)).rejects.toThrow(`Invalid config in ${globalPath} at logging.level`);
    });
  });

  describe("findProjectConfig", () => {
    test("walks up to the nearest .pagewright/config.json", async () => {
      const configPath = join(projectDir, ".pagewright", "config.json");
      await writeFile(configPath, "{}");
      expect(findProjectConfig(join(projectDir, "posts", "2024"))).toBe(configPath);
    });
  });

  describe("mergeConfig", () => {
    test("overlays each section", () => {
      const merged = mergeConfig(
        { logging: { level: "debug", global: false }, render: { outDir: "out" } },
        { logging: { level: "warn" }, markdown: { linkify: true } }
      );
      expect(merged).toEqual({
        logging: { level: "warn", global: false },
        render: { outDir: "out" },
        markdown: { linkify: true },
      });
    });
  });

  describe("loadConfig", () => {
    test("uses the global config when there is no project", async () => {
      await writeFile(globalPath, JSON.stringify({ render: { precedence: "derived" } }));
      const { config, projectRoot } = await loadConfig({ globalPath, cwd: join(tempDir, "home") });

      expect(projectRoot).toBeNull();
      expect(config.render).toEqual({ precedence: "derived" });
    });

    test("project config wins and resolves its paths", async () => {
      await writeFile(
        globalPath,
        JSON.stringify({ render: { precedence: "derived", outDir: "/srv/www" }, logging: { level: "debug" } })
      );
      await writeFile(
        join(projectDir, ".pagewright", "config.json"),
        JSON.stringify({ render: { template: "layout/page.html", outDir: "public" } })
      );

      const { config, projectRoot } = await loadConfig({ globalPath, cwd: join(projectDir, "posts") });

      expect(projectRoot).toBe(projectDir);
      expect(config.render).toEqual({
        precedence: "derived",
        template: join(projectDir, "layout", "page.html"),
        outDir: join(projectDir, "public"),
      });
      expect(config.logging).toEqual({ level: "debug" });
    });
  });
});
