import { describe, test, expect } from "vitest";
import { CliError, ConfigError, ERROR_CODES } from "@pagewright/core";
import { RenderError } from "@pagewright/engine";
import { toCliError } from "./errors.js";

describe("toCliError", () => {
  test("passes CLI errors through", () => {
    const error = new CliError(ERROR_CODES.USAGE, "Missing file");
    expect(toCliError(error)).toBe(error);
  });

  test("maps render errors with their position", () => {
    const error = toCliError(new RenderError("UndefinedVariable", 'Undefined variable "x"', { line: 2, offset: 9 }));

    expect(error.code).toBe(ERROR_CODES.RENDER);
    expect(error.message).toBe('Undefined variable "x" (line 2, offset 9)');
    expect(error.details).toEqual({ kind: "UndefinedVariable", line: 2, offset: 9 });
  });

  test("maps config errors", () => {
    const error = toCliError(new ConfigError("Invalid config", "/site/.pagewright/config.json"));

    expect(error.code).toBe(ERROR_CODES.CONFIG);
    expect(error.details).toEqual({ path: "/site/.pagewright/config.json" });
  });

  test("maps file system errors", () => {
    const cause = Object.assign(new Error("ENOENT: no such file or directory"), {
      code: "ENOENT",
      path: "missing.md",
    });
    const error = toCliError(cause);

    expect(error.code).toBe(ERROR_CODES.IO);
    expect(error.details).toEqual({ errno: "ENOENT", path: "missing.md" });
  });

  test("treats anything else as internal", () => {
    const error = toCliError("boom");

    expect(error.code).toBe(ERROR_CODES.INTERNAL);
    expect(error.message).toBe("boom");
    expect(error.exitCode).toBe(1);
  });
});
