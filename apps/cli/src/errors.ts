import { CliError, ConfigError, ERROR_CODES } from "@pagewright/core";
import { RenderError } from "@pagewright/engine";

function isErrnoError(err: unknown): err is Error & { code: string; path?: string } {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/**
 * Map any thrown value to the error code and details the CLI reports.
 */
export function toCliError(err: unknown): CliError {
  if (err instanceof CliError) return err;

  if (err instanceof RenderError) {
    return new CliError(ERROR_CODES.RENDER, err.message, {
      kind: err.kind,
      line: err.position?.line,
      offset: err.position?.offset,
    });
  }

  if (err instanceof ConfigError) {
    return new CliError(ERROR_CODES.CONFIG, err.message, { path: err.path });
  }

  if (isErrnoError(err)) {
    return new CliError(ERROR_CODES.IO, err.message, { errno: err.code, path: err.path });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new CliError(ERROR_CODES.INTERNAL, message);
}
