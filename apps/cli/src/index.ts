#!/usr/bin/env node
import { fail } from "@pagewright/core";
import { run } from "./cli.js";
import { toCliError } from "./errors.js";

const argv = process.argv.slice(2);

run(argv).catch((err: unknown) => {
  const error = toCliError(err);
  fail({ json: argv.includes("--json") }, error.exitCode, error.code, error.message, error.details);
});
