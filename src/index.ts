#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { EXIT, exit } from "./exit-codes.js";
import { ConfigError } from "./shared/errors.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  exit(error instanceof ConfigError ? EXIT.INVALID_ARGS : EXIT.GENERIC_ERROR, message);
});
