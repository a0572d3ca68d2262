import { Command } from "commander";
import { resolveConfig, type ListenerFlags } from "../config.js";
import { exit } from "../exit-codes.js";
import {
  APP_NAME,
  DEFAULT_LISTEN,
  DEFAULT_LOG_FILE,
  DEFAULT_MAX_FRAME_SIZE,
  VERSION,
} from "../shared/constants.js";
import { runListener } from "./commands/listen.js";

export function createProgram(): Command {
  const program = new Command();

  // No commander defaults: a flag that is absent must fall through to XCLOUD_* env vars.
  program
    .name(APP_NAME)
    .description("Native messaging host for the Xcloud extension, with an HTTP trigger endpoint")
    .version(VERSION)
    .option("--listen <host:port>", `HTTP trigger listen address (default ${DEFAULT_LISTEN})`)
    .option("--log-file <path>", `Append logs to this file (default ${DEFAULT_LOG_FILE})`)
    .option("--log-level <level>", "Log level: fatal, error, warn, info, debug, trace (default info)")
    .option("--log-format <format>", "Log format: json or text (default json)")
    .option("--max-frame-size <bytes>", `Largest accepted frame payload (default ${DEFAULT_MAX_FRAME_SIZE})`)
    .option("--oversize <policy>", "Oversize frames: drain (skip message) or truncate (default drain)")
    .option("--byte-order <order>", "Length header byte order: native, LE or BE (default native)")
    // Browsers append the caller origin (and on Windows --parent-window) to argv.
    .allowExcessArguments(true)
    .allowUnknownOption(true)
    .action(async (opts: ListenerFlags) => {
      const config = resolveConfig(opts);
      const code = await runListener(config, { handleSignals: true });
      exit(code);
    });

  return program;
}
