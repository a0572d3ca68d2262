import type { Writable } from "node:stream";
import type { ListenerConfig } from "../../config.js";
import { EXIT, exit, type ExitCode } from "../../exit-codes.js";
import { FrameSender } from "../../host/sender.js";
import { StdioLoop } from "../../host/stdio-loop.js";
import { startTriggerServer, type TriggerServerHandle } from "../../server/server.js";
import { VERSION } from "../../shared/constants.js";
import { openLogContext } from "../../shared/logging.js";

export interface ListenerIo {
  stdin: AsyncIterable<Uint8Array | string>;
  stdout: Writable;
}

export interface RunListenerOptions {
  io?: ListenerIo;
  /** Close everything and exit on SIGINT/SIGTERM. Only the CLI turns this on. */
  handleSignals?: boolean;
}

/**
 * Runs the host until stdin closes: the stdio loop and the HTTP trigger
 * endpoint share one sender. Returns the process exit code.
 */
export async function runListener(config: ListenerConfig, options: RunListenerOptions = {}): Promise<ExitCode> {
  const io = options.io ?? { stdin: process.stdin, stdout: process.stdout };
  const logs = openLogContext({ file: config.logFile, level: config.logLevel, format: config.logFormat });
  const { logger } = logs;

  logger.info({ byteOrder: config.byteOrder, version: VERSION, pid: process.pid }, "Native messaging host started");

  const onOutputError = (err: Error) => logger.error({ err }, "Output stream error");
  io.stdout.on("error", onOutputError);

  const sender = new FrameSender(io.stdout, logger.child({ component: "sender" }), config.byteOrder);

  let server: TriggerServerHandle;
  try {
    server = await startTriggerServer(config.listen, { sender, logger: logger.child({ component: "http" }) });
  } catch (err) {
    logger.fatal({ err }, "Unable to start trigger endpoint");
    io.stdout.off("error", onOutputError);
    logs.close();
    return EXIT.SERVER_FAILURE;
  }
  logger.info(`Trigger endpoint listening on http://${server.host}:${server.port}`);

  const closeServer = async () => {
    try {
      await server.close();
    } catch (err) {
      logger.error({ err }, "Error closing trigger endpoint");
    }
  };

  const shutdownOnSignal = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Received signal, shutting down");
    await closeServer();
    logs.close();
    exit(EXIT.SUCCESS);
  };
  const onSignal = (signal: NodeJS.Signals) => void shutdownOnSignal(signal);
  if (options.handleSignals) {
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  const loop = new StdioLoop({
    input: io.stdin,
    sender,
    logger: logger.child({ component: "stdio" }),
    maxFrameSize: config.maxFrameSize,
    oversize: config.oversize,
    byteOrder: config.byteOrder,
  });

  let code: ExitCode = EXIT.SUCCESS;
  try {
    await loop.run();
  } catch (err) {
    logger.fatal({ err }, "Fatal error reading stdin");
    code = EXIT.IO_FAILURE;
  }

  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);
  await closeServer();
  io.stdout.off("error", onOutputError);
  logger.info({ framesSent: sender.sentCount }, "Native messaging host exited");
  logs.close();
  return code;
}
