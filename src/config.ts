import { z } from "zod";
import { getEnv } from "./env-defaults.js";
import {
  DEFAULT_LISTEN,
  DEFAULT_LOG_FILE,
  DEFAULT_MAX_FRAME_SIZE,
} from "./shared/constants.js";
import { ConfigError } from "./shared/errors.js";
import { LOG_FORMATS, LOG_LEVELS } from "./shared/logging.js";
import { MAX_DECLARED_LENGTH, NATIVE_BYTE_ORDER } from "./protocols/native/framing.js";

/** Raw option values as commander hands them over. */
export interface ListenerFlags {
  listen?: string;
  logFile?: string;
  logLevel?: string;
  logFormat?: string;
  maxFrameSize?: string;
  oversize?: string;
  byteOrder?: string;
}

const ListenerConfigSchema = z.object({
  listen: z.string().min(1),
  logFile: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  logFormat: z.enum(LOG_FORMATS),
  maxFrameSize: z.coerce.number().int().positive().max(MAX_DECLARED_LENGTH),
  oversize: z.enum(["drain", "truncate"]),
  byteOrder: z
    .enum(["native", "LE", "BE"])
    .transform((order) => (order === "native" ? NATIVE_BYTE_ORDER : order)),
});

export type ListenerConfig = z.infer<typeof ListenerConfigSchema>;

/** Flags win over environment variables, which win over the built-in defaults. */
export function resolveConfig(flags: ListenerFlags = {}, env: NodeJS.ProcessEnv = process.env): ListenerConfig {
  const result = ListenerConfigSchema.safeParse({
    listen: flags.listen ?? getEnv("LISTEN", env) ?? DEFAULT_LISTEN,
    logFile: flags.logFile ?? getEnv("LOG_FILE", env) ?? DEFAULT_LOG_FILE,
    logLevel: flags.logLevel ?? getEnv("LOG_LEVEL", env) ?? "info",
    logFormat: flags.logFormat ?? getEnv("LOG_FORMAT", env) ?? "json",
    maxFrameSize: flags.maxFrameSize ?? getEnv("MAX_FRAME_SIZE", env) ?? DEFAULT_MAX_FRAME_SIZE,
    oversize: flags.oversize ?? getEnv("OVERSIZE", env) ?? "drain",
    byteOrder: flags.byteOrder ?? getEnv("BYTE_ORDER", env) ?? "native",
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return result.data;
}
