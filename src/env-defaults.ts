/** Environment variables read when the matching CLI flag is absent. */
export const XCLOUD_ENV = {
  LISTEN: "XCLOUD_LISTEN",
  LOG_FILE: "XCLOUD_LOG_FILE",
  LOG_LEVEL: "XCLOUD_LOG_LEVEL",
  LOG_FORMAT: "XCLOUD_LOG_FORMAT",
  MAX_FRAME_SIZE: "XCLOUD_MAX_FRAME_SIZE",
  OVERSIZE: "XCLOUD_OVERSIZE",
  BYTE_ORDER: "XCLOUD_BYTE_ORDER",
} as const;

export type XcloudEnvKey = keyof typeof XCLOUD_ENV;

export function getEnv(key: XcloudEnvKey, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[XCLOUD_ENV[key]];
  return value === "" ? undefined : value;
}
