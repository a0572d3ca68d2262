import { DEFAULT_LISTEN_HOST, DEFAULT_LISTEN_PORT } from "./constants.js";

function parsePort(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const port = parseInt(value, 10);
  if (port > 65535) return null;
  return port;
}

/**
 * Parse --listen value (e.g. "0.0.0.0:9000" or "9000") into host and port.
 * Port 0 asks the OS for an ephemeral port.
 */
export function parseListen(listen: string): { host: string; port: number } {
  if (!listen || listen.trim() === "") return { host: DEFAULT_LISTEN_HOST, port: DEFAULT_LISTEN_PORT };
  const colon = listen.lastIndexOf(":");
  if (colon === -1) {
    return { host: DEFAULT_LISTEN_HOST, port: parsePort(listen) ?? DEFAULT_LISTEN_PORT };
  }
  const host = listen.slice(0, colon).trim() || DEFAULT_LISTEN_HOST;
  return { host, port: parsePort(listen.slice(colon + 1)) ?? DEFAULT_LISTEN_PORT };
}
