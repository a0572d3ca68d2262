export const APP_NAME = "xcloud-listener";
export const VERSION = "0.1.0";

/** Default listen address for the HTTP trigger endpoint (all interfaces). */
export const DEFAULT_LISTEN_HOST = "0.0.0.0";
export const DEFAULT_LISTEN_PORT = 9000;
export const DEFAULT_LISTEN = `${DEFAULT_LISTEN_HOST}:${DEFAULT_LISTEN_PORT}`;

/** Largest payload accepted per stdio frame. Adjust to fit extension payloads. */
export const DEFAULT_MAX_FRAME_SIZE = 8192;

export const DEFAULT_LOG_FILE = `${APP_NAME}.log`;

export const HOME_RESPONSE_BODY = "Home Endpoint hit";
