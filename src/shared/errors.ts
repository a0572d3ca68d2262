/** Invalid length header or a length that does not fit the 4-byte prefix. */
export class FramingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FramingError";
  }
}

/** Reading from or writing to the stdio transport failed. Fatal on the read side. */
export class FrameIoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FrameIoError";
  }
}

/** Payload is not JSON, or not an `{ query }` envelope. Never fatal. */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
