/**
 * Native messaging framing: a 4-byte unsigned length in the process's native
 * byte order, followed by that many bytes of UTF-8 JSON. Same format in both
 * directions; the browser runs on the same machine, so no negotiation.
 */

import { Buffer } from "node:buffer";
import { endianness } from "node:os";
import type { Writable } from "node:stream";
import type { Logger } from "pino";
import { FrameIoError, FramingError } from "../../shared/errors.js";

export type ByteOrder = "LE" | "BE";

/** What to do with a frame whose declared length exceeds the size limit. */
export type OversizePolicy = "drain" | "truncate";

export const HEADER_SIZE = 4;
export const MAX_DECLARED_LENGTH = 0xffff_ffff;

/** Probed once at load; used for every header unless a caller overrides it. */
export const NATIVE_BYTE_ORDER: ByteOrder = endianness();

export function decodeLength(header: Uint8Array, order: ByteOrder = NATIVE_BYTE_ORDER): number {
  if (header.length !== HEADER_SIZE) {
    throw new FramingError(`Length header must be ${HEADER_SIZE} bytes, got ${header.length}`);
  }
  const view = Buffer.from(header.buffer, header.byteOffset, header.byteLength);
  return order === "LE" ? view.readUInt32LE(0) : view.readUInt32BE(0);
}

export function encodeLength(length: number, order: ByteOrder = NATIVE_BYTE_ORDER): Buffer {
  if (!Number.isInteger(length) || length < 0 || length > MAX_DECLARED_LENGTH) {
    throw new FramingError(`Frame length ${length} does not fit a 32-bit unsigned header`);
  }
  const header = Buffer.alloc(HEADER_SIZE);
  if (order === "LE") header.writeUInt32LE(length, 0);
  else header.writeUInt32BE(length, 0);
  return header;
}

/** Header and payload as one buffer, so a frame goes out in a single write. */
export function encodeFrame(payload: Uint8Array, order: ByteOrder = NATIVE_BYTE_ORDER): Buffer {
  return Buffer.concat([encodeLength(payload.length, order), payload]);
}

export async function writeFrame(
  output: Writable,
  payload: Uint8Array,
  order: ByteOrder = NATIVE_BYTE_ORDER,
): Promise<void> {
  const frame = encodeFrame(payload, order);
  await new Promise<void>((resolve, reject) => {
    output.write(frame, (err) => {
      if (err) reject(new FrameIoError(`Failed to write ${frame.length}-byte frame`, { cause: err }));
      else resolve();
    });
  });
}

function toBuffer(chunk: Uint8Array | string): Buffer {
  return typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

/**
 * Pull reader over a chunked byte stream (stdin, a PassThrough, an async
 * generator). Only holds what the current read needs.
 */
export class ByteSource {
  private pending: Buffer = Buffer.alloc(0);
  private readonly chunks: AsyncIterator<Uint8Array | string>;
  private exhausted = false;

  constructor(input: AsyncIterable<Uint8Array | string>) {
    this.chunks = input[Symbol.asyncIterator]();
  }

  /** Reads `size` bytes; returns fewer only when the stream has ended. */
  async read(size: number): Promise<Buffer> {
    while (this.pending.length < size) {
      if (!(await this.fill())) break;
    }
    const out = this.pending.subarray(0, size);
    this.pending = this.pending.subarray(out.length);
    return out;
  }

  /** Consumes up to `size` bytes without keeping them. Returns how many were dropped. */
  async skip(size: number): Promise<number> {
    let remaining = size;
    while (remaining > 0) {
      if (this.pending.length === 0 && !(await this.fill())) break;
      const n = Math.min(remaining, this.pending.length);
      this.pending = this.pending.subarray(n);
      remaining -= n;
    }
    return size - remaining;
  }

  private async fill(): Promise<boolean> {
    if (this.exhausted) return false;
    let next: IteratorResult<Uint8Array | string>;
    try {
      next = await this.chunks.next();
    } catch (err) {
      this.exhausted = true;
      throw new FrameIoError("Failed to read from input stream", { cause: err });
    }
    if (next.done) {
      this.exhausted = true;
      return false;
    }
    const chunk = toBuffer(next.value);
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    return true;
  }
}

export type FrameReadResult =
  | { kind: "frame"; payload: Buffer; declaredLength: number }
  | { kind: "skipped"; declaredLength: number; discarded: number }
  | { kind: "eof" };

export interface ReadFrameOptions {
  maxSize: number;
  oversize?: OversizePolicy;
  order?: ByteOrder;
  logger?: Logger;
  /** Called once the header is decoded, before the payload is read. */
  onHeader?: (declaredLength: number) => void;
}

/**
 * Reads one frame. End of stream before a full header is `eof`, not an error;
 * transport failures reject with FrameIoError.
 *
 * Oversize frames: "drain" discards the declared length and reports `skipped`,
 * keeping the stream aligned. "truncate" reads `maxSize` bytes and leaves the
 * remainder in the stream, so the next header is read from inside this payload.
 */
export async function readFrame(source: ByteSource, options: ReadFrameOptions): Promise<FrameReadResult> {
  const { maxSize, oversize = "drain", order = NATIVE_BYTE_ORDER, logger } = options;

  const header = await source.read(HEADER_SIZE);
  if (header.length < HEADER_SIZE) {
    if (header.length > 0) logger?.debug({ bytes: header.length }, "Partial length header at end of stream");
    return { kind: "eof" };
  }

  const declaredLength = decodeLength(header, order);
  logger?.debug({ declaredLength }, "Message size in bytes");
  options.onHeader?.(declaredLength);

  let readLength = declaredLength;
  if (declaredLength > maxSize) {
    if (oversize === "drain") {
      logger?.warn(
        { declaredLength, maxSize },
        `Message size of ${declaredLength} exceeds limit of ${maxSize}; discarding message`,
      );
      const discarded = await source.skip(declaredLength);
      return { kind: "skipped", declaredLength, discarded };
    }
    logger?.warn(
      { declaredLength, maxSize },
      `Message size of ${declaredLength} exceeds limit of ${maxSize}; message will be truncated and is unlikely to parse`,
    );
    readLength = maxSize;
  }

  const payload = await source.read(readLength);
  if (payload.length < readLength) {
    logger?.warn({ declaredLength, received: payload.length }, "Input ended before the full message was read");
  }
  return { kind: "frame", payload, declaredLength };
}
