import { Writable } from "node:stream";
import { pino, type LevelWithSilent, type Logger } from "pino";
import { decodeLength, encodeFrame, HEADER_SIZE, type ByteOrder } from "../../src/protocols/native/framing.js";

/** Writable that keeps everything written to it. */
export function collectOutput(): { stream: Writable; bytes: () => Buffer } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _enc, cb) {
      chunks.push(chunk);
      cb();
    },
  });
  return { stream, bytes: () => Buffer.concat(chunks) };
}

/** Splits a byte stream into frame payloads (as UTF-8 strings). */
export function splitFrames(bytes: Buffer, order?: ByteOrder): string[] {
  const payloads: string[] = [];
  let offset = 0;
  while (offset + HEADER_SIZE <= bytes.length) {
    const length = decodeLength(bytes.subarray(offset, offset + HEADER_SIZE), order);
    const start = offset + HEADER_SIZE;
    payloads.push(bytes.subarray(start, start + length).toString("utf8"));
    offset = start + length;
  }
  return payloads;
}

export function frameOf(json: string, order?: ByteOrder): Buffer {
  return encodeFrame(Buffer.from(json, "utf8"), order);
}

/** Logger capturing JSON records in memory. */
export function captureLogger(level: LevelWithSilent = "trace"): {
  logger: Logger;
  records: () => Array<Record<string, unknown>>;
} {
  const lines: string[] = [];
  const logger = pino(
    { level },
    {
      write(msg: string) {
        lines.push(msg);
      },
    },
  );
  return {
    logger,
    records: () => lines.map((line) => JSON.parse(line) as Record<string, unknown>),
  };
}

export async function* chunksOf(...chunks: Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) yield chunk;
}
