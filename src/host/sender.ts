import type { Writable } from "node:stream";
import type { Logger } from "pino";
import { NATIVE_BYTE_ORDER, writeFrame, type ByteOrder } from "../protocols/native/framing.js";
import { encodeOutgoing, type OutgoingMessage } from "../protocols/native/messages.js";

/**
 * Single writer for stdout. The stdio loop and the HTTP endpoint both send
 * through one instance; each frame is written only after the previous one
 * has been flushed, so frames never interleave.
 */
export class FrameSender {
  private tail: Promise<unknown> = Promise.resolve();
  private sent = 0;

  constructor(
    private readonly output: Writable,
    private readonly logger: Logger,
    private readonly order: ByteOrder = NATIVE_BYTE_ORDER,
  ) {}

  /** Frames written so far. */
  get sentCount(): number {
    return this.sent;
  }

  /** Resolves true once the frame is flushed, false if it was dropped. Never rejects. */
  send(message: OutgoingMessage): Promise<boolean> {
    const result = this.tail.then(() => this.write(message));
    this.tail = result;
    return result;
  }

  private async write(message: OutgoingMessage): Promise<boolean> {
    try {
      const payload = encodeOutgoing(message);
      await writeFrame(this.output, payload, this.order);
      this.sent += 1;
      this.logger.debug({ query: message.query, response: message.response, bytes: payload.length }, "Message sent");
      return true;
    } catch (err) {
      this.logger.error({ err, query: message.query }, "Unable to send message");
      return false;
    }
  }
}
