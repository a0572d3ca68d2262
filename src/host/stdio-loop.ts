import type { Logger } from "pino";
import { DEFAULT_MAX_FRAME_SIZE } from "../shared/constants.js";
import { DecodeError } from "../shared/errors.js";
import {
  ByteSource,
  NATIVE_BYTE_ORDER,
  readFrame,
  type ByteOrder,
  type OversizePolicy,
} from "../protocols/native/framing.js";
import { decodeIncoming, type OutgoingMessage } from "../protocols/native/messages.js";
import { respondTo } from "./responder.js";
import type { FrameSender } from "./sender.js";

export type StdioLoopState = "idle" | "waiting-for-header" | "reading-payload" | "dispatching" | "closed";

export interface StdioLoopOptions {
  input: AsyncIterable<Uint8Array | string>;
  sender: FrameSender;
  logger: Logger;
  maxFrameSize?: number;
  oversize?: OversizePolicy;
  byteOrder?: ByteOrder;
  respond?: (query: string) => string;
}

/**
 * Reads frames from the extension until stdin closes, answering each one.
 * `run()` resolves on end of input and rejects with FrameIoError when the
 * transport fails; decode failures are answered with the default response.
 */
export class StdioLoop {
  private current: StdioLoopState = "idle";
  private readonly source: ByteSource;
  private readonly sender: FrameSender;
  private readonly logger: Logger;
  private readonly maxFrameSize: number;
  private readonly oversize: OversizePolicy;
  private readonly byteOrder: ByteOrder;
  private readonly respond: (query: string) => string;

  constructor(options: StdioLoopOptions) {
    this.source = new ByteSource(options.input);
    this.sender = options.sender;
    this.logger = options.logger;
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
    this.oversize = options.oversize ?? "drain";
    this.byteOrder = options.byteOrder ?? NATIVE_BYTE_ORDER;
    this.respond = options.respond ?? respondTo;
  }

  get state(): StdioLoopState {
    return this.current;
  }

  async run(): Promise<void> {
    if (this.current !== "idle") throw new Error(`StdioLoop already ${this.current}`);
    this.logger.info(
      { maxFrameSize: this.maxFrameSize, oversize: this.oversize, byteOrder: this.byteOrder },
      "Frame reader created",
    );
    try {
      for (;;) {
        this.current = "waiting-for-header";
        const result = await readFrame(this.source, {
          maxSize: this.maxFrameSize,
          oversize: this.oversize,
          order: this.byteOrder,
          logger: this.logger,
          onHeader: () => {
            this.current = "reading-payload";
          },
        });
        if (result.kind === "eof") break;
        if (result.kind === "skipped") continue;

        this.current = "dispatching";
        await this.dispatch(result.payload);
      }
    } finally {
      this.current = "closed";
    }
    this.logger.info("Stdin closed");
  }

  private async dispatch(payload: Buffer): Promise<void> {
    this.logger.debug({ payload: payload.toString("utf8") }, "Message received");
    const decoded = decodeIncoming(payload);
    let query = "";
    if (decoded instanceof DecodeError) {
      this.logger.error({ err: decoded }, "Unable to decode incoming message");
    } else {
      query = decoded.query;
    }
    const message: OutgoingMessage = { query, response: this.respond(query) };
    await this.sender.send(message);
  }
}
