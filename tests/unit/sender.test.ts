import { Writable } from "node:stream";
import { describe, it, expect, vi } from "vitest";
import { FrameSender } from "../../src/host/sender.js";
import { captureLogger, collectOutput, splitFrames } from "./helpers.js";

describe("FrameSender", () => {
  it("writes the response as one length-prefixed frame", async () => {
    const out = collectOutput();
    const { logger } = captureLogger();
    const sender = new FrameSender(out.stream, logger, "LE");

    await expect(sender.send({ query: "ping", response: "pong" })).resolves.toBe(true);

    const bytes = out.bytes();
    expect([...bytes.subarray(0, 4)]).toEqual([6, 0, 0, 0]);
    expect(splitFrames(bytes, "LE")).toEqual(['"pong"']);
    expect(sender.sentCount).toBe(1);
  });

  it("holds each write until the previous frame is flushed", async () => {
    const flushedAfterCalls: number[] = [];
    const stream = new Writable({
      write(_chunk: Buffer, _enc, cb) {
        setTimeout(() => {
          flushedAfterCalls.push(writeSpy.mock.calls.length);
          cb();
        }, 5);
      },
    });
    const writeSpy = vi.spyOn(stream, "write");
    const sender = new FrameSender(stream, captureLogger().logger);

    const results = await Promise.all([
      sender.send({ query: "a", response: "first" }),
      sender.send({ query: "b", response: "second" }),
      sender.send({ query: "c", response: "third" }),
    ]);

    expect(results).toEqual([true, true, true]);
    expect(flushedAfterCalls).toEqual([1, 2, 3]);
  });

  it("keeps frame order between concurrent senders", async () => {
    const out = collectOutput();
    const sender = new FrameSender(out.stream, captureLogger().logger, "BE");
    await Promise.all(["one", "two", "three"].map((r) => sender.send({ query: r, response: r })));
    expect(splitFrames(out.bytes(), "BE")).toEqual(['"one"', '"two"', '"three"']);
  });

  it("logs and drops a frame the stream rejects, without blocking later sends", async () => {
    const stream = new Writable({
      write(_chunk: Buffer, _enc, cb) {
        cb(new Error("EPIPE"));
      },
    });
    const streamErrors: Error[] = [];
    stream.on("error", (err) => streamErrors.push(err));
    const { logger, records } = captureLogger();
    const sender = new FrameSender(stream, logger);

    await expect(sender.send({ query: "ping", response: "pong" })).resolves.toBe(false);
    await expect(sender.send({ query: "hello", response: "goodbye" })).resolves.toBe(false);

    const errors = records().filter((r) => r.level === 50);
    expect(errors.map((r) => r.msg)).toEqual(["Unable to send message", "Unable to send message"]);
    expect(errors[0].query).toBe("ping");
    expect(sender.sentCount).toBe(0);
    expect(streamErrors[0]?.message).toBe("EPIPE");
  });
});
