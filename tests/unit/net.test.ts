import { describe, it, expect } from "vitest";
import { parseListen } from "../../src/shared/net.js";
import { DEFAULT_LISTEN } from "../../src/shared/constants.js";

describe("parseListen", () => {
  it("returns default host and port for empty string", () => {
    expect(parseListen("")).toEqual({ host: "0.0.0.0", port: 9000 });
  });

  it("parses port-only (number)", () => {
    expect(parseListen("7337")).toEqual({ host: "0.0.0.0", port: 7337 });
  });

  it("parses host:port", () => {
    expect(parseListen("127.0.0.1:9000")).toEqual({ host: "127.0.0.1", port: 9000 });
    expect(parseListen("localhost:3000")).toEqual({ host: "localhost", port: 3000 });
  });

  it("parses the default all-interfaces listen address", () => {
    expect(parseListen(DEFAULT_LISTEN)).toEqual({ host: "0.0.0.0", port: 9000 });
    expect(parseListen(" 0.0.0.0:9001 ")).toEqual({ host: "0.0.0.0", port: 9001 });
  });

  it("keeps port 0 for an ephemeral port", () => {
    expect(parseListen("127.0.0.1:0")).toEqual({ host: "127.0.0.1", port: 0 });
  });

  it("uses default port when port is invalid", () => {
    expect(parseListen("99999")).toEqual({ host: "0.0.0.0", port: 9000 });
    expect(parseListen("127.0.0.1:bad")).toEqual({ host: "127.0.0.1", port: 9000 });
    expect(parseListen("127.0.0.1:-5")).toEqual({ host: "127.0.0.1", port: 9000 });
  });

  it("uses default host when host is empty after colon", () => {
    expect(parseListen(":8080")).toEqual({ host: "0.0.0.0", port: 8080 });
  });
});
