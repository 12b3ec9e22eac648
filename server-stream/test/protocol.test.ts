import { describe, expect, it } from "@jest/globals";
import { ProtocolError } from "../src/stt/errors.js";
import { parseClientCommand } from "../src/stt/protocol.js";

describe("parseClientCommand", () => {
  it("parses start with its options", () => {
    expect(parseClientCommand('{"command":"start","language":"en","format":"wav","sample_rate":16000}')).toEqual({
      command: "start",
      language: "en",
      format: "wav",
      sample_rate: 16000
    });
  });

  it("parses stop and ping", () => {
    expect(parseClientCommand('{"command":"stop"}')).toEqual({ command: "stop" });
    expect(parseClientCommand('{"command":"ping"}')).toEqual({ command: "ping" });
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseClientCommand("start please")).toThrow(
      new ProtocolError("Malformed control message (expected JSON).")
    );
  });

  it("names unknown commands", () => {
    expect(() => parseClientCommand('{"command":"pause"}')).toThrow("Unknown command 'pause'.");
  });

  it("points at the invalid field", () => {
    expect(() => parseClientCommand('{"command":"start","format":"mp3"}')).toThrow(
      /^Invalid control message \(format\): /
    );
    expect(() => parseClientCommand("{}")).toThrow(/^Invalid control message \(command\): /);
  });

  it("raises protocol errors", () => {
    try {
      parseClientCommand("[]");
      throw new Error("expected a ProtocolError");
    } catch (err) {
      expect(err).toBeInstanceOf(ProtocolError);
      expect(err).toHaveProperty("code", "protocol");
    }
  });
});
