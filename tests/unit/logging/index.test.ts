/**
 * Unit tests for logging helpers. Records are captured from an in-process destination.
 */

import pino from "pino";
import { createLogger, logBackendCall, logError, logProfileEvent, logRender } from "../../../src/logging";

function capture(level: pino.LevelWithSilent = "info"): { log: pino.Logger; records: () => unknown[] } {
  const lines: string[] = [];
  const log = pino({ level, base: undefined, timestamp: false }, { write: (line: string) => void lines.push(line) });
  return { log, records: () => lines.map((l) => JSON.parse(l)) };
}

describe("createLogger", () => {
  it("honors an explicit level", () => {
    expect(createLogger({ level: "silent", pretty: false }).level).toBe("silent");
    expect(createLogger({ level: "debug", pretty: false }).level).toBe("debug");
  });
});

describe("event helpers", () => {
  it("logs profile lifecycle events without optional fields", () => {
    const { log, records } = capture();
    logProfileEvent(log, "created", "id-1", "Narrator");
    logProfileEvent(log, "deleted", "id-1");
    expect(records()).toEqual([
      { level: 30, event: "PROFILE", phase: "created", profileId: "id-1", name: "Narrator", msg: "Profile created" },
      { level: 30, event: "PROFILE", phase: "deleted", profileId: "id-1", msg: "Profile deleted" },
    ]);
  });

  it("logs render stages at debug level", () => {
    const info = capture("info");
    logRender(info.log, "prosody", 128, 0.5);
    expect(info.records()).toEqual([]);

    const debug = capture("debug");
    logRender(debug.log, "prosody", 128, 0.5);
    expect(debug.records()).toEqual([
      { level: 20, event: "RENDER_STAGE", stage: "prosody", outputBytes: 128, durationMs: 0.5, msg: "Render stage completed" },
    ]);
  });

  it("logs backend calls", () => {
    const { log, records } = capture();
    logBackendCall(log, "tts", "stub", 48044, 3.25);
    expect(records()).toEqual([
      { level: 30, event: "BACKEND_CALL", backend: "tts", engine: "stub", payloadBytes: 48044, durationMs: 3.25, msg: "TTS completed" },
    ]);
  });

  it("logs errors with context", () => {
    const { log, records } = capture();
    const err = new Error("boom");
    logError(log, err, { operation: "synthesize" });
    expect(records()).toEqual([
      { level: 50, err: "boom", name: "Error", stack: err.stack, operation: "synthesize", msg: "Error" },
    ]);
  });
});
