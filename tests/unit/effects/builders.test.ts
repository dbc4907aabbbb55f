/**
 * Unit tests for effect builders and descriptor inspection.
 */

import {
  createChorus,
  createCompressor,
  createDistortion,
  createEcho,
  createEqualizer,
  createNoiseGate,
  createPitchShift,
  createReverb,
  createTimeStretch,
  inspectEffect,
  isEffectConfig,
} from "../../../src/effects";
import { ParameterRangeError } from "../../../src/errors";

function violationsOf(build: () => unknown): string[] {
  try {
    build();
  } catch (err) {
    if (err instanceof ParameterRangeError) return err.violations.map((v) => v.field);
    throw err;
  }
  return [];
}

describe("effect builders", () => {
  it("apply documented defaults", () => {
    expect(createReverb()).toEqual({ type: "reverb", roomSize: 0.5, damping: 0.5 });
    expect(createEcho()).toEqual({ type: "echo", delayMs: 500, feedback: 0.3 });
    expect(createEqualizer()).toEqual({ type: "equalizer", bass: 0, mid: 0, treble: 0 });
    expect(createChorus()).toEqual({ type: "chorus", depth: 0.5, rate: 1.5 });
    expect(createCompressor()).toEqual({ type: "compressor", ratio: 4, thresholdDb: -20 });
    expect(createDistortion()).toEqual({ type: "distortion", amount: 0.5 });
    expect(createNoiseGate()).toEqual({ type: "noise_gate", thresholdDb: -40 });
    expect(createPitchShift()).toEqual({ type: "pitch_shift", semitones: 0 });
    expect(createTimeStretch()).toEqual({ type: "time_stretch", factor: 1.0 });
  });

  it("return frozen descriptors", () => {
    expect(Object.isFrozen(createReverb({ roomSize: 0.8 }))).toBe(true);
  });

  it("collect every out-of-range parameter", () => {
    expect.assertions(2);
    try {
      createReverb({ roomSize: 1.5, damping: -0.1 });
    } catch (err) {
      expect(err).toBeInstanceOf(ParameterRangeError);
      if (err instanceof ParameterRangeError) {
        expect(err.violations).toEqual([
          { field: "reverb.roomSize", allowed: "within [0, 1]", value: 1.5 },
          { field: "reverb.damping", allowed: "within [0, 1]", value: -0.1 },
        ]);
      }
    }
  });

  it("enforce per-kind ranges", () => {
    expect(violationsOf(() => createEcho({ delayMs: 0, feedback: 1 }))).toEqual(["echo.delayMs", "echo.feedback"]);
    expect(violationsOf(() => createEqualizer({ treble: 13 }))).toEqual(["equalizer.treble"]);
    expect(violationsOf(() => createChorus({ rate: 0 }))).toEqual(["chorus.rate"]);
    expect(violationsOf(() => createCompressor({ ratio: 0.5, thresholdDb: 3 }))).toEqual([
      "compressor.ratio",
      "compressor.thresholdDb",
    ]);
    expect(violationsOf(() => createDistortion({ amount: 2 }))).toEqual(["distortion.amount"]);
    expect(violationsOf(() => createNoiseGate({ thresholdDb: 1 }))).toEqual(["noise_gate.thresholdDb"]);
    expect(violationsOf(() => createPitchShift({ semitones: Infinity }))).toEqual(["pitch_shift.semitones"]);
    expect(violationsOf(() => createTimeStretch({ factor: -1 }))).toEqual(["time_stretch.factor"]);
  });

  it("accept boundary values", () => {
    expect(violationsOf(() => createEcho({ feedback: 0 }))).toEqual([]);
    expect(violationsOf(() => createEqualizer({ bass: -12, treble: 12 }))).toEqual([]);
    expect(violationsOf(() => createCompressor({ ratio: 1, thresholdDb: 0 }))).toEqual([]);
    expect(violationsOf(() => createPitchShift({ semitones: -24 }))).toEqual([]);
  });

  it("describe the violation in the message", () => {
    expect(() => createDistortion({ amount: 2 })).toThrow("distortion.amount must be within [0, 1] (got 2)");
  });
});

describe("inspectEffect", () => {
  it("reports an unknown type", () => {
    const result = inspectEffect({ type: "flanger", depth: 0.2 });
    expect(result.kind).toBe("flanger");
    expect(result.violations.map((v) => v.field)).toEqual(["type"]);
  });

  it("reports a missing type as unknown", () => {
    expect(inspectEffect({ roomSize: 0.5 }).kind).toBe("unknown");
    expect(inspectEffect(null).kind).toBe("unknown");
  });

  it("reports missing and non-numeric parameters", () => {
    const result = inspectEffect({ type: "echo", delayMs: "500" });
    expect(result.violations).toEqual([
      { field: "echo.delayMs", allowed: "> 0", value: "500" },
      { field: "echo.feedback", allowed: "within [0, 1)", value: undefined },
    ]);
  });

  it("narrows decoded values", () => {
    expect(isEffectConfig({ type: "distortion", amount: 0.2 })).toBe(true);
    expect(isEffectConfig({ type: "distortion", amount: 1.2 })).toBe(false);
  });
});
