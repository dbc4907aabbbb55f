/**
 * Unit tests for profile validation and profile building.
 */

import { ValidationError } from "../../../src/errors";
import type { ProfileDraft } from "../../../src/profiles/types";
import { assertValidProfile, buildProfile, validateProfile } from "../../../src/profiles/validation";

const identity = { profileId: "p-1", createdAt: "2026-01-01T00:00:00.000Z", updatedAt: "2026-01-01T00:00:00.000Z" };

function draft(fields: Partial<ProfileDraft> = {}): ProfileDraft {
  return {
    name: "Test Voice",
    gender: "neutral",
    pitch: 0,
    speed: 1.0,
    volume: 1.0,
    timbre: {},
    language: "en-US",
    accent: "neutral",
    ageRange: "adult",
    emotionDefault: "neutral",
    customParams: {},
    ...fields,
  };
}

describe("validateProfile", () => {
  it("accepts a complete default draft", () => {
    expect(validateProfile(draft())).toEqual({ valid: true, errors: [], issues: [] });
  });

  it("accepts range boundaries", () => {
    expect(validateProfile(draft({ pitch: -12, speed: 0.5, volume: 0 })).valid).toBe(true);
    expect(validateProfile(draft({ pitch: 12, speed: 2.0, volume: 2.0 })).valid).toBe(true);
  });

  it("reports pitch, speed and volume with the received value", () => {
    const result = validateProfile(draft({ pitch: 15, speed: 3, volume: -0.5 }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "Pitch must be between -12 and +12 semitones (got 15)",
      "Speed must be between 0.5 and 2.0 (got 3)",
      "Volume must be between 0.0 and 2.0 (got -0.5)",
    ]);
  });

  it("collects every violation in fixed order", () => {
    const result = validateProfile(
      draft({ name: "   ", gender: "robot", ageRange: "teen", speed: 0.1, pitch: -13, timbre: { warmth: 1.5 } })
    );
    expect(result.issues.map((i) => i.field)).toEqual(["pitch", "speed", "gender", "ageRange", "name", "timbre.warmth"]);
    expect(result.errors[2]).toBe("Invalid gender: robot (expected one of male, female, neutral, custom)");
    expect(result.errors[3]).toBe("Invalid age range: teen (expected one of child, young, adult, elderly)");
    expect(result.errors[4]).toBe("Name must not be empty");
    expect(result.errors[5]).toBe('Timbre "warmth" must be between 0 and 1 (got 1.5)');
  });

  it("rejects NaN rather than passing it through", () => {
    const result = validateProfile(draft({ pitch: NaN }));
    expect(result.errors).toEqual(["Pitch must be between -12 and +12 semitones (got NaN)"]);
  });

  it("checks the default emotion only when known emotions are given", () => {
    expect(validateProfile(draft({ emotionDefault: "bored" })).valid).toBe(true);
    const result = validateProfile(draft({ emotionDefault: "bored" }), { knownEmotions: ["neutral", "happy"] });
    expect(result.errors).toEqual(["Unknown default emotion: bored"]);
  });
});

describe("assertValidProfile", () => {
  it("throws ValidationError carrying every message", () => {
    expect.assertions(3);
    try {
      assertValidProfile(draft({ pitch: 15, name: "" }));
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.errors).toEqual(["Pitch must be between -12 and +12 semitones (got 15)", "Name must not be empty"]);
        expect(err.message).toBe(
          "Invalid voice profile: Pitch must be between -12 and +12 semitones (got 15); Name must not be empty"
        );
      }
    }
  });
});

describe("buildProfile", () => {
  it("returns a frozen profile with identity fields", () => {
    const profile = buildProfile(identity, draft({ timbre: { warmth: 0.7 } }));
    expect(profile.profileId).toBe("p-1");
    expect(profile.createdAt).toBe(identity.createdAt);
    expect(profile.timbre).toEqual({ warmth: 0.7 });
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.timbre)).toBe(true);
  });

  it("does not share nested maps with the draft", () => {
    const source = draft({ customParams: { tremolo: 0.3 } });
    const profile = buildProfile(identity, source);
    source.customParams.tremolo = 0.9;
    expect(profile.customParams).toEqual({ tremolo: 0.3 });
  });

  it("throws ValidationError for an invalid draft", () => {
    expect(() => buildProfile(identity, draft({ speed: 0 }))).toThrow(ValidationError);
  });
});
