/**
 * Profile validation. Every check runs; violations are reported in a fixed order:
 * pitch, speed, volume, gender, age range, name, timbre, default emotion.
 */

import type { ValidationIssue } from "../errors";
import { ValidationError } from "../errors";
import type { ProfileDraft, VoiceProfile } from "./types";
import {
  AGE_RANGES,
  GENDERS,
  PITCH_RANGE,
  SPEED_RANGE,
  TIMBRE_RANGE,
  VOLUME_RANGE,
  isAgeRange,
  isGender,
} from "./types";

export interface ProfileValidationResult {
  valid: boolean;
  errors: string[];
  issues: ValidationIssue[];
}

export interface ValidateOptions {
  /** When given, `emotionDefault` must be one of these. */
  knownEmotions?: readonly string[];
}

function inRange(value: number, range: { min: number; max: number }): boolean {
  // NaN fails both comparisons.
  return value >= range.min && value <= range.max;
}

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

export function validateProfile(draft: ProfileDraft, options: ValidateOptions = {}): ProfileValidationResult {
  const issues: ValidationIssue[] = [];
  const fail = (field: string, message: string) => issues.push({ field, message });

  if (!inRange(draft.pitch, PITCH_RANGE)) {
    fail(
      "pitch",
      `Pitch must be between ${PITCH_RANGE.min} and ${signed(PITCH_RANGE.max)} semitones (got ${draft.pitch})`
    );
  }
  if (!inRange(draft.speed, SPEED_RANGE)) {
    fail("speed", `Speed must be between ${SPEED_RANGE.min} and ${SPEED_RANGE.max.toFixed(1)} (got ${draft.speed})`);
  }
  if (!inRange(draft.volume, VOLUME_RANGE)) {
    fail(
      "volume",
      `Volume must be between ${VOLUME_RANGE.min.toFixed(1)} and ${VOLUME_RANGE.max.toFixed(1)} (got ${draft.volume})`
    );
  }
  if (!isGender(draft.gender)) {
    fail("gender", `Invalid gender: ${draft.gender} (expected one of ${GENDERS.join(", ")})`);
  }
  if (!isAgeRange(draft.ageRange)) {
    fail("ageRange", `Invalid age range: ${draft.ageRange} (expected one of ${AGE_RANGES.join(", ")})`);
  }
  if (!draft.name.trim()) {
    fail("name", "Name must not be empty");
  }
  for (const [quality, value] of Object.entries(draft.timbre)) {
    if (!inRange(value, TIMBRE_RANGE)) {
      fail(`timbre.${quality}`, `Timbre "${quality}" must be between 0 and 1 (got ${value})`);
    }
  }
  if (options.knownEmotions && !options.knownEmotions.includes(draft.emotionDefault)) {
    fail("emotionDefault", `Unknown default emotion: ${draft.emotionDefault}`);
  }

  return { valid: issues.length === 0, errors: issues.map((i) => i.message), issues };
}

/** Throws ValidationError carrying every violation. */
export function assertValidProfile(draft: ProfileDraft, options: ValidateOptions = {}): void {
  const result = validateProfile(draft, options);
  if (!result.valid) throw new ValidationError(result.issues);
}

export interface ProfileIdentity {
  profileId: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Validate a draft and freeze it into a profile.
 * Throws ValidationError listing every violation.
 */
export function buildProfile(
  identity: ProfileIdentity,
  draft: ProfileDraft,
  options: ValidateOptions = {}
): VoiceProfile {
  const result = validateProfile(draft, options);
  const { gender, ageRange } = draft;
  if (!result.valid || !isGender(gender) || !isAgeRange(ageRange)) {
    throw new ValidationError(result.issues);
  }
  return Object.freeze({
    profileId: identity.profileId,
    name: draft.name,
    gender,
    pitch: draft.pitch,
    speed: draft.speed,
    volume: draft.volume,
    timbre: Object.freeze({ ...draft.timbre }),
    language: draft.language,
    accent: draft.accent,
    ageRange,
    emotionDefault: draft.emotionDefault,
    customParams: Object.freeze({ ...draft.customParams }),
    createdAt: identity.createdAt,
    updatedAt: identity.updatedAt,
  });
}
