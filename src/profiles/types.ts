/**
 * Voice profile types.
 * A profile is a validated, readonly value; drafts are unchecked field sets (e.g. merged overrides, stored JSON).
 */

export const GENDERS = ["male", "female", "neutral", "custom"] as const;
export type Gender = (typeof GENDERS)[number];

export const AGE_RANGES = ["child", "young", "adult", "elderly"] as const;
export type AgeRange = (typeof AGE_RANGES)[number];

export const PITCH_RANGE = { min: -12, max: 12 } as const;
export const SPEED_RANGE = { min: 0.5, max: 2.0 } as const;
export const VOLUME_RANGE = { min: 0.0, max: 2.0 } as const;
export const TIMBRE_RANGE = { min: 0, max: 1 } as const;

export function isGender(v: string): v is Gender {
  return GENDERS.some((g) => g === v);
}

export function isAgeRange(v: string): v is AgeRange {
  return AGE_RANGES.some((a) => a === v);
}

/** Unchecked profile fields. `gender` and `ageRange` are plain strings until validated. */
export interface ProfileDraft {
  name: string;
  gender: string;
  /** Semitones. */
  pitch: number;
  /** Speech rate multiplier. */
  speed: number;
  /** Volume multiplier. */
  volume: number;
  /** Named voice qualities (e.g. warmth, brightness), each 0..1. */
  timbre: Record<string, number>;
  /** Locale code, e.g. en-US. */
  language: string;
  accent: string;
  ageRange: string;
  emotionDefault: string;
  /** Engine-specific; passed through unvalidated. */
  customParams: Record<string, unknown>;
}

/** Fields a caller may override when creating or updating a profile. */
export type ProfileOverrides = Partial<Omit<ProfileDraft, "name">>;

export interface VoiceProfile {
  readonly profileId: string;
  readonly name: string;
  readonly gender: Gender;
  readonly pitch: number;
  readonly speed: number;
  readonly volume: number;
  readonly timbre: Readonly<Record<string, number>>;
  readonly language: string;
  readonly accent: string;
  readonly ageRange: AgeRange;
  readonly emotionDefault: string;
  readonly customParams: Readonly<Record<string, unknown>>;
  /** ISO timestamp. */
  readonly createdAt: string;
  /** ISO timestamp. */
  readonly updatedAt: string;
}

/** Listing entry returned by profile stores. */
export interface ProfileSummary {
  profileId: string;
  name: string;
  gender: Gender;
  language: string;
  ageRange: AgeRange;
  createdAt: string;
}

export const DEFAULT_PROFILE_FIELDS: Readonly<Omit<ProfileDraft, "name">> = Object.freeze({
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
});

export function toDraft(profile: VoiceProfile): ProfileDraft {
  return {
    name: profile.name,
    gender: profile.gender,
    pitch: profile.pitch,
    speed: profile.speed,
    volume: profile.volume,
    timbre: { ...profile.timbre },
    language: profile.language,
    accent: profile.accent,
    ageRange: profile.ageRange,
    emotionDefault: profile.emotionDefault,
    customParams: { ...profile.customParams },
  };
}

export function toSummary(profile: VoiceProfile): ProfileSummary {
  return {
    profileId: profile.profileId,
    name: profile.name,
    gender: profile.gender,
    language: profile.language,
    ageRange: profile.ageRange,
    createdAt: profile.createdAt,
  };
}
