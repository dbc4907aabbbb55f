/**
 * JSON record format for persisted profiles.
 * Decoding checks the record shape with zod, then re-validates ranges through buildProfile.
 */

import { z } from "zod";
import { ValidationError } from "../../errors";
import type { VoiceProfile } from "../types";
import { toDraft } from "../types";
import { buildProfile, validateProfile } from "../validation";

/** Ids become file-name prefixes, so they are limited to a safe alphabet without "_". */
const PROFILE_ID_PATTERN = /^[A-Za-z0-9-]+$/;

export const storedProfileSchema = z.object({
  profileId: z.string().regex(PROFILE_ID_PATTERN),
  name: z.string(),
  gender: z.string(),
  pitch: z.number(),
  speed: z.number(),
  volume: z.number(),
  timbre: z.record(z.number()),
  language: z.string(),
  accent: z.string(),
  ageRange: z.string(),
  emotionDefault: z.string(),
  customParams: z.record(z.unknown()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type StoredProfile = z.infer<typeof storedProfileSchema>;

export function isStorableId(profileId: string): boolean {
  return PROFILE_ID_PATTERN.test(profileId);
}

/** Throws ValidationError when the profile may not be persisted. */
export function assertStorable(profile: VoiceProfile): void {
  const issues = validateProfile(toDraft(profile)).issues;
  if (!isStorableId(profile.profileId)) {
    issues.push({ field: "profileId", message: `Profile id must match ${PROFILE_ID_PATTERN} (got ${profile.profileId})` });
  }
  if (issues.length > 0) throw new ValidationError(issues);
}

export function encodeProfile(profile: VoiceProfile): string {
  const record: StoredProfile = {
    profileId: profile.profileId,
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
    createdAt: profile.createdAt,
    updatedAt: profile.updatedAt,
  };
  return JSON.stringify(record, null, 2);
}

/** Parse a stored record. Throws ZodError or SyntaxError on malformed input, ValidationError on bad ranges. */
export function decodeProfile(json: string): VoiceProfile {
  const record = storedProfileSchema.parse(JSON.parse(json));
  const { profileId, createdAt, updatedAt, ...draft } = record;
  return buildProfile({ profileId, createdAt, updatedAt }, draft);
}
