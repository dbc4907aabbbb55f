/**
 * Profile storage interface: a durable map keyed by profile id.
 * Implementations can be swapped via config (file system, in-memory).
 */

import type { ProfileSummary, VoiceProfile } from "../types";

export interface SaveResult {
  profileId: string;
  /** Where the record lives (file path, or a store-specific URI). */
  location: string;
}

/**
 * Contract:
 * - `save` refuses invalid profiles with ValidationError.
 * - `load(save(p).profileId)` returns a profile equal to `p`, field for field.
 * - `load` of an unknown id throws NotFoundError; `delete` of one returns false.
 * - Concurrent saves of the same id are last-writer-wins.
 */
export interface IProfileStore {
  save(profile: VoiceProfile): Promise<SaveResult>;
  load(profileId: string): Promise<VoiceProfile>;
  /** Summaries ordered by name, then profile id. */
  list(): Promise<ProfileSummary[]>;
  delete(profileId: string): Promise<boolean>;
}

export function compareSummaries(a: ProfileSummary, b: ProfileSummary): number {
  return a.name.localeCompare(b.name) || (a.profileId < b.profileId ? -1 : a.profileId > b.profileId ? 1 : 0);
}
