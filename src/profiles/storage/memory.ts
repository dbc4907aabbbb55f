/**
 * In-memory profile store for tests and ephemeral sessions.
 * Records are kept serialized so callers never share references with the store.
 */

import { NotFoundError } from "../../errors";
import type { ProfileSummary, VoiceProfile } from "../types";
import { toSummary } from "../types";
import type { IProfileStore, SaveResult } from "./types";
import { compareSummaries } from "./types";
import { assertStorable, decodeProfile, encodeProfile } from "./codec";

export class InMemoryProfileStore implements IProfileStore {
  private readonly records = new Map<string, string>();

  async save(profile: VoiceProfile): Promise<SaveResult> {
    assertStorable(profile);
    this.records.set(profile.profileId, encodeProfile(profile));
    return { profileId: profile.profileId, location: `memory://${profile.profileId}` };
  }

  async load(profileId: string): Promise<VoiceProfile> {
    const json = this.records.get(profileId);
    if (json === undefined) throw new NotFoundError("profile", profileId);
    return decodeProfile(json);
  }

  async list(): Promise<ProfileSummary[]> {
    return [...this.records.values()].map((json) => toSummary(decodeProfile(json))).sort(compareSummaries);
  }

  async delete(profileId: string): Promise<boolean> {
    return this.records.delete(profileId);
  }
}
