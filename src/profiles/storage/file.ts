/**
 * File-system profile store: one JSON file per profile, named `{profileId}_{sanitizedName}.json`.
 * Writes go through a uniquely named temp file and rename so a concurrent reader never sees half a record.
 * Saves and deletes of one id are serialized within the store, so the last write always leaves its file.
 */

import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";
import { BackendError, NotFoundError } from "../../errors";
import { logger } from "../../logging";
import type { ProfileSummary, VoiceProfile } from "../types";
import { toSummary } from "../types";
import type { IProfileStore, SaveResult } from "./types";
import { compareSummaries } from "./types";
import { assertStorable, decodeProfile, encodeProfile, isStorableId } from "./codec";

export interface FileProfileStoreConfig {
  /** Directory holding the profile files; created on first save. */
  directory: string;
}

export function sanitizeName(name: string): string {
  const cleaned = name.trim().replace(/[^A-Za-z0-9_-]/g, "_");
  return cleaned || "profile";
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileProfileStore implements IProfileStore {
  private readonly directory: string;
  /** Tail of the pending write queue per profile id. */
  private readonly writes = new Map<string, Promise<unknown>>();

  constructor(config: FileProfileStoreConfig) {
    this.directory = path.resolve(config.directory);
  }

  async save(profile: VoiceProfile): Promise<SaveResult> {
    assertStorable(profile);
    return this.serialize(profile.profileId, () => this.write(profile));
  }

  async load(profileId: string): Promise<VoiceProfile> {
    // A rename briefly leaves two files; a concurrent delete can remove a listed one.
    for (const file of await this.filesFor(profileId)) {
      const json = await this.readIfPresent(file);
      if (json === null) continue;
      try {
        return decodeProfile(json);
      } catch (err) {
        throw new BackendError("storage", `file:${file}`, err);
      }
    }
    throw new NotFoundError("profile", profileId);
  }

  async list(): Promise<ProfileSummary[]> {
    const byId = new Map<string, ProfileSummary>();
    for (const file of await this.jsonFiles()) {
      const json = await this.readIfPresent(file);
      if (json === null) continue;
      try {
        const summary = toSummary(decodeProfile(json));
        if (!byId.has(summary.profileId)) byId.set(summary.profileId, summary);
      } catch (err) {
        logger.warn(
          { event: "PROFILE_FILE_UNREADABLE", file, err: err instanceof Error ? err.message : String(err) },
          "Skipping unreadable profile file"
        );
      }
    }
    return [...byId.values()].sort(compareSummaries);
  }

  async delete(profileId: string): Promise<boolean> {
    return this.serialize(profileId, async () => {
      const files = await this.filesFor(profileId);
      for (const file of files) {
        await fs.promises.rm(path.join(this.directory, file), { force: true });
      }
      return files.length > 0;
    });
  }

  private async write(profile: VoiceProfile): Promise<SaveResult> {
    await fs.promises.mkdir(this.directory, { recursive: true });
    const fileName = `${profile.profileId}_${sanitizeName(profile.name)}.json`;
    const target = path.join(this.directory, fileName);
    const tmp = `${target}.${randomUUID()}.tmp`;
    await fs.promises.writeFile(tmp, encodeProfile(profile), "utf8");
    await fs.promises.rename(tmp, target);
    // A renamed profile leaves its previous file behind.
    for (const stale of await this.filesFor(profile.profileId)) {
      if (stale !== fileName) await fs.promises.rm(path.join(this.directory, stale), { force: true });
    }
    logger.debug({ event: "PROFILE_FILE_WRITTEN", profileId: profile.profileId, file: target }, "Profile saved");
    return { profileId: profile.profileId, location: target };
  }

  /** Run `task` after every earlier write of the same id has settled. */
  private async serialize<T>(profileId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writes.get(profileId) ?? Promise.resolve();
    const run = previous.then(task, task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.writes.set(profileId, tail);
    try {
      return await run;
    } finally {
      if (this.writes.get(profileId) === tail) this.writes.delete(profileId);
    }
  }

  private async readIfPresent(file: string): Promise<string | null> {
    try {
      return await fs.promises.readFile(path.join(this.directory, file), "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  private async filesFor(profileId: string): Promise<string[]> {
    if (!isStorableId(profileId)) return [];
    const prefix = `${profileId}_`;
    return (await this.jsonFiles()).filter((f) => f.startsWith(prefix));
  }

  private async jsonFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.directory);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return entries.filter((f) => f.endsWith(".json")).sort();
  }
}
