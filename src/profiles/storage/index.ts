/**
 * Profile store factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IProfileStore } from "./types";
import { FileProfileStore } from "./file";
import { InMemoryProfileStore } from "./memory";

export type { IProfileStore, SaveResult } from "./types";
export { FileProfileStore, sanitizeName } from "./file";
export { InMemoryProfileStore } from "./memory";
export { decodeProfile, encodeProfile } from "./codec";

export function createProfileStore(config: AppConfig): IProfileStore {
  if (config.storage.kind === "memory") return new InMemoryProfileStore();
  return new FileProfileStore({ directory: config.storage.profilesPath });
}
