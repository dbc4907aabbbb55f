/**
 * Unit tests for profile stores (file system and in-memory).
 * File store tests run against a fresh temp directory.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { BackendError, NotFoundError, ValidationError } from "../../../src/errors";
import { FileProfileStore, InMemoryProfileStore, sanitizeName } from "../../../src/profiles/storage";
import type { IProfileStore } from "../../../src/profiles/storage";
import type { ProfileDraft, VoiceProfile } from "../../../src/profiles/types";
import { DEFAULT_PROFILE_FIELDS } from "../../../src/profiles/types";
import { buildProfile } from "../../../src/profiles/validation";

const stamp = "2026-01-01T00:00:00.000Z";

function makeProfile(profileId: string, name: string, fields: Partial<ProfileDraft> = {}): VoiceProfile {
  return buildProfile(
    { profileId, createdAt: stamp, updatedAt: stamp },
    { ...DEFAULT_PROFILE_FIELDS, name, timbre: { warmth: 0.6 }, customParams: { tremolo: 0.3 }, ...fields }
  );
}

function sharedContract(label: string, create: () => IProfileStore): void {
  describe(`${label} contract`, () => {
    let store: IProfileStore;

    beforeEach(() => {
      store = create();
    });

    it("round-trips a profile field for field", async () => {
      const profile = makeProfile("p-1", "My Voice", { pitch: -3.5, gender: "female", ageRange: "young" });
      const { profileId } = await store.save(profile);
      expect(profileId).toBe("p-1");
      const loaded = await store.load(profileId);
      expect(loaded).toEqual(profile);
      expect(loaded).not.toBe(profile);
    });

    it("throws NotFoundError for an unknown id", async () => {
      await expect(store.load("missing")).rejects.toThrow(NotFoundError);
      await expect(store.load("missing")).rejects.toThrow("Profile not found: missing");
    });

    it("refuses invalid profiles", async () => {
      const invalid: VoiceProfile = { ...makeProfile("p-1", "Bad"), pitch: 20 };
      await expect(store.save(invalid)).rejects.toThrow(ValidationError);
      await expect(store.load("p-1")).rejects.toThrow(NotFoundError);
    });

    it("refuses ids outside the safe alphabet", async () => {
      const profile: VoiceProfile = { ...makeProfile("p-1", "Sneaky"), profileId: "../etc" };
      await expect(store.save(profile)).rejects.toThrow(ValidationError);
    });

    it("lists summaries ordered by name, then id", async () => {
      await store.save(makeProfile("p-2", "Bravo"));
      await store.save(makeProfile("p-3", "Alpha"));
      await store.save(makeProfile("p-1", "Alpha"));
      const list = await store.list();
      expect(list.map((s) => s.profileId)).toEqual(["p-1", "p-3", "p-2"]);
      expect(list[0]).toEqual({
        profileId: "p-1",
        name: "Alpha",
        gender: "neutral",
        language: "en-US",
        ageRange: "adult",
        createdAt: stamp,
      });
    });

    it("overwrites on save with the same id", async () => {
      await store.save(makeProfile("p-1", "First"));
      await store.save(makeProfile("p-1", "Second", { speed: 1.5 }));
      const loaded = await store.load("p-1");
      expect(loaded.name).toBe("Second");
      expect(loaded.speed).toBe(1.5);
      expect(await store.list()).toHaveLength(1);
    });

    it("deletes and reports whether anything was removed", async () => {
      await store.save(makeProfile("p-1", "Gone"));
      expect(await store.delete("p-1")).toBe(true);
      expect(await store.delete("p-1")).toBe(false);
      await expect(store.load("p-1")).rejects.toThrow(NotFoundError);
    });
  });
}

describe("sanitizeName", () => {
  it("replaces characters outside [A-Za-z0-9_-]", () => {
    expect(sanitizeName("My Voice")).toBe("My_Voice");
    expect(sanitizeName("a/b:c")).toBe("a_b_c");
    expect(sanitizeName("keep-this_one")).toBe("keep-this_one");
  });

  it("falls back for a blank name", () => {
    expect(sanitizeName("   ")).toBe("profile");
  });
});

describe("FileProfileStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "voice-profiles-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  sharedContract("FileProfileStore", () => new FileProfileStore({ directory: dir }));

  it("writes {profileId}_{sanitizedName}.json", async () => {
    const store = new FileProfileStore({ directory: dir });
    const { location } = await store.save(makeProfile("p-1", "My Voice"));
    expect(location).toBe(path.join(dir, "p-1_My_Voice.json"));
    expect(fs.readdirSync(dir)).toEqual(["p-1_My_Voice.json"]);
    const record = JSON.parse(fs.readFileSync(location, "utf8"));
    expect(record.profileId).toBe("p-1");
    expect(record.timbre).toEqual({ warmth: 0.6 });
  });

  it("removes the previous file when a profile is renamed", async () => {
    const store = new FileProfileStore({ directory: dir });
    await store.save(makeProfile("p-1", "Old Name"));
    await store.save(makeProfile("p-1", "New Name"));
    expect(fs.readdirSync(dir)).toEqual(["p-1_New_Name.json"]);
  });

  it("keeps the last of two concurrent renames", async () => {
    const store = new FileProfileStore({ directory: dir });
    await store.save(makeProfile("p-1", "Original"));
    const results = await Promise.allSettled([
      store.save(makeProfile("p-1", "Left")),
      store.save(makeProfile("p-1", "Right")),
    ]);
    expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled"]);
    expect(fs.readdirSync(dir)).toEqual(["p-1_Right.json"]);
    expect((await store.load("p-1")).name).toBe("Right");
  });

  it("skips a file removed between listing and reading", async () => {
    const store = new FileProfileStore({ directory: dir });
    await store.save(makeProfile("p-1", "Alpha"));
    await store.save(makeProfile("p-2", "Bravo"));
    const gone = Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
    const readFile = jest.spyOn(fs.promises, "readFile").mockRejectedValueOnce(gone);
    try {
      expect((await store.list()).map((s) => s.profileId)).toEqual(["p-2"]);
    } finally {
      readFile.mockRestore();
    }
  });

  it("creates the directory on first save", async () => {
    const nested = path.join(dir, "a", "b");
    const store = new FileProfileStore({ directory: nested });
    expect(await store.list()).toEqual([]);
    await store.save(makeProfile("p-1", "Nested"));
    expect(fs.readdirSync(nested)).toEqual(["p-1_Nested.json"]);
  });

  it("fails to load a malformed record with BackendError and skips it in list", async () => {
    const store = new FileProfileStore({ directory: dir });
    await store.save(makeProfile("p-1", "Fine"));
    fs.writeFileSync(path.join(dir, "p-9_Broken.json"), "{not json");
    await expect(store.load("p-9")).rejects.toThrow(BackendError);
    expect((await store.list()).map((s) => s.profileId)).toEqual(["p-1"]);
  });

  it("treats an id with path characters as unknown", async () => {
    const store = new FileProfileStore({ directory: dir });
    await expect(store.load("../p-1")).rejects.toThrow(NotFoundError);
    expect(await store.delete("../p-1")).toBe(false);
  });
});

describe("InMemoryProfileStore", () => {
  sharedContract("InMemoryProfileStore", () => new InMemoryProfileStore());

  it("reports a memory location", async () => {
    const store = new InMemoryProfileStore();
    const { location } = await store.save(makeProfile("p-1", "Mem"));
    expect(location).toBe("memory://p-1");
    expect(await store.list()).toHaveLength(1);
  });
});
