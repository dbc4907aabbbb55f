/**
 * Integration test: engine built from config with the file store and stub backends.
 * Profiles persist across engine instances; rendered audio is written and read back through the file I/O layer.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { AudioFileLoader, AudioFileWriter } from "../../src/audio/file-io";
import type { AppConfig } from "../../src/config";
import { createEcho, createTimeStretch, parseEffectChain } from "../../src/effects";
import { createEngine } from "../../src/engine";
import { ChainApplicationError, ValidationError } from "../../src/errors";

describe("Engine + FileProfileStore integration", () => {
  let root: string;
  let config: AppConfig;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "voice-engine-"));
    config = {
      tts: { provider: "stub" },
      asr: { provider: "stub" },
      voice: { language: "en-US", sampleRateHz: 24000 },
      storage: {
        kind: "file",
        profilesPath: path.join(root, "profiles"),
        audioOutputDir: path.join(root, "audio"),
      },
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("persists profiles across engine instances", async () => {
    const created = await createEngine(config).createCustomVoice("Deep Storyteller", {
      basePreset: "narrator_deep",
      timbre: { warmth: 0.8 },
    });
    expect(fs.readdirSync(config.storage.profilesPath)).toEqual([`${created.profileId}_Deep_Storyteller.json`]);

    const reopened = createEngine(config);
    expect(await reopened.loadSavedProfile(created.profileId)).toEqual(created);
    expect(await reopened.getSavedProfiles()).toEqual([
      {
        profileId: created.profileId,
        name: "Deep Storyteller",
        gender: "male",
        language: "en-US",
        ageRange: "adult",
        createdAt: created.createdAt,
      },
    ]);
  });

  it("keeps a profile renamed by two concurrent updates", async () => {
    const engine = createEngine(config);
    const created = await engine.createCustomVoice("Original");
    const results = await Promise.allSettled([
      engine.updateProfile(created.profileId, { name: "Left" }),
      engine.updateProfile(created.profileId, { name: "Right" }),
    ]);
    expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled"]);

    const loaded = await engine.loadSavedProfile(created.profileId);
    expect(["Left", "Right"]).toContain(loaded.name);
    expect(fs.readdirSync(config.storage.profilesPath)).toEqual([`${created.profileId}_${loaded.name}.json`]);
  });

  it("never writes a profile that fails validation", async () => {
    const engine = createEngine(config);
    await expect(engine.createCustomVoice("Too High", { pitch: 15 })).rejects.toThrow(ValidationError);
    expect(fs.existsSync(config.storage.profilesPath)).toBe(false);
    expect(await engine.getSavedProfiles()).toEqual([]);
  });

  it("synthesizes, writes and reloads audio", async () => {
    const engine = createEngine(config);
    const audio = await engine.synthesize("a".repeat(300));
    const writer = new AudioFileWriter(config.storage.audioOutputDir);
    const { filePath, fileSize } = await writer.write(audio, "takes/raw.wav");
    expect(fileSize).toBe(44 + 96000);

    const loaded = await new AudioFileLoader().load(filePath);
    expect(loaded.sampleRate).toBe(24000);
    expect(loaded.duration).toBe(2);
    expect(await engine.transcribe(loaded)).toEqual({ text: "", confidence: 0, language: "en-US" });
  });

  it("renders a stored profile with emotion and a decoded effect chain", async () => {
    const engine = createEngine(config);
    const profile = await engine.createCustomVoice("Radio", { basePreset: "professional_female" });
    const effects = parseEffectChain(JSON.parse('[{"type":"echo","delayMs":250,"feedback":0.4},{"type":"time_stretch","factor":2}]'));
    const out = await engine.synthesize("a".repeat(150), { profile, emotion: "calm", emotionIntensity: 0, effects });

    const tag = "[time_stretch factor=2][echo delayMs=250 feedback=0.4][prosody pitch=+2.00 speed=1.00 volume=1.00]";
    expect(out.bytes.toString("ascii", 0, tag.length + 4)).toBe(`${tag}RIFF`);
    expect(out.duration).toBe(0.5);
  });

  it("produces no output when any effect in the chain is invalid", async () => {
    const engine = createEngine(config);
    const profile = await engine.createCustomVoice("Echoes");
    const effects = [createEcho(), createTimeStretch(), { type: "time_stretch" as const, factor: 0 }];
    await expect(engine.synthesize("hello", { profile, effects })).rejects.toThrow(ChainApplicationError);
    await expect(engine.synthesize("hello", { profile, effects })).rejects.toThrow("Effect #3 (time_stretch) failed");
  });
});
