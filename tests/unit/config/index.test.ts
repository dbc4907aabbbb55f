/**
 * Unit tests for config loading.
 */

import * as path from "path";
import { loadConfig } from "../../../src/config";

const KEYS = [
  "TTS_PROVIDER",
  "ASR_PROVIDER",
  "GOOGLE_CLOUD_TTS_API_KEY",
  "GOOGLE_TTS_VOICE_NAME",
  "AZURE_TTS_KEY",
  "AZURE_TTS_REGION",
  "OPENAI_API_KEY",
  "VOICE_LANGUAGE",
  "VOICE_SAMPLE_RATE",
  "PROFILE_STORE",
  "PROFILE_STORAGE_PATH",
  "AUDIO_OUTPUT_DIR",
];

describe("loadConfig", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it("falls back to defaults", () => {
    const config = loadConfig();
    expect(config.tts.provider).toBe("stub");
    expect(config.tts.googleVoiceName).toBe("en-US-Neural2-D");
    expect(config.asr).toEqual({ provider: "stub", openaiApiKey: undefined });
    expect(config.voice).toEqual({ language: "en-US", sampleRateHz: 24000 });
    expect(config.storage).toEqual({
      kind: "file",
      profilesPath: path.resolve("./voice_profiles"),
      audioOutputDir: path.resolve("./audio_output"),
    });
  });

  it("reads providers case-insensitively and ignores unknown ones", () => {
    process.env.TTS_PROVIDER = "Azure";
    process.env.ASR_PROVIDER = "whisper-cpp";
    const config = loadConfig();
    expect(config.tts.provider).toBe("azure");
    expect(config.asr.provider).toBe("stub");
  });

  it("reads voice defaults and storage settings", () => {
    process.env.VOICE_LANGUAGE = "de-DE";
    process.env.VOICE_SAMPLE_RATE = "16000";
    process.env.PROFILE_STORE = "memory";
    process.env.PROFILE_STORAGE_PATH = "/var/lib/voices";
    const config = loadConfig();
    expect(config.voice).toEqual({ language: "de-DE", sampleRateHz: 16000 });
    expect(config.storage.kind).toBe("memory");
    expect(config.storage.profilesPath).toBe("/var/lib/voices");
  });

  it("ignores a sample rate that is not a positive integer", () => {
    process.env.VOICE_SAMPLE_RATE = "-8000";
    expect(loadConfig().voice.sampleRateHz).toBe(24000);
    process.env.VOICE_SAMPLE_RATE = "fast";
    expect(loadConfig().voice.sampleRateHz).toBe(24000);
  });
});
