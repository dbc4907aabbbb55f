/**
 * Env-based configuration for the voice customizer.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type TtsProvider = "google" | "azure" | "stub";
export type AsrProvider = "openai" | "stub";
export type ProfileStoreKind = "file" | "memory";

export interface AppConfig {
  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    googleApiKey?: string;
    googleVoiceName?: string;
    azureKey?: string;
    azureRegion?: string;
    azureVoiceName?: string;
  };

  /** ASR (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
  };

  /** Defaults applied when a request does not name them */
  voice: {
    language: string;
    sampleRateHz: number;
  };

  /** Profile persistence and audio output locations */
  storage: {
    kind: ProfileStoreKind;
    profilesPath: string;
    audioOutputDir: string;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const v = value?.toLowerCase();
  return allowed.find((a) => a === v) ?? fallback;
}

function positiveInt(value: string | undefined, fallback: number): number {
  if (value == null || value === "") return fallback;
  const n = parseInt(value, 10);
  return Number.isNaN(n) || n <= 0 ? fallback : n;
}

/**
 * Build config from environment variables.
 * TTS_PROVIDER and ASR_PROVIDER select adapters; PROFILE_STORE selects file or in-memory persistence.
 */
export function loadConfig(): AppConfig {
  return {
    tts: {
      provider: oneOf(getEnv("TTS_PROVIDER"), ["google", "azure", "stub"], "stub"),
      googleApiKey: getEnv("GOOGLE_CLOUD_TTS_API_KEY"),
      googleVoiceName: getEnv("GOOGLE_TTS_VOICE_NAME") || "en-US-Neural2-D",
      azureKey: getEnv("AZURE_TTS_KEY"),
      azureRegion: getEnv("AZURE_TTS_REGION"),
      azureVoiceName: getEnv("AZURE_TTS_VOICE_NAME"),
    },
    asr: {
      provider: oneOf(getEnv("ASR_PROVIDER"), ["openai", "stub"], "stub"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
    },
    voice: {
      language: getEnv("VOICE_LANGUAGE") || "en-US",
      sampleRateHz: positiveInt(getEnv("VOICE_SAMPLE_RATE"), 24000),
    },
    storage: {
      kind: oneOf(getEnv("PROFILE_STORE"), ["file", "memory"], "file"),
      profilesPath: path.resolve(getEnv("PROFILE_STORAGE_PATH") || "./voice_profiles"),
      audioOutputDir: path.resolve(getEnv("AUDIO_OUTPUT_DIR") || "./audio_output"),
    },
  };
}
