/**
 * Engine wiring and request types.
 */

import type { IASR } from "../adapters/asr";
import type { ITTS } from "../adapters/tts";
import type { EffectConfig, EffectRenderer } from "../effects";
import type { EmotionRegistry } from "../emotion/table";
import type { PresetRegistry } from "../profiles/presets";
import type { IProfileStore } from "../profiles/storage";
import type { ProfileOverrides, VoiceProfile } from "../profiles/types";
import type { NormalizeOptions } from "../text/normalizer";

/** Backends keyed by opaque engine name, plus the one used when a request names none. */
export interface BackendSet<T> {
  engines: ReadonlyMap<string, T>;
  defaultEngine: string;
}

export interface EngineDependencies {
  store: IProfileStore;
  presets?: PresetRegistry;
  emotions?: EmotionRegistry;
  effectRenderer?: EffectRenderer;
  tts?: BackendSet<ITTS>;
  asr?: BackendSet<IASR>;
  /** Already-resolved defaults (see config). */
  defaults?: {
    language?: string;
    sampleRateHz?: number;
  };
  /** Profile id source; must yield ids unique within the store. Defaults to crypto.randomUUID. */
  generateId?: () => string;
  now?: () => Date;
}

export interface CreateVoiceOptions extends ProfileOverrides {
  /** Preset to start from; documented defaults are used when absent. */
  basePreset?: string;
}

export type ProfileChanges = ProfileOverrides & { name?: string };

export interface ApplyProfileOptions {
  emotion?: string;
  /** 0..1, default 1.0. Only used with `emotion`. */
  emotionIntensity?: number;
  /** Applied in list order after prosody. */
  effects?: readonly EffectConfig[];
}

export interface SynthesizeOptions extends ApplyProfileOptions {
  /** TTS engine name; defaults to the configured engine. */
  engine?: string;
  profile?: VoiceProfile;
  /** Overrides the profile's language. */
  language?: string;
  /** Provider voice; falls back to the profile's customParams.voiceName. */
  voiceName?: string;
  /** Backend speaking rate, applied by the provider before any profile prosody. */
  speed?: number;
  /** Clean the text before the length check and synthesis. */
  normalize?: NormalizeOptions;
}

export interface TranscribeRequest {
  /** ASR engine name; defaults to the configured engine. */
  engine?: string;
  language?: string;
}
