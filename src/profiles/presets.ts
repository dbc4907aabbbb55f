/**
 * Built-in voice presets: complete field sets used as a starting point for custom voices.
 * The registry is frozen at construction and injected into the engine.
 */

import type { ProfileDraft } from "./types";
import { DEFAULT_PROFILE_FIELDS } from "./types";

/** Preset field set; `name` is a display label only and never copied into created profiles. */
export type PresetFields = Readonly<ProfileDraft>;

function preset(fields: Partial<ProfileDraft> & { name: string }): PresetFields {
  return { ...DEFAULT_PROFILE_FIELDS, ...fields };
}

export const DEFAULT_PRESETS: Readonly<Record<string, PresetFields>> = {
  professional_male: preset({
    name: "Professional Male",
    gender: "male",
    pitch: -2.0,
    speed: 0.95,
    volume: 1.0,
    accent: "american",
    ageRange: "adult",
  }),
  professional_female: preset({
    name: "Professional Female",
    gender: "female",
    pitch: 2.0,
    speed: 1.0,
    volume: 1.0,
    accent: "american",
    ageRange: "adult",
  }),
  friendly_assistant: preset({
    name: "Friendly Assistant",
    gender: "neutral",
    pitch: 1.0,
    speed: 1.1,
    volume: 1.0,
    emotionDefault: "happy",
    ageRange: "young",
  }),
  narrator_deep: preset({
    name: "Deep Narrator",
    gender: "male",
    pitch: -4.0,
    speed: 0.85,
    volume: 1.1,
    accent: "british",
    ageRange: "adult",
  }),
  child_voice: preset({
    name: "Child Voice",
    gender: "neutral",
    pitch: 6.0,
    speed: 1.2,
    volume: 0.9,
    ageRange: "child",
  }),
  elderly_wise: preset({
    name: "Elderly Wise",
    gender: "male",
    pitch: -1.0,
    speed: 0.8,
    volume: 0.95,
    ageRange: "elderly",
    customParams: { tremolo: 0.3 },
  }),
};

export interface PresetRegistry {
  /** Preset names in registration order. */
  readonly names: readonly string[];
  get(name: string): PresetFields | undefined;
}

function freezePreset(fields: PresetFields): PresetFields {
  return Object.freeze({
    ...fields,
    timbre: Object.freeze({ ...fields.timbre }),
    customParams: Object.freeze({ ...fields.customParams }),
  });
}

export function createPresetRegistry(
  presets: Readonly<Record<string, PresetFields>> = DEFAULT_PRESETS
): PresetRegistry {
  const entries = new Map<string, PresetFields>();
  for (const [name, fields] of Object.entries(presets)) {
    entries.set(name, freezePreset(fields));
  }
  const names = Object.freeze([...entries.keys()]);
  return Object.freeze({
    names,
    get: (name: string) => entries.get(name),
  });
}
