/**
 * Voice transform: ephemeral deltas applied to pitch, formants and timbre.
 *
 * pitchShift is not bounded (only finite): it is a relative shift applied on top of whatever the
 * source voice is, unlike a profile's absolute pitch, which stays within [-12, 12].
 */

import type { RangeViolation } from "../errors";

export interface VoiceTransform {
  /** Semitones. */
  pitchShift: number;
  /** Formant frequency ratio; 1.0 leaves formants untouched. */
  formantShift: number;
  /** -1 (darker) .. +1 (brighter). */
  timbreMorph: number;
  /** 0 .. 1 */
  breathiness: number;
  /** 0 .. 1 */
  roughness: number;
}

export const NEUTRAL_TRANSFORM: Readonly<VoiceTransform> = Object.freeze({
  pitchShift: 0,
  formantShift: 1.0,
  timbreMorph: 0,
  breathiness: 0,
  roughness: 0,
});

export function createTransform(fields: Partial<VoiceTransform> = {}): VoiceTransform {
  return { ...NEUTRAL_TRANSFORM, ...fields };
}

export const TRANSFORM_PRESETS = {
  maleToFemale: createTransform({ pitchShift: 4.0, formantShift: 1.15, timbreMorph: 0.5 }),
  femaleToMale: createTransform({ pitchShift: -4.0, formantShift: 0.85, timbreMorph: -0.5 }),
  robotVoice: createTransform({ pitchShift: 0.0, formantShift: 1.0, timbreMorph: -1.0, roughness: 0.8 }),
} as const;

export type TransformPresetName = keyof typeof TRANSFORM_PRESETS;

export function transformViolations(t: VoiceTransform): RangeViolation[] {
  const out: RangeViolation[] = [];
  if (!Number.isFinite(t.pitchShift)) out.push({ field: "pitchShift", allowed: "a finite number", value: t.pitchShift });
  if (!(t.formantShift > 0 && Number.isFinite(t.formantShift))) {
    out.push({ field: "formantShift", allowed: "> 0", value: t.formantShift });
  }
  if (!(t.timbreMorph >= -1 && t.timbreMorph <= 1)) {
    out.push({ field: "timbreMorph", allowed: "within [-1, 1]", value: t.timbreMorph });
  }
  if (!(t.breathiness >= 0 && t.breathiness <= 1)) {
    out.push({ field: "breathiness", allowed: "within [0, 1]", value: t.breathiness });
  }
  if (!(t.roughness >= 0 && t.roughness <= 1)) {
    out.push({ field: "roughness", allowed: "within [0, 1]", value: t.roughness });
  }
  return out;
}
