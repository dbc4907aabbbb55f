/**
 * Audio effect descriptors: a closed set of kinds, each with its own parameters.
 * Ranges are listed in EFFECT_RULES (rules.ts).
 */

export interface ReverbEffect {
  readonly type: "reverb";
  readonly roomSize: number;
  readonly damping: number;
}

export interface EchoEffect {
  readonly type: "echo";
  readonly delayMs: number;
  readonly feedback: number;
}

export interface EqualizerEffect {
  readonly type: "equalizer";
  /** dB */
  readonly bass: number;
  /** dB */
  readonly mid: number;
  /** dB */
  readonly treble: number;
}

export interface ChorusEffect {
  readonly type: "chorus";
  readonly depth: number;
  /** Hz */
  readonly rate: number;
}

export interface CompressorEffect {
  readonly type: "compressor";
  readonly ratio: number;
  readonly thresholdDb: number;
}

export interface DistortionEffect {
  readonly type: "distortion";
  readonly amount: number;
}

export interface NoiseGateEffect {
  readonly type: "noise_gate";
  readonly thresholdDb: number;
}

export interface PitchShiftEffect {
  readonly type: "pitch_shift";
  readonly semitones: number;
}

export interface TimeStretchEffect {
  readonly type: "time_stretch";
  /** > 1 speeds up (shorter output). */
  readonly factor: number;
}

export type EffectConfig =
  | ReverbEffect
  | EchoEffect
  | EqualizerEffect
  | ChorusEffect
  | CompressorEffect
  | DistortionEffect
  | NoiseGateEffect
  | PitchShiftEffect
  | TimeStretchEffect;

export type EffectKind = EffectConfig["type"];

export const EFFECT_KINDS: readonly EffectKind[] = [
  "reverb",
  "echo",
  "equalizer",
  "chorus",
  "compressor",
  "distortion",
  "noise_gate",
  "pitch_shift",
  "time_stretch",
];

export function isEffectKind(v: unknown): v is EffectKind {
  return EFFECT_KINDS.some((k) => k === v);
}
