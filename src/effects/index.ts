/**
 * Audio effects: descriptors, builders and ordered chain application.
 */

export type {
  EffectConfig,
  EffectKind,
  ReverbEffect,
  EchoEffect,
  EqualizerEffect,
  ChorusEffect,
  CompressorEffect,
  DistortionEffect,
  NoiseGateEffect,
  PitchShiftEffect,
  TimeStretchEffect,
} from "./types";
export { EFFECT_KINDS, isEffectKind } from "./types";
export * from "./builders";
export { EFFECT_RULES, inspectEffect, isEffectConfig, parseEffectChain } from "./rules";
export type { EffectRenderer } from "./renderer";
export { TaggingEffectRenderer, describeEffect } from "./renderer";
export { AudioEffects } from "./chain";
