/**
 * Effect builders. Each validates every parameter and throws ParameterRangeError listing all violations.
 */

import { ParameterRangeError } from "../errors";
import type {
  ChorusEffect,
  CompressorEffect,
  DistortionEffect,
  EchoEffect,
  EffectConfig,
  EqualizerEffect,
  NoiseGateEffect,
  PitchShiftEffect,
  ReverbEffect,
  TimeStretchEffect,
} from "./types";
import { inspectEffect } from "./rules";

function checked<T extends EffectConfig>(effect: T): T {
  const { violations } = inspectEffect(effect);
  if (violations.length > 0) throw new ParameterRangeError(violations);
  return Object.freeze(effect);
}

type Params<T extends EffectConfig> = Partial<Omit<T, "type">>;

export function createReverb({ roomSize = 0.5, damping = 0.5 }: Params<ReverbEffect> = {}): ReverbEffect {
  return checked({ type: "reverb", roomSize, damping });
}

export function createEcho({ delayMs = 500, feedback = 0.3 }: Params<EchoEffect> = {}): EchoEffect {
  return checked({ type: "echo", delayMs, feedback });
}

export function createEqualizer({ bass = 0, mid = 0, treble = 0 }: Params<EqualizerEffect> = {}): EqualizerEffect {
  return checked({ type: "equalizer", bass, mid, treble });
}

export function createChorus({ depth = 0.5, rate = 1.5 }: Params<ChorusEffect> = {}): ChorusEffect {
  return checked({ type: "chorus", depth, rate });
}

export function createCompressor({ ratio = 4, thresholdDb = -20 }: Params<CompressorEffect> = {}): CompressorEffect {
  return checked({ type: "compressor", ratio, thresholdDb });
}

export function createDistortion({ amount = 0.5 }: Params<DistortionEffect> = {}): DistortionEffect {
  return checked({ type: "distortion", amount });
}

export function createNoiseGate({ thresholdDb = -40 }: Params<NoiseGateEffect> = {}): NoiseGateEffect {
  return checked({ type: "noise_gate", thresholdDb });
}

export function createPitchShift({ semitones = 0 }: Params<PitchShiftEffect> = {}): PitchShiftEffect {
  return checked({ type: "pitch_shift", semitones });
}

export function createTimeStretch({ factor = 1.0 }: Params<TimeStretchEffect> = {}): TimeStretchEffect {
  return checked({ type: "time_stretch", factor });
}
