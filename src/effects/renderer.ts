/**
 * Effect renderers turn one descriptor into one AudioData -> AudioData step.
 *
 * Signal processing is not done here. The default renderer prepends a tag describing the effect
 * (so application order is visible in the output) and updates duration for effects that change timing.
 * A DSP-backed renderer plugs in through the same interface.
 */

import type { AudioData } from "../audio/types";
import { withTag } from "../audio/types";
import type { EffectConfig } from "./types";

export interface EffectRenderer {
  render(audio: AudioData, effect: EffectConfig): AudioData;
}

function assertNever(x: never): never {
  throw new Error(`Unhandled effect: ${JSON.stringify(x)}`);
}

export function describeEffect(effect: EffectConfig): string {
  switch (effect.type) {
    case "reverb":
      return `reverb roomSize=${effect.roomSize} damping=${effect.damping}`;
    case "echo":
      return `echo delayMs=${effect.delayMs} feedback=${effect.feedback}`;
    case "equalizer":
      return `equalizer bass=${effect.bass} mid=${effect.mid} treble=${effect.treble}`;
    case "chorus":
      return `chorus depth=${effect.depth} rate=${effect.rate}`;
    case "compressor":
      return `compressor ratio=${effect.ratio} thresholdDb=${effect.thresholdDb}`;
    case "distortion":
      return `distortion amount=${effect.amount}`;
    case "noise_gate":
      return `noise_gate thresholdDb=${effect.thresholdDb}`;
    case "pitch_shift":
      return `pitch_shift semitones=${effect.semitones}`;
    case "time_stretch":
      return `time_stretch factor=${effect.factor}`;
    default:
      return assertNever(effect);
  }
}

export class TaggingEffectRenderer implements EffectRenderer {
  render(audio: AudioData, effect: EffectConfig): AudioData {
    const duration = effect.type === "time_stretch" ? audio.duration / effect.factor : audio.duration;
    return withTag(audio, `[${describeEffect(effect)}]`, duration);
  }
}
