/**
 * Voice transform component: applies transforms and prosody (pitch/speed/volume) to audio.
 * Like effects, stages tag the buffer instead of filtering it; speed rescales duration.
 */

import type { AudioData } from "../audio/types";
import { withTag } from "../audio/types";
import type { RangeViolation } from "../errors";
import { ParameterRangeError } from "../errors";
import { logger } from "../logging";
import type { TransformPresetName, VoiceTransform } from "./types";
import { NEUTRAL_TRANSFORM, TRANSFORM_PRESETS, transformViolations } from "./types";

export interface Prosody {
  /** Semitones relative to the source voice. */
  pitch: number;
  speed: number;
  volume: number;
}

function signed(n: number, digits: number): string {
  return `${n >= 0 ? "+" : ""}${n.toFixed(digits)}`;
}

export class VoiceTransformComponent {
  /** Apply each non-neutral stage in order: pitch, formant, timbre, breathiness, roughness. */
  transformVoice(audio: AudioData, transform: VoiceTransform): AudioData {
    const violations = transformViolations(transform);
    if (violations.length > 0) throw new ParameterRangeError(violations);

    const applied: string[] = [];
    let out = audio;
    if (transform.pitchShift !== NEUTRAL_TRANSFORM.pitchShift) {
      out = withTag(out, `[pitch ${signed(transform.pitchShift, 1)}]`);
      applied.push("pitchShift");
    }
    if (transform.formantShift !== NEUTRAL_TRANSFORM.formantShift) {
      out = withTag(out, `[formant x${transform.formantShift.toFixed(2)}]`);
      applied.push("formantShift");
    }
    if (transform.timbreMorph !== NEUTRAL_TRANSFORM.timbreMorph) {
      out = withTag(out, `[timbre ${signed(transform.timbreMorph, 2)}]`);
      applied.push("timbreMorph");
    }
    if (transform.breathiness !== NEUTRAL_TRANSFORM.breathiness) {
      out = withTag(out, `[breathiness ${transform.breathiness.toFixed(2)}]`);
      applied.push("breathiness");
    }
    if (transform.roughness !== NEUTRAL_TRANSFORM.roughness) {
      out = withTag(out, `[roughness ${transform.roughness.toFixed(2)}]`);
      applied.push("roughness");
    }
    logger.debug({ event: "TRANSFORM_APPLIED", applied }, "Voice transform applied");
    return out;
  }

  /** Apply resolved pitch/speed/volume. Values are not clamped to profile ranges. */
  applyProsody(audio: AudioData, prosody: Prosody): AudioData {
    const violations: RangeViolation[] = [];
    if (!Number.isFinite(prosody.pitch)) violations.push({ field: "pitch", allowed: "a finite number", value: prosody.pitch });
    if (!(prosody.speed > 0 && Number.isFinite(prosody.speed))) {
      violations.push({ field: "speed", allowed: "> 0", value: prosody.speed });
    }
    if (!(prosody.volume >= 0 && Number.isFinite(prosody.volume))) {
      violations.push({ field: "volume", allowed: ">= 0", value: prosody.volume });
    }
    if (violations.length > 0) throw new ParameterRangeError(violations);

    const tag = `[prosody pitch=${signed(prosody.pitch, 2)} speed=${prosody.speed.toFixed(2)} volume=${prosody.volume.toFixed(2)}]`;
    return withTag(audio, tag, audio.duration / prosody.speed);
  }

  preset(name: TransformPresetName): VoiceTransform {
    return { ...TRANSFORM_PRESETS[name] };
  }

  maleToFemale(): VoiceTransform {
    return this.preset("maleToFemale");
  }

  femaleToMale(): VoiceTransform {
    return this.preset("femaleToMale");
  }

  robotVoice(): VoiceTransform {
    return this.preset("robotVoice");
  }
}
