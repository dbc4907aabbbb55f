/**
 * Emotion engine: scales an emotion's baseline by intensity and, optionally, applies it to a profile.
 *
 * Intensity interpolates from "no emotion" to the full baseline:
 *   pitch (additive)              -> toward 0
 *   speed/volume/variance (ratio) -> toward 1.0
 * Finals are not clamped to profile ranges.
 */

import { ParameterRangeError, UnknownEmotionError } from "../errors";
import { logger } from "../logging";
import type { VoiceProfile } from "../profiles/types";
import type { EmotionRegistry } from "./table";
import { createEmotionRegistry } from "./table";

export interface EmotionModifiers {
  emotion: string;
  intensity: number;
  pitchShift: number;
  speedMultiplier: number;
  volumeMultiplier: number;
  pitchVariance: number;
}

export interface ProfileFinals {
  finalPitch: number;
  finalSpeed: number;
  finalVolume: number;
}

export type EmotionResult = EmotionModifiers & Partial<ProfileFinals>;

export class EmotionEngine {
  constructor(private readonly registry: EmotionRegistry = createEmotionRegistry()) {}

  applyEmotion(emotion: string, intensity: number): EmotionModifiers;
  applyEmotion(emotion: string, intensity: number, baseProfile: VoiceProfile): EmotionModifiers & ProfileFinals;
  applyEmotion(emotion: string, intensity?: number, baseProfile?: VoiceProfile): EmotionResult;
  applyEmotion(emotion: string, intensity = 1.0, baseProfile?: VoiceProfile): EmotionResult {
    const baseline = this.registry.get(emotion);
    if (!baseline) throw new UnknownEmotionError(emotion, this.registry.names);
    if (!(intensity >= 0 && intensity <= 1)) {
      throw new ParameterRangeError([{ field: "intensity", allowed: "within [0, 1]", value: intensity }]);
    }

    const modifiers: EmotionModifiers = {
      emotion,
      intensity,
      pitchShift: baseline.pitchDelta * intensity,
      speedMultiplier: 1.0 + (baseline.speedMultiplier - 1.0) * intensity,
      volumeMultiplier: 1.0 + (baseline.volumeMultiplier - 1.0) * intensity,
      pitchVariance: 1.0 + (baseline.pitchVariance - 1.0) * intensity,
    };
    logger.debug({ event: "EMOTION_APPLIED", emotion, intensity }, "Emotion modifiers computed");
    if (!baseProfile) return modifiers;

    return {
      ...modifiers,
      finalPitch: baseProfile.pitch + modifiers.pitchShift,
      finalSpeed: baseProfile.speed * modifiers.speedMultiplier,
      finalVolume: baseProfile.volume * modifiers.volumeMultiplier,
    };
  }

  listEmotions(): readonly string[] {
    return this.registry.names;
  }
}
