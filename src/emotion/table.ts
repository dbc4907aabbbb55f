/**
 * Emotion-to-prosody baselines at full intensity.
 * `neutral` is the identity entry.
 */

export interface EmotionBaseline {
  /** Additive pitch change in semitones. */
  pitchDelta: number;
  speedMultiplier: number;
  volumeMultiplier: number;
  /** Pitch contour spread relative to neutral speech. */
  pitchVariance: number;
}

export const DEFAULT_EMOTIONS: Readonly<Record<string, EmotionBaseline>> = {
  neutral: { pitchDelta: 0.0, speedMultiplier: 1.0, volumeMultiplier: 1.0, pitchVariance: 1.0 },
  happy: { pitchDelta: 2.0, speedMultiplier: 1.1, volumeMultiplier: 1.05, pitchVariance: 1.3 },
  sad: { pitchDelta: -1.5, speedMultiplier: 0.85, volumeMultiplier: 0.9, pitchVariance: 0.7 },
  angry: { pitchDelta: 1.0, speedMultiplier: 1.2, volumeMultiplier: 1.2, pitchVariance: 1.5 },
  excited: { pitchDelta: 3.0, speedMultiplier: 1.3, volumeMultiplier: 1.1, pitchVariance: 1.6 },
  calm: { pitchDelta: 0.0, speedMultiplier: 0.9, volumeMultiplier: 0.95, pitchVariance: 0.5 },
  fearful: { pitchDelta: 2.5, speedMultiplier: 1.15, volumeMultiplier: 0.85, pitchVariance: 1.4 },
  confident: { pitchDelta: -0.5, speedMultiplier: 0.95, volumeMultiplier: 1.1, pitchVariance: 0.8 },
};

export interface EmotionRegistry {
  readonly names: readonly string[];
  get(emotion: string): EmotionBaseline | undefined;
}

export function createEmotionRegistry(
  emotions: Readonly<Record<string, EmotionBaseline>> = DEFAULT_EMOTIONS
): EmotionRegistry {
  const entries = new Map<string, EmotionBaseline>();
  for (const [name, baseline] of Object.entries(emotions)) {
    entries.set(name, Object.freeze({ ...baseline }));
  }
  const names = Object.freeze([...entries.keys()]);
  return Object.freeze({
    names,
    get: (emotion: string) => entries.get(emotion),
  });
}
