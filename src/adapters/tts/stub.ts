/**
 * Stub TTS adapter for testing or when no provider is configured.
 * Returns a silent WAV whose length follows the text: ~150 characters per second at speaking rate 1.0.
 */

import type { AudioData } from "../../audio/types";
import { createAudioData } from "../../audio/types";
import { pcmToWav } from "../../audio/wav";
import type { ITTS, VoiceOptions } from "./types";

const CHARS_PER_SECOND = 150;
const DEFAULT_SAMPLE_RATE = 24000;

export class StubTTS implements ITTS {
  async synthesize(text: string, options?: VoiceOptions): Promise<AudioData> {
    const sampleRate = options?.sampleRateHz ?? DEFAULT_SAMPLE_RATE;
    const rate = options?.speakingRate ?? 1.0;
    const samples = Math.max(1, Math.round((text.length / (CHARS_PER_SECOND * rate)) * sampleRate));
    const wav = pcmToWav(Buffer.alloc(samples * 2), sampleRate);
    return createAudioData(wav, "wav", sampleRate, samples / sampleRate);
  }
}
