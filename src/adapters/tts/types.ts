/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (e.g. Google Cloud, Azure, stub).
 */

import type { AudioData } from "../../audio/types";

export interface VoiceOptions {
  /** Voice name or id (provider-specific). */
  voiceName?: string;
  /** Language code (e.g. en-US). */
  languageCode?: string;
  /** Sample rate in Hz. */
  sampleRateHz?: number;
  /** Speaking rate multiplier (1.0 = normal). */
  speakingRate?: number;
}

/**
 * TTS adapter interface: text in, audio out.
 * Failures are thrown as-is; the engine wraps them in BackendError.
 */
export interface ITTS {
  synthesize(text: string, options?: VoiceOptions): Promise<AudioData>;
}
