/**
 * ASR (Automatic Speech Recognition) adapter types.
 * Implementations can be swapped via config (e.g. OpenAI Whisper, stub).
 */

import type { AudioData } from "../../audio/types";

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** 0..1 */
  confidence: number;
  /** Language code the text is in. */
  language: string;
}

export interface TranscribeOptions {
  /** Expected language (e.g. en-US); providers may use it as a hint. */
  language?: string;
}

/**
 * ASR adapter interface: audio in, transcript out.
 * Failures are thrown as-is; the engine wraps them in BackendError.
 */
export interface IASR {
  transcribe(audio: AudioData, options?: TranscribeOptions): Promise<TranscriptResult>;
}
