/**
 * Stub ASR adapter for testing or when no provider is configured.
 * Returns empty transcript.
 */

import type { AudioData } from "../../audio/types";
import type { IASR, TranscribeOptions, TranscriptResult } from "./types";

export class StubASR implements IASR {
  async transcribe(_audio: AudioData, options?: TranscribeOptions): Promise<TranscriptResult> {
    return { text: "", confidence: 0, language: options?.language ?? "en-US" };
  }
}
