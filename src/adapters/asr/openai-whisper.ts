/**
 * OpenAI Whisper API ASR adapter.
 * Confidence is the mean segment probability, exp(avg_logprob), from the verbose response.
 */

import OpenAI, { toFile } from "openai";
import { z } from "zod";
import type { AudioData } from "../../audio/types";
import type { IASR, TranscribeOptions, TranscriptResult } from "./types";

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
}

const verboseTranscriptionSchema = z.object({
  text: z.string().default(""),
  language: z.string().optional(),
  segments: z.array(z.object({ avg_logprob: z.number() })).optional(),
});

export function confidenceFromSegments(text: string, segments?: Array<{ avg_logprob: number }>): number {
  if (!segments || segments.length === 0) return text.trim() ? 1 : 0;
  const mean = segments.reduce((sum, s) => sum + Math.exp(s.avg_logprob), 0) / segments.length;
  return Math.min(1, Math.max(0, mean));
}

export class OpenAIWhisperASR implements IASR {
  private client: OpenAI;

  constructor(private readonly config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async transcribe(audio: AudioData, options?: TranscribeOptions): Promise<TranscriptResult> {
    const ext = audio.format === "pcm" ? "wav" : audio.format;
    const language = options?.language;
    const transcription = await this.client.audio.transcriptions.create({
      file: await toFile(audio.bytes, `audio.${ext}`),
      model: this.config.model ?? "whisper-1",
      response_format: "verbose_json",
      // Whisper takes ISO-639-1 ("en"), not a locale ("en-US").
      language: language ? language.split("-")[0] : undefined,
    });
    const result = verboseTranscriptionSchema.parse(transcription);
    return {
      text: result.text,
      confidence: confidenceFromSegments(result.text, result.segments),
      language: language ?? result.language ?? "en",
    };
  }
}
