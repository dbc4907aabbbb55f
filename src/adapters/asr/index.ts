/**
 * ASR adapter factory: builds the engines named in config, keyed by engine name.
 * "stub" is always registered.
 */

import type { AppConfig } from "../../config";
import type { IASR } from "./types";
import { StubASR } from "./stub";
import { OpenAIWhisperASR } from "./openai-whisper";

export type { IASR, TranscribeOptions, TranscriptResult } from "./types";
export { StubASR } from "./stub";
export { OpenAIWhisperASR, confidenceFromSegments } from "./openai-whisper";

export function createASREngines(config: AppConfig): Map<string, IASR> {
  const engines = new Map<string, IASR>([["stub", new StubASR()]]);
  if (config.asr.openaiApiKey) {
    engines.set("openai", new OpenAIWhisperASR({ apiKey: config.asr.openaiApiKey }));
  }
  return engines;
}

/** Default engine name: the configured provider when it could be built, else "stub". */
export function defaultASREngine(config: AppConfig, engines: ReadonlyMap<string, IASR>): string {
  return engines.has(config.asr.provider) ? config.asr.provider : "stub";
}
