/**
 * Builds an engine from AppConfig: profile store, TTS/ASR engine maps and defaults.
 */

import { createASREngines, defaultASREngine } from "../adapters/asr";
import { createTTSEngines, defaultTTSEngine } from "../adapters/tts";
import type { AppConfig } from "../config";
import { createProfileStore } from "../profiles/storage";
import { VoiceCustomizationEngine } from "./engine";

export function createEngine(config: AppConfig): VoiceCustomizationEngine {
  const ttsEngines = createTTSEngines(config);
  const asrEngines = createASREngines(config);
  return new VoiceCustomizationEngine({
    store: createProfileStore(config),
    tts: { engines: ttsEngines, defaultEngine: defaultTTSEngine(config, ttsEngines) },
    asr: { engines: asrEngines, defaultEngine: defaultASREngine(config, asrEngines) },
    defaults: { language: config.voice.language, sampleRateHz: config.voice.sampleRateHz },
  });
}
