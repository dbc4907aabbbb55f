/**
 * TTS adapter factory: builds the engines named in config, keyed by engine name.
 * "stub" is always registered.
 */

import type { AppConfig } from "../../config";
import type { ITTS } from "./types";
import { StubTTS } from "./stub";
import { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
import { AzureTTS } from "./azure";

export type { ITTS, VoiceOptions } from "./types";
export { StubTTS } from "./stub";
export { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
export { AzureTTS, buildSsml } from "./azure";

export function createTTSEngines(config: AppConfig): Map<string, ITTS> {
  const { provider, googleApiKey, googleVoiceName, azureKey, azureRegion, azureVoiceName } = config.tts;
  const languageCode = config.voice.language;
  const engines = new Map<string, ITTS>([["stub", new StubTTS()]]);
  if (googleApiKey) {
    engines.set("google", new GoogleCloudTTS({ apiKey: googleApiKey, voiceName: googleVoiceName, languageCode }));
  } else if (provider === "google") {
    engines.set("google", new GoogleCloudTTSADC({ voiceName: googleVoiceName, languageCode }));
  }
  if (azureKey && azureRegion) {
    engines.set("azure", new AzureTTS({ key: azureKey, region: azureRegion, voiceName: azureVoiceName }));
  }
  return engines;
}

/** Default engine name: the configured provider when it could be built, else "stub". */
export function defaultTTSEngine(config: AppConfig, engines: ReadonlyMap<string, ITTS>): string {
  return engines.has(config.tts.provider) ? config.tts.provider : "stub";
}
