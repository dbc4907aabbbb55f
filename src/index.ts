/**
 * Public API.
 */

export { VoiceCustomizationEngine, createEngine } from "./engine";
export type {
  ApplyProfileOptions,
  BackendSet,
  CreateVoiceOptions,
  EngineDependencies,
  ProfileChanges,
  SynthesizeOptions,
  TranscribeRequest,
} from "./engine";

export * from "./errors";
export * from "./effects";
export { EmotionEngine } from "./emotion/engine";
export type { EmotionModifiers, EmotionResult, ProfileFinals } from "./emotion/engine";
export { DEFAULT_EMOTIONS, createEmotionRegistry } from "./emotion/table";
export type { EmotionBaseline, EmotionRegistry } from "./emotion/table";

export {
  AGE_RANGES,
  DEFAULT_PROFILE_FIELDS,
  GENDERS,
  PITCH_RANGE,
  SPEED_RANGE,
  TIMBRE_RANGE,
  VOLUME_RANGE,
  toDraft,
  toSummary,
} from "./profiles/types";
export type { AgeRange, Gender, ProfileDraft, ProfileOverrides, ProfileSummary, VoiceProfile } from "./profiles/types";
export { assertValidProfile, buildProfile, validateProfile } from "./profiles/validation";
export type { ProfileIdentity, ProfileValidationResult, ValidateOptions } from "./profiles/validation";
export { DEFAULT_PRESETS, createPresetRegistry } from "./profiles/presets";
export type { PresetFields, PresetRegistry } from "./profiles/presets";
export { FileProfileStore, InMemoryProfileStore, createProfileStore } from "./profiles/storage";
export type { IProfileStore, SaveResult } from "./profiles/storage";

export { VoiceTransformComponent } from "./transform/component";
export type { Prosody } from "./transform/component";
export { NEUTRAL_TRANSFORM, TRANSFORM_PRESETS, createTransform } from "./transform/types";
export type { TransformPresetName, VoiceTransform } from "./transform/types";

export { normalizeText } from "./text/normalizer";
export type { NormalizeOptions, NormalizedText } from "./text/normalizer";

export { createAudioData } from "./audio/types";
export type { AudioData } from "./audio/types";
export { AudioFileLoader, AudioFileWriter, LOADABLE_FORMATS, WRITABLE_FORMATS } from "./audio/file-io";
export type { WriteResult } from "./audio/file-io";

export { StubTTS, GoogleCloudTTS, GoogleCloudTTSADC, AzureTTS, createTTSEngines } from "./adapters/tts";
export type { ITTS, VoiceOptions } from "./adapters/tts";
export { StubASR, OpenAIWhisperASR, createASREngines } from "./adapters/asr";
export type { IASR, TranscribeOptions, TranscriptResult } from "./adapters/asr";

export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export { createLogger, logger } from "./logging";
export { getLastBackendMetrics, getLastRenderMetrics } from "./metrics";
export type { BackendMetrics, RenderMetrics } from "./metrics";
