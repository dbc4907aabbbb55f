export { VoiceCustomizationEngine } from "./engine";
export { createEngine } from "./factory";
export type {
  ApplyProfileOptions,
  BackendSet,
  CreateVoiceOptions,
  EngineDependencies,
  ProfileChanges,
  SynthesizeOptions,
  TranscribeRequest,
} from "./types";
