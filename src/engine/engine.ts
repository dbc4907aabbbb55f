/**
 * VoiceCustomizationEngine: creates and persists profiles, and renders audio through
 * emotion -> prosody -> effect chain, in that order.
 *
 * Rendering is synchronous and pure; storage and TTS/ASR calls are awaited once, never retried.
 * Failures surface unchanged (storage and backend failures as BackendError); nothing partial is returned.
 */

import { randomUUID } from "crypto";
import type { IASR, TranscriptResult } from "../adapters/asr";
import { StubASR } from "../adapters/asr";
import type { ITTS } from "../adapters/tts";
import { StubTTS } from "../adapters/tts";
import type { AudioData } from "../audio/types";
import { AudioEffects } from "../effects";
import type { EffectConfig } from "../effects";
import { EmotionEngine } from "../emotion/engine";
import type { EmotionRegistry } from "../emotion/table";
import { createEmotionRegistry } from "../emotion/table";
import type { BackendKind } from "../errors";
import { BackendError, ParameterRangeError, UnknownPresetError, VoiceError } from "../errors";
import { logBackendCall, logError, logProfileEvent, logRender, logger } from "../logging";
import { elapsedMs, recordBackendMetrics, recordRenderMetrics } from "../metrics";
import type { PresetFields, PresetRegistry } from "../profiles/presets";
import { createPresetRegistry } from "../profiles/presets";
import type { IProfileStore } from "../profiles/storage";
import type { ProfileDraft, ProfileOverrides, ProfileSummary, VoiceProfile } from "../profiles/types";
import { DEFAULT_PROFILE_FIELDS, toDraft } from "../profiles/types";
import { assertValidProfile, buildProfile } from "../profiles/validation";
import { normalizeText } from "../text/normalizer";
import type { Prosody } from "../transform/component";
import { VoiceTransformComponent } from "../transform/component";
import type {
  ApplyProfileOptions,
  BackendSet,
  CreateVoiceOptions,
  EngineDependencies,
  ProfileChanges,
  SynthesizeOptions,
  TranscribeRequest,
} from "./types";

const MAX_TEXT_LENGTH = 5000;

/** Base fields with every override that is present replacing the base value. Name is set separately. */
function mergeOverrides(name: string, base: Omit<ProfileDraft, "name">, o: ProfileOverrides): ProfileDraft {
  return {
    name,
    gender: o.gender ?? base.gender,
    pitch: o.pitch ?? base.pitch,
    speed: o.speed ?? base.speed,
    volume: o.volume ?? base.volume,
    timbre: { ...(o.timbre ?? base.timbre) },
    language: o.language ?? base.language,
    accent: o.accent ?? base.accent,
    ageRange: o.ageRange ?? base.ageRange,
    emotionDefault: o.emotionDefault ?? base.emotionDefault,
    customParams: { ...(o.customParams ?? base.customParams) },
  };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class VoiceCustomizationEngine {
  readonly effects: AudioEffects;
  readonly transformer = new VoiceTransformComponent();
  readonly emotionEngine: EmotionEngine;

  private readonly store: IProfileStore;
  private readonly storeName: string;
  private readonly presets: PresetRegistry;
  private readonly emotions: EmotionRegistry;
  private readonly tts: BackendSet<ITTS>;
  private readonly asr: BackendSet<IASR>;
  private readonly language: string;
  private readonly sampleRateHz: number | undefined;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(deps: EngineDependencies) {
    this.store = deps.store;
    this.storeName = deps.store.constructor.name;
    this.presets = deps.presets ?? createPresetRegistry();
    this.emotions = deps.emotions ?? createEmotionRegistry();
    this.emotionEngine = new EmotionEngine(this.emotions);
    this.effects = new AudioEffects(deps.effectRenderer);
    this.tts = deps.tts ?? { engines: new Map([["stub", new StubTTS()]]), defaultEngine: "stub" };
    this.asr = deps.asr ?? { engines: new Map([["stub", new StubASR()]]), defaultEngine: "stub" };
    this.language = deps.defaults?.language ?? DEFAULT_PROFILE_FIELDS.language;
    this.sampleRateHz = deps.defaults?.sampleRateHz;
    this.generateId = deps.generateId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  // --- Profiles ---

  /**
   * Create, validate and persist a profile.
   * Fields come from `basePreset` (or the documented defaults) with every given override applied;
   * `name` always comes from the argument. The profile is returned only once it is stored.
   */
  async createCustomVoice(name: string, options: CreateVoiceOptions = {}): Promise<VoiceProfile> {
    const { basePreset, ...overrides } = options;
    try {
      const base = basePreset === undefined ? { ...DEFAULT_PROFILE_FIELDS, language: this.language } : this.getPreset(basePreset);
      const draft = mergeOverrides(name, base, overrides);
      const timestamp = this.now().toISOString();
      const profile = buildProfile(
        { profileId: this.generateId(), createdAt: timestamp, updatedAt: timestamp },
        draft,
        { knownEmotions: this.emotions.names }
      );
      await this.persist(profile);
      logProfileEvent(logger, "created", profile.profileId, profile.name);
      return profile;
    } catch (err) {
      this.reportFailure("createCustomVoice", err, { name, basePreset });
      throw err;
    }
  }

  /** Produce a new validated instance of a stored profile with `changes` applied, and persist it. */
  async updateProfile(profileId: string, changes: ProfileChanges): Promise<VoiceProfile> {
    const { name, ...overrides } = changes;
    try {
      const current = await this.loadFromStore(profileId);
      const draft = mergeOverrides(name ?? current.name, toDraft(current), overrides);
      const profile = buildProfile(
        { profileId: current.profileId, createdAt: current.createdAt, updatedAt: this.now().toISOString() },
        draft,
        { knownEmotions: this.emotions.names }
      );
      await this.persist(profile);
      logProfileEvent(logger, "updated", profile.profileId, profile.name);
      return profile;
    } catch (err) {
      this.reportFailure("updateProfile", err, { profileId });
      throw err;
    }
  }

  async loadSavedProfile(profileId: string): Promise<VoiceProfile> {
    try {
      const profile = await this.loadFromStore(profileId);
      logProfileEvent(logger, "loaded", profileId, profile.name);
      return profile;
    } catch (err) {
      this.reportFailure("loadSavedProfile", err, { profileId });
      throw err;
    }
  }

  async getSavedProfiles(): Promise<ProfileSummary[]> {
    try {
      return await this.store.list();
    } catch (err) {
      throw this.storageFailure(err);
    }
  }

  async deleteSavedProfile(profileId: string): Promise<boolean> {
    let deleted: boolean;
    try {
      deleted = await this.store.delete(profileId);
    } catch (err) {
      throw this.storageFailure(err);
    }
    if (deleted) logProfileEvent(logger, "deleted", profileId);
    return deleted;
  }

  getPresetList(): readonly string[] {
    return this.presets.names;
  }

  getPreset(name: string): PresetFields {
    const preset = this.presets.get(name);
    if (!preset) throw new UnknownPresetError(name, this.presets.names);
    return preset;
  }

  listEmotions(): readonly string[] {
    return this.emotionEngine.listEmotions();
  }

  // --- Rendering ---

  /**
   * Render `audio` with a profile: (1) emotion modifiers on top of the profile, or the profile's own
   * pitch/speed/volume; (2) prosody; (3) effects in list order. The input is never mutated.
   */
  applyVoiceProfile(audio: AudioData, profile: VoiceProfile, options: ApplyProfileOptions = {}): AudioData {
    try {
      assertValidProfile(toDraft(profile));

      const start = performance.now();
      let prosody: Prosody = { pitch: profile.pitch, speed: profile.speed, volume: profile.volume };
      if (options.emotion !== undefined) {
        const m = this.emotionEngine.applyEmotion(options.emotion, options.emotionIntensity ?? 1.0, profile);
        prosody = { pitch: m.finalPitch, speed: m.finalSpeed, volume: m.finalVolume };
      }
      const emotionMs = elapsedMs(start);
      return this.render(audio, prosody, options.effects ?? [], {
        profileId: profile.profileId,
        emotion: options.emotion,
        emotionMs,
        start,
      });
    } catch (err) {
      this.reportFailure("applyVoiceProfile", err, { profileId: profile.profileId, emotion: options.emotion });
      throw err;
    }
  }

  /**
   * Synthesize text, then render it. With a profile this is applyVoiceProfile on the TTS output;
   * without one, an emotion is applied relative to neutral prosody.
   * The request (text, emotion, effects, profile) is checked before the backend is called.
   */
  async synthesize(text: string, options: SynthesizeOptions = {}): Promise<AudioData> {
    const engineName = options.engine ?? this.tts.defaultEngine;
    let input = text;
    let tts: ITTS;
    try {
      if (options.normalize) input = normalizeText(text, options.normalize).text;
      if (!input.trim() || input.length > MAX_TEXT_LENGTH) {
        throw new ParameterRangeError([
          { field: "text", allowed: `non-empty and at most ${MAX_TEXT_LENGTH} characters`, value: `${input.length} characters` },
        ]);
      }
      if (options.speed !== undefined && !(options.speed > 0 && Number.isFinite(options.speed))) {
        throw new ParameterRangeError([{ field: "speed", allowed: "> 0", value: options.speed }]);
      }
      if (options.profile) assertValidProfile(toDraft(options.profile));
      if (options.emotion !== undefined) this.emotionEngine.applyEmotion(options.emotion, options.emotionIntensity ?? 1.0);
      this.effects.checkEffects(options.effects ?? []);
      tts = this.resolveBackend("tts", this.tts, engineName);
    } catch (err) {
      this.reportFailure("synthesize", err, { engine: engineName, emotion: options.emotion });
      throw err;
    }

    const profileVoice = options.profile?.customParams.voiceName;
    const start = performance.now();
    let audio: AudioData;
    try {
      audio = await tts.synthesize(input, {
        languageCode: options.language ?? options.profile?.language ?? this.language,
        voiceName: options.voiceName ?? (typeof profileVoice === "string" ? profileVoice : undefined),
        sampleRateHz: this.sampleRateHz,
        speakingRate: options.speed,
      });
    } catch (err) {
      const failure = new BackendError("tts", engineName, err);
      logError(logger, failure, { operation: "synthesize" });
      throw failure;
    }
    const latency = elapsedMs(start);
    logBackendCall(logger, "tts", engineName, audio.bytes.length, latency);
    recordBackendMetrics({ ttsEngine: engineName, ttsLatencyMs: latency });

    if (options.profile) return this.applyVoiceProfile(audio, options.profile, options);
    if (options.emotion === undefined && !options.effects?.length) return audio;

    try {
      const renderStart = performance.now();
      let prosody: Prosody = { pitch: 0, speed: 1, volume: 1 };
      if (options.emotion !== undefined) {
        const m = this.emotionEngine.applyEmotion(options.emotion, options.emotionIntensity ?? 1.0);
        prosody = { pitch: m.pitchShift, speed: m.speedMultiplier, volume: m.volumeMultiplier };
      }
      return this.render(audio, prosody, options.effects ?? [], {
        emotion: options.emotion,
        emotionMs: elapsedMs(renderStart),
        start: renderStart,
      });
    } catch (err) {
      this.reportFailure("synthesize", err, { engine: engineName, emotion: options.emotion });
      throw err;
    }
  }

  async transcribe(audio: AudioData, request: TranscribeRequest = {}): Promise<TranscriptResult> {
    const engineName = request.engine ?? this.asr.defaultEngine;
    const asr = this.resolveBackend("asr", this.asr, engineName);
    const start = performance.now();
    let result: TranscriptResult;
    try {
      result = await asr.transcribe(audio, { language: request.language ?? this.language });
    } catch (err) {
      const failure = new BackendError("asr", engineName, err);
      logError(logger, failure, { operation: "transcribe" });
      throw failure;
    }
    const latency = elapsedMs(start);
    logBackendCall(logger, "asr", engineName, audio.bytes.length, latency);
    recordBackendMetrics({ asrEngine: engineName, asrLatencyMs: latency });
    return result;
  }

  // --- Internals ---

  private render(
    audio: AudioData,
    prosody: Prosody,
    effects: readonly EffectConfig[],
    context: { profileId?: string; emotion?: string; emotionMs?: number; start: number }
  ): AudioData {
    const prosodyStart = performance.now();
    let out = this.transformer.applyProsody(audio, prosody);
    const prosodyMs = elapsedMs(prosodyStart);
    logRender(logger, "prosody", out.bytes.length, prosodyMs);

    const effectsStart = performance.now();
    out = this.effects.applyEffects(out, effects);
    const effectsMs = elapsedMs(effectsStart);
    if (effects.length > 0) logRender(logger, "effects", out.bytes.length, effectsMs);

    recordRenderMetrics({
      profileId: context.profileId,
      emotion: context.emotion,
      emotionMs: context.emotionMs,
      prosodyMs,
      effectsMs,
      effectCount: effects.length,
      totalMs: elapsedMs(context.start),
      inputBytes: audio.bytes.length,
      outputBytes: out.bytes.length,
    });
    return out;
  }

  private resolveBackend<T>(kind: BackendKind, set: BackendSet<T>, engineName: string): T {
    const backend = set.engines.get(engineName);
    if (!backend) {
      throw new BackendError(
        kind,
        engineName,
        new Error(`Unknown ${kind} engine (available: ${[...set.engines.keys()].join(", ")})`)
      );
    }
    return backend;
  }

  /** Save is an explicit step of creation; a profile is not created until this resolves. */
  private async persist(profile: VoiceProfile): Promise<void> {
    try {
      const { location } = await this.store.save(profile);
      logProfileEvent(logger, "saved", profile.profileId, profile.name);
      logger.debug({ event: "PROFILE_LOCATION", profileId: profile.profileId, location }, "Profile stored");
    } catch (err) {
      throw this.storageFailure(err);
    }
  }

  private async loadFromStore(profileId: string): Promise<VoiceProfile> {
    try {
      return await this.store.load(profileId);
    } catch (err) {
      throw this.storageFailure(err);
    }
  }

  /** Domain errors (not found, invalid) pass through; anything else is a storage backend failure. */
  private storageFailure(err: unknown): VoiceError {
    if (err instanceof VoiceError) return err;
    return new BackendError("storage", this.storeName, err);
  }

  private reportFailure(operation: string, err: unknown, context: Record<string, unknown>): void {
    if (err instanceof VoiceError && err.code !== "BACKEND_FAILED") {
      logger.warn({ event: "REQUEST_REJECTED", operation, code: err.code, err: err.message, ...context }, "Request rejected");
      return;
    }
    logError(logger, toError(err), { operation, ...context });
  }
}
