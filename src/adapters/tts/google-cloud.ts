/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (env GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 * LINEAR16 responses carry a WAV header, which gives sample rate and duration.
 */

import { TextToSpeechClient, protos } from "@google-cloud/text-to-speech";
import { z } from "zod";
import type { AudioData } from "../../audio/types";
import { createAudioData } from "../../audio/types";
import { pcmDuration, readWavInfo } from "../../audio/wav";
import type { ITTS, VoiceOptions } from "./types";

type AudioConfig = protos.google.cloud.texttospeech.v1.IAudioConfig;

export interface GoogleCloudTTSConfig {
  apiKey: string;
  voiceName?: string;
  languageCode?: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";
const DEFAULT_VOICE = "en-US-Neural2-D";
const DEFAULT_SAMPLE_RATE = 24000;

const synthesizeResponseSchema = z.object({ audioContent: z.string().optional() });

function buildAudioConfig(options: VoiceOptions | undefined): AudioConfig {
  const audioConfig: AudioConfig = {
    audioEncoding: "LINEAR16",
    sampleRateHertz: options?.sampleRateHz ?? DEFAULT_SAMPLE_RATE,
  };
  if (options?.speakingRate != null) audioConfig.speakingRate = options.speakingRate;
  return audioConfig;
}

function toAudioData(bytes: Buffer, requestedRate: number): AudioData {
  const wav = readWavInfo(bytes);
  if (wav) return createAudioData(bytes, "wav", wav.sampleRate, wav.duration);
  return createAudioData(bytes, "pcm", requestedRate, pcmDuration(bytes.length, requestedRate));
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<AudioData> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? DEFAULT_VOICE;
    const languageCode = options?.languageCode ?? this.config.languageCode ?? "en-US";
    const audioConfig = buildAudioConfig(options);
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ input: { text }, voice: { name: voiceName, languageCode }, audioConfig }),
    });
    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`Google TTS failed: ${response.status} ${errText}`);
    }
    const data = synthesizeResponseSchema.parse(await response.json());
    if (!data.audioContent) throw new Error("Google TTS returned no audio");
    return toAudioData(Buffer.from(data.audioContent, "base64"), audioConfig.sampleRateHertz ?? DEFAULT_SAMPLE_RATE);
  }
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export interface GoogleCloudTTSADCConfig {
  voiceName?: string;
  languageCode?: string;
}

export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;

  constructor(private readonly config: GoogleCloudTTSADCConfig = {}) {
    this.client = new TextToSpeechClient();
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<AudioData> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? DEFAULT_VOICE;
    const languageCode = options?.languageCode ?? this.config.languageCode ?? "en-US";
    const audioConfig = buildAudioConfig(options);
    const [response] = await this.client.synthesizeSpeech({
      input: { text },
      voice: { name: voiceName, languageCode },
      audioConfig,
    });
    const content = response.audioContent;
    if (!content || !(content instanceof Uint8Array)) throw new Error("Google TTS returned no audio");
    return toAudioData(Buffer.from(content), audioConfig.sampleRateHertz ?? DEFAULT_SAMPLE_RATE);
  }
}
