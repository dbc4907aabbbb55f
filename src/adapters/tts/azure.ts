/**
 * Azure Cognitive Services Text-to-Speech adapter (optional).
 * Uses REST API with subscription key; a speaking rate becomes an SSML <prosody rate> element.
 */

import type { AudioData } from "../../audio/types";
import { createAudioData } from "../../audio/types";
import { pcmDuration, readWavInfo } from "../../audio/wav";
import type { ITTS, VoiceOptions } from "./types";

export interface AzureTTSConfig {
  key: string;
  region: string;
  voiceName?: string;
}

const OUTPUT_FORMAT = "riff-24khz-16bit-mono-pcm";
const OUTPUT_SAMPLE_RATE = 24000;

function percent(multiplier: number): string {
  const pct = (multiplier - 1) * 100;
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(2)}%`;
}

export function buildSsml(text: string, voiceName: string, languageCode: string, options?: VoiceOptions): string {
  const rate = options?.speakingRate;
  const body = rate != null ? `<prosody rate='${percent(rate)}'>${escapeXml(text)}</prosody>` : escapeXml(text);
  return `<speak version='1.0' xml:lang='${languageCode}'><voice name='${voiceName}'>${body}</voice></speak>`;
}

export class AzureTTS implements ITTS {
  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<AudioData> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "en-US-JennyNeural";
    const languageCode = options?.languageCode ?? "en-US";
    const url = `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": OUTPUT_FORMAT,
      },
      body: buildSsml(text, voiceName, languageCode, options),
    });
    if (!response.ok) throw new Error(`Azure TTS failed: ${response.status} ${response.statusText}`);
    const bytes = Buffer.from(await response.arrayBuffer());
    const wav = readWavInfo(bytes);
    if (wav) return createAudioData(bytes, "wav", wav.sampleRate, wav.duration);
    return createAudioData(bytes, "pcm", OUTPUT_SAMPLE_RATE, pcmDuration(bytes.length, OUTPUT_SAMPLE_RATE));
  }
}

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
