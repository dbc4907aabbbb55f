#!/usr/bin/env node
/**
 * Entry point: load config, build the engine and run one command.
 *
 *   presets | emotions | profiles
 *   create <name> [--preset P] [--gender G] [--pitch N] [--speed N] [--volume N] [--age A] [--language L] [--emotion E]
 *   show <profileId> | delete <profileId>
 *   speak <text> [--profile ID] [--emotion E] [--intensity N] [--effects JSON] [--engine E] [--speed N] [--normalize] [--out FILE]
 *   transcribe <file> [--engine E] [--language L]
 *
 * Results, with the backend engine and latency for speak/transcribe, are written to stdout as JSON.
 */

import { parseArgs } from "util";
import { AudioFileLoader, AudioFileWriter } from "./audio/file-io";
import { loadConfig } from "./config";
import { parseEffectChain } from "./effects";
import type { EffectConfig } from "./effects";
import { createEngine } from "./engine";
import type { CreateVoiceOptions } from "./engine";
import { logger, logError } from "./logging";
import { getLastBackendMetrics } from "./metrics";

const USAGE = "Usage: voice-customizer <presets|emotions|profiles|create|show|delete|speak|transcribe> [args]";

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/** Numeric flag; undefined when absent. Non-numeric input becomes NaN and fails validation downstream. */
function num(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function required(value: string | undefined, what: string): string {
  if (!value) throw new Error(`Missing ${what}. ${USAGE}`);
  return value;
}

function effectsFlag(value: string | undefined): EffectConfig[] | undefined {
  return value === undefined ? undefined : parseEffectChain(JSON.parse(value));
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      preset: { type: "string" },
      gender: { type: "string" },
      pitch: { type: "string" },
      speed: { type: "string" },
      normalize: { type: "boolean", default: false },
      volume: { type: "string" },
      age: { type: "string" },
      language: { type: "string" },
      profile: { type: "string" },
      emotion: { type: "string" },
      intensity: { type: "string" },
      effects: { type: "string" },
      engine: { type: "string" },
      out: { type: "string" },
      overwrite: { type: "boolean", default: false },
    },
  });
  const [command, arg] = positionals;
  const config = loadConfig();
  const engine = createEngine(config);

  switch (command) {
    case "presets":
      print(engine.getPresetList());
      return;
    case "emotions":
      print(engine.listEmotions());
      return;
    case "profiles":
      print(await engine.getSavedProfiles());
      return;
    case "create": {
      const options: CreateVoiceOptions = {
        basePreset: values.preset,
        gender: values.gender,
        pitch: num(values.pitch),
        speed: num(values.speed),
        volume: num(values.volume),
        ageRange: values.age,
        language: values.language,
        emotionDefault: values.emotion,
      };
      print(await engine.createCustomVoice(required(arg, "profile name"), options));
      return;
    }
    case "show":
      print(await engine.loadSavedProfile(required(arg, "profile id")));
      return;
    case "delete":
      print({ deleted: await engine.deleteSavedProfile(required(arg, "profile id")) });
      return;
    case "speak": {
      const profile = values.profile ? await engine.loadSavedProfile(values.profile) : undefined;
      const audio = await engine.synthesize(required(arg, "text"), {
        engine: values.engine,
        profile,
        emotion: values.emotion,
        emotionIntensity: num(values.intensity),
        effects: effectsFlag(values.effects),
        language: values.language,
        speed: num(values.speed),
        normalize: values.normalize ? {} : undefined,
      });
      const { ttsEngine, ttsLatencyMs } = getLastBackendMetrics();
      if (values.out) {
        const writer = new AudioFileWriter(config.storage.audioOutputDir);
        print({ ...(await writer.write(audio, values.out, values.overwrite)), ttsEngine, ttsLatencyMs });
      } else {
        print({
          format: audio.format,
          sampleRate: audio.sampleRate,
          duration: audio.duration,
          bytes: audio.bytes.length,
          ttsEngine,
          ttsLatencyMs,
        });
      }
      return;
    }
    case "transcribe": {
      const audio = await new AudioFileLoader().load(required(arg, "audio file"));
      const result = await engine.transcribe(audio, { engine: values.engine, language: values.language });
      const { asrEngine, asrLatencyMs } = getLastBackendMetrics();
      print({ ...result, asrEngine, asrLatencyMs });
      return;
    }
    default:
      throw new Error(USAGE);
  }
}

main().catch((err) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)));
  process.exitCode = 1;
});
