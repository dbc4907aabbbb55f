/**
 * Audio buffer passed between synthesis, transforms and effects.
 * Treated as immutable: every stage returns a new instance.
 */

import type { RangeViolation } from "../errors";
import { ParameterRangeError } from "../errors";

export interface AudioData {
  readonly bytes: Buffer;
  /** Container/codec name, e.g. "wav", "mp3". */
  readonly format: string;
  readonly sampleRate: number;
  /** Seconds. */
  readonly duration: number;
}

/** Throws ParameterRangeError unless sampleRate is a positive integer and duration a positive finite number. */
export function createAudioData(bytes: Buffer, format: string, sampleRate: number, duration: number): AudioData {
  const violations: RangeViolation[] = [];
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    violations.push({ field: "sampleRate", allowed: "a positive integer", value: sampleRate });
  }
  if (!Number.isFinite(duration) || duration <= 0) {
    violations.push({ field: "duration", allowed: "> 0 and finite", value: duration });
  }
  if (violations.length > 0) throw new ParameterRangeError(violations);
  return Object.freeze({ bytes, format, sampleRate, duration });
}

/** New instance with a tag prepended to the bytes and, optionally, a new duration. */
export function withTag(audio: AudioData, tag: string, duration: number = audio.duration): AudioData {
  return createAudioData(Buffer.concat([Buffer.from(tag, "utf8"), audio.bytes]), audio.format, audio.sampleRate, duration);
}
