/**
 * Audio file loader and writer.
 * Writer confines every target to its base directory; loader reads any readable path.
 */

import * as fs from "fs";
import * as path from "path";
import { AlreadyExistsError, FormatError, NotFoundError, ParameterRangeError, SecurityError } from "../errors";
import { logger, logError } from "../logging";
import type { AudioData } from "./types";
import { createAudioData } from "./types";
import { readWavInfo } from "./wav";

export const LOADABLE_FORMATS = ["wav", "mp3", "flac", "ogg", "m4a"] as const;
export const WRITABLE_FORMATS = ["wav", "mp3", "flac", "ogg"] as const;

/** Fallback when the container header is not parsed: 44.1 kHz, 16-bit stereo. */
const FALLBACK_SAMPLE_RATE = 44100;
const FALLBACK_BYTES_PER_SECOND = FALLBACK_SAMPLE_RATE * 2 * 2;

function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export class AudioFileLoader {
  async load(filePath: string): Promise<AudioData> {
    const resolved = path.resolve(filePath);
    const ext = extensionOf(resolved);
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(resolved);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") throw new NotFoundError("file", resolved);
      logError(logger, err instanceof Error ? err : new Error(String(err)), { filePath: resolved });
      throw err;
    }
    if (!LOADABLE_FORMATS.some((f) => f === ext)) {
      throw new FormatError(ext || "(none)", LOADABLE_FORMATS);
    }
    const wav = ext === "wav" ? readWavInfo(bytes) : null;
    const sampleRate = wav?.sampleRate ?? FALLBACK_SAMPLE_RATE;
    const duration = wav?.duration ?? bytes.length / FALLBACK_BYTES_PER_SECOND;
    let audio: AudioData;
    try {
      audio = createAudioData(bytes, ext, sampleRate, duration);
    } catch (err) {
      if (err instanceof ParameterRangeError) throw new FormatError(ext, LOADABLE_FORMATS, err.message);
      throw err;
    }
    logger.debug({ event: "FILE_LOADED", filePath: resolved, fileSize: bytes.length, format: ext }, "Audio file loaded");
    return audio;
  }
}

export interface WriteResult {
  filePath: string;
  fileSize: number;
}

export class AudioFileWriter {
  readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  /**
   * Write audio bytes under the base directory.
   * @param filePath - Relative to the base directory; must not escape it.
   */
  async write(audio: AudioData, filePath: string, overwrite = false): Promise<WriteResult> {
    const target = path.resolve(this.baseDir, filePath);
    if (target !== this.baseDir && !target.startsWith(this.baseDir + path.sep)) {
      throw new SecurityError(filePath);
    }
    const ext = extensionOf(target);
    if (!WRITABLE_FORMATS.some((f) => f === ext)) {
      throw new FormatError(ext || "(none)", WRITABLE_FORMATS);
    }
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    try {
      await fs.promises.writeFile(target, audio.bytes, { flag: overwrite ? "w" : "wx" });
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") throw new AlreadyExistsError(target);
      logError(logger, err instanceof Error ? err : new Error(String(err)), { filePath: target });
      throw err;
    }
    const { size } = await fs.promises.stat(target);
    logger.debug({ event: "FILE_WRITTEN", filePath: target, fileSize: size }, "Audio file written");
    return { filePath: target, fileSize: size };
  }
}
