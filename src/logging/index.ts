/**
 * Structured logging for voice customization.
 * Logs profile lifecycle, render stages, backend calls and errors with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info)
 *   LOG_FILE   - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function parseLevel(raw: string | undefined): LogLevel {
  const v = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? "info";
}

const defaultConfig: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL),
  // Jest sets NODE_ENV=test; the pretty transport runs in a worker thread we do not want there.
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

export type ProfileEvent = "created" | "updated" | "saved" | "loaded" | "deleted";

/** Log a profile lifecycle event (ids and names only, never custom params). */
export function logProfileEvent(log: pino.Logger, event: ProfileEvent, profileId: string, name?: string): void {
  log.info({ event: "PROFILE", phase: event, profileId, name }, `Profile ${event}`);
}

/** Log one completed render stage (prosody, transform, effects). */
export function logRender(log: pino.Logger, stage: string, outputBytes: number, durationMs?: number): void {
  log.debug({ event: "RENDER_STAGE", stage, outputBytes, durationMs }, "Render stage completed");
}

/** Log TTS / ASR backend call. */
export function logBackendCall(
  log: pino.Logger,
  backend: "tts" | "asr",
  engine: string,
  payloadBytes: number,
  durationMs?: number
): void {
  log.info({ event: "BACKEND_CALL", backend, engine, payloadBytes, durationMs }, `${backend.toUpperCase()} completed`);
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, name: err.name, stack: err.stack, ...context }, "Error");
}
