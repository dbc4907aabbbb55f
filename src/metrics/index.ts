/**
 * Render and backend metrics.
 * Per-stage latencies are logged as they are recorded; the last values can be read back.
 */

import { logger } from "../logging";

/** Last render timing (ms) and shape. */
export interface RenderMetrics {
  profileId?: string;
  emotion?: string;
  emotionMs?: number;
  prosodyMs?: number;
  effectsMs?: number;
  effectCount?: number;
  totalMs?: number;
  inputBytes?: number;
  outputBytes?: number;
}

/** Last backend call timing (ms). */
export interface BackendMetrics {
  ttsLatencyMs?: number;
  asrLatencyMs?: number;
  ttsEngine?: string;
  asrEngine?: string;
}

let lastRenderMetrics: RenderMetrics = {};
let lastBackendMetrics: BackendMetrics = {};

export function recordRenderMetrics(metrics: RenderMetrics): void {
  lastRenderMetrics = { ...metrics };
  logger.info(
    {
      event: "RENDER_METRICS",
      profile_id: metrics.profileId,
      emotion: metrics.emotion,
      emotion_ms: metrics.emotionMs,
      prosody_ms: metrics.prosodyMs,
      effects_ms: metrics.effectsMs,
      effect_count: metrics.effectCount,
      total_ms: metrics.totalMs,
      input_bytes: metrics.inputBytes,
      output_bytes: metrics.outputBytes,
    },
    "Render latency"
  );
}

export function recordBackendMetrics(metrics: BackendMetrics): void {
  lastBackendMetrics = { ...lastBackendMetrics, ...metrics };
}

export function getLastRenderMetrics(): RenderMetrics {
  return { ...lastRenderMetrics };
}

export function getLastBackendMetrics(): BackendMetrics {
  return { ...lastBackendMetrics };
}

/** Milliseconds since `start` (from performance.now()), rounded to 0.01. */
export function elapsedMs(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}
