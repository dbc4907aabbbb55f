/**
 * Parameter ranges per effect kind, shared by the builders and the chain's pre-flight check.
 */

import type { RangeViolation } from "../errors";
import { ChainApplicationError, ParameterRangeError } from "../errors";
import type { EffectConfig, EffectKind } from "./types";
import { EFFECT_KINDS, isEffectKind } from "./types";

interface ParamRule {
  param: string;
  allowed: string;
  test(v: number): boolean;
}

const unit = (param: string): ParamRule => ({ param, allowed: "within [0, 1]", test: (v) => v >= 0 && v <= 1 });
const positive = (param: string): ParamRule => ({ param, allowed: "> 0", test: (v) => v > 0 });
const gainDb = (param: string): ParamRule => ({ param, allowed: "within [-12, 12] dB", test: (v) => v >= -12 && v <= 12 });
const nonPositiveDb = (param: string): ParamRule => ({ param, allowed: "<= 0 dB", test: (v) => v <= 0 });
const finite = (param: string): ParamRule => ({ param, allowed: "a finite number", test: () => true });

export const EFFECT_RULES: { readonly [K in EffectKind]: readonly ParamRule[] } = {
  reverb: [unit("roomSize"), unit("damping")],
  echo: [positive("delayMs"), { param: "feedback", allowed: "within [0, 1)", test: (v) => v >= 0 && v < 1 }],
  equalizer: [gainDb("bass"), gainDb("mid"), gainDb("treble")],
  chorus: [unit("depth"), positive("rate")],
  compressor: [{ param: "ratio", allowed: ">= 1", test: (v) => v >= 1 }, nonPositiveDb("thresholdDb")],
  distortion: [unit("amount")],
  noise_gate: [nonPositiveDb("thresholdDb")],
  pitch_shift: [finite("semitones")],
  time_stretch: [positive("factor")],
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export interface EffectInspection {
  /** The descriptor's `type`, or "unknown" when it has none. */
  kind: string;
  violations: RangeViolation[];
}

/** Check any value against the effect rules; a non-empty `violations` means it cannot be applied. */
export function inspectEffect(value: unknown): EffectInspection {
  const type = isRecord(value) ? value.type : undefined;
  const kind = typeof type === "string" ? type : "unknown";
  if (!isRecord(value) || !isEffectKind(type)) {
    return {
      kind,
      violations: [{ field: "type", allowed: `one of ${EFFECT_KINDS.join(", ")}`, value: type }],
    };
  }
  const violations: RangeViolation[] = [];
  for (const rule of EFFECT_RULES[type]) {
    const v = value[rule.param];
    if (typeof v !== "number" || !Number.isFinite(v) || !rule.test(v)) {
      violations.push({ field: `${type}.${rule.param}`, allowed: rule.allowed, value: v });
    }
  }
  return { kind, violations };
}

export function isEffectConfig(value: unknown): value is EffectConfig {
  return inspectEffect(value).violations.length === 0;
}

/**
 * Narrow decoded input (e.g. parsed JSON) to an effect list.
 * Throws ChainApplicationError naming the first descriptor that cannot be applied.
 */
export function parseEffectChain(value: unknown): EffectConfig[] {
  if (!Array.isArray(value)) {
    throw new ParameterRangeError([{ field: "effects", allowed: "an array of effect descriptors", value: typeof value }]);
  }
  const effects: EffectConfig[] = [];
  value.forEach((item: unknown, i) => {
    if (isEffectConfig(item)) {
      effects.push(item);
      return;
    }
    const { kind, violations } = inspectEffect(item);
    throw new ChainApplicationError(i + 1, kind, { cause: new ParameterRangeError(violations) });
  });
  return effects;
}
