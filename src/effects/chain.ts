/**
 * Effect chain: applies descriptors strictly in list order as a left fold.
 * All-or-nothing: every descriptor is checked before the first one runs, and any failure
 * (check or render) throws ChainApplicationError naming the 1-based position and kind.
 */

import type { AudioData } from "../audio/types";
import { ChainApplicationError, ParameterRangeError } from "../errors";
import { logger } from "../logging";
import * as builders from "./builders";
import type { EffectRenderer } from "./renderer";
import { TaggingEffectRenderer } from "./renderer";
import { inspectEffect } from "./rules";
import type { EffectConfig } from "./types";

export class AudioEffects {
  readonly createReverb = builders.createReverb;
  readonly createEcho = builders.createEcho;
  readonly createEqualizer = builders.createEqualizer;
  readonly createChorus = builders.createChorus;
  readonly createCompressor = builders.createCompressor;
  readonly createDistortion = builders.createDistortion;
  readonly createNoiseGate = builders.createNoiseGate;
  readonly createPitchShift = builders.createPitchShift;
  readonly createTimeStretch = builders.createTimeStretch;

  constructor(private readonly renderer: EffectRenderer = new TaggingEffectRenderer()) {}

  /** Throws ChainApplicationError for the first descriptor with an unknown kind or out-of-range parameter. */
  checkEffects(effects: readonly EffectConfig[]): void {
    effects.forEach((effect, i) => {
      const { kind, violations } = inspectEffect(effect);
      if (violations.length > 0) {
        throw new ChainApplicationError(i + 1, kind, { cause: new ParameterRangeError(violations) });
      }
    });
  }

  applyEffects(audio: AudioData, effects: readonly EffectConfig[]): AudioData {
    if (effects.length === 0) return audio;
    this.checkEffects(effects);

    let out = audio;
    effects.forEach((effect, i) => {
      try {
        out = this.renderer.render(out, effect);
      } catch (err) {
        throw new ChainApplicationError(i + 1, effect.type, { cause: err });
      }
    });
    logger.debug({ event: "EFFECTS_APPLIED", effects: effects.map((e) => e.type) }, "Effect chain applied");
    return out;
  }
}
