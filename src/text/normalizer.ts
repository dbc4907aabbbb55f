/**
 * Text cleanup before synthesis.
 */

import { ParameterRangeError } from "../errors";
import { logger } from "../logging";

export interface NormalizeOptions {
  /** Drop ASCII punctuation. Default false. */
  removePunctuation?: boolean;
  lowercase?: boolean;
  /** Trim and collapse whitespace runs to one space. Default true. */
  stripWhitespace?: boolean;
}

export interface NormalizedText {
  text: string;
  originalLength: number;
  finalLength: number;
  operations: Required<NormalizeOptions>;
}

const ASCII_PUNCTUATION = /[!-\/:-@[-`{-~]/g;

/** Throws ParameterRangeError for empty or whitespace-only input. */
export function normalizeText(text: string, options: NormalizeOptions = {}): NormalizedText {
  const operations: Required<NormalizeOptions> = {
    removePunctuation: options.removePunctuation ?? false,
    lowercase: options.lowercase ?? false,
    stripWhitespace: options.stripWhitespace ?? true,
  };
  if (!text.trim()) {
    throw new ParameterRangeError([{ field: "text", allowed: "not empty or whitespace-only", value: JSON.stringify(text) }]);
  }
  let normalized = text;
  if (operations.stripWhitespace) normalized = normalized.trim().split(/\s+/).join(" ");
  if (operations.lowercase) normalized = normalized.toLowerCase();
  if (operations.removePunctuation) normalized = normalized.replace(ASCII_PUNCTUATION, "");
  logger.debug(
    { event: "TEXT_NORMALIZED", original_length: text.length, final_length: normalized.length, ...operations },
    "Text normalized"
  );
  return { text: normalized, originalLength: text.length, finalLength: normalized.length, operations };
}
