/**
 * Unit tests for text normalization.
 */

import { ParameterRangeError } from "../../../src/errors";
import { normalizeText } from "../../../src/text/normalizer";

describe("normalizeText", () => {
  it("collapses whitespace by default", () => {
    expect(normalizeText("  Hello \n\t there  ")).toEqual({
      text: "Hello there",
      originalLength: 18,
      finalLength: 11,
      operations: { removePunctuation: false, lowercase: false, stripWhitespace: true },
    });
  });

  it("lowercases and drops punctuation when asked", () => {
    const result = normalizeText("Hi, World! (It's 5:00 p.m.)", { lowercase: true, removePunctuation: true });
    expect(result.text).toBe("hi world its 500 pm");
    expect(result.finalLength).toBe(19);
  });

  it("keeps whitespace untouched when stripping is off", () => {
    expect(normalizeText(" a  b ", { stripWhitespace: false }).text).toBe(" a  b ");
  });

  it("keeps non-ASCII letters and punctuation", () => {
    expect(normalizeText("¿Qué tal? Çava…", { removePunctuation: true }).text).toBe("¿Qué tal Çava…");
  });

  it("rejects empty and whitespace-only text", () => {
    expect(() => normalizeText("")).toThrow(ParameterRangeError);
    expect(() => normalizeText(" \n ")).toThrow('text must be not empty or whitespace-only (got " \\n ")');
  });
});
