/**
 * Error taxonomy for voice customization.
 * Every error carries a stable `code` plus the structured detail a caller needs to fix its input.
 */

export type VoiceErrorCode =
  | "VALIDATION_FAILED"
  | "UNKNOWN_PRESET"
  | "UNKNOWN_EMOTION"
  | "PARAMETER_RANGE"
  | "CHAIN_APPLICATION_FAILED"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "SECURITY_VIOLATION"
  | "UNSUPPORTED_FORMAT"
  | "BACKEND_FAILED";

export class VoiceError extends Error {
  constructor(
    readonly code: VoiceErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
}

/** One or more invalid profile fields; `errors` keeps validation order. */
export class ValidationError extends VoiceError {
  readonly errors: string[];

  constructor(readonly issues: ValidationIssue[]) {
    super("VALIDATION_FAILED", `Invalid voice profile: ${issues.map((i) => i.message).join("; ")}`);
    this.errors = issues.map((i) => i.message);
  }
}

export class UnknownPresetError extends VoiceError {
  constructor(readonly preset: string, readonly available: readonly string[]) {
    super("UNKNOWN_PRESET", `Preset not found: ${preset} (available: ${available.join(", ")})`);
  }
}

export class UnknownEmotionError extends VoiceError {
  constructor(readonly emotion: string, readonly available: readonly string[]) {
    super("UNKNOWN_EMOTION", `Invalid emotion: ${emotion} (available: ${available.join(", ")})`);
  }
}

export interface RangeViolation {
  field: string;
  /** Human-readable allowed range, e.g. "[0, 1]" or "> 0". */
  allowed: string;
  value: unknown;
}

export function describeViolation(v: RangeViolation): string {
  return `${v.field} must be ${v.allowed} (got ${String(v.value)})`;
}

/** Effect builder or scalar parameter outside its allowed range. */
export class ParameterRangeError extends VoiceError {
  constructor(readonly violations: RangeViolation[]) {
    super("PARAMETER_RANGE", violations.map(describeViolation).join("; "));
  }
}

/** Effect chain failed; `position` is 1-based within the caller's list. */
export class ChainApplicationError extends VoiceError {
  constructor(readonly position: number, readonly kind: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("CHAIN_APPLICATION_FAILED", `Effect #${position} (${kind}) failed${reason}`, options);
  }
}

export type ResourceKind = "profile" | "file";

export class NotFoundError extends VoiceError {
  constructor(readonly resource: ResourceKind, readonly id: string) {
    super("NOT_FOUND", `${resource === "profile" ? "Profile" : "File"} not found: ${id}`);
  }
}

export class AlreadyExistsError extends VoiceError {
  constructor(readonly path: string) {
    super("ALREADY_EXISTS", `File exists: ${path}`);
  }
}

export class SecurityError extends VoiceError {
  constructor(readonly path: string) {
    super("SECURITY_VIOLATION", `Path traversal attempt detected: ${path}`);
  }
}

/** Unsupported extension, or (with `reason`) a supported one whose content cannot be used. */
export class FormatError extends VoiceError {
  constructor(readonly format: string, readonly supported: readonly string[], reason?: string) {
    super(
      "UNSUPPORTED_FORMAT",
      reason === undefined
        ? `Unsupported format: ${format} (supported: ${supported.join(", ")})`
        : `Unreadable ${format} audio: ${reason}`
    );
  }
}

export type BackendKind = "tts" | "asr" | "storage";

/** Wraps any failure from a TTS/STT engine or the profile store. Never retried here. */
export class BackendError extends VoiceError {
  constructor(readonly backend: BackendKind, readonly engine: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("BACKEND_FAILED", `${backend} backend "${engine}" failed: ${reason}`, { cause });
  }
}
