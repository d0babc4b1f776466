import type { DeliveryFailureKind, DeliveryStage, TemplateName } from "@/lib/email/types";

// =============================================================================
// Error Types
// =============================================================================

/**
 * Malformed or missing document fields (unparsable date, empty name, ...).
 * Aborts the run.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    /** 1-based line in the source file, when known */
    public readonly line?: number
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Missing or out-of-range configuration. Raised before any processing.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

/**
 * A template lacks one of its required placeholders
 */
export class TemplateError extends Error {
  constructor(
    public readonly template: TemplateName,
    public readonly missing: string[]
  ) {
    super(
      `Template "${template}" is missing required placeholder(s): ${missing
        .map((name) => `{${name}}`)
        .join(", ")}`
    );
    this.name = "TemplateError";
  }
}

/**
 * A single relay attempt failed. Recovered by failing over to the next relay.
 */
export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly kind: DeliveryFailureKind,
    public readonly stage: DeliveryStage,
    public readonly hint: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DeliveryError";
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for fs errors raised because a path does not exist
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
