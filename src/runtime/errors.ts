import { normaliseErrorHint, normaliseErrorMessage } from "../utils/text.js";

/**
 * Canonical taxonomy of the failures produced by the runtime. Each category
 * carries a stable code surfaced to sandboxed code and MCP clients plus the
 * default message used when the caller does not provide one.
 */
export const SANDBOX_ERROR_TAXONOMY = {
  NOT_FOUND: { code: "E-NOT-FOUND", message: "Not found" },
  VALIDATION_ERROR: { code: "E-VALIDATION", message: "Invalid arguments" },
  COLLABORATOR_ERROR: { code: "E-COLLABORATOR", message: "Tool implementation failed" },
  LIMIT_EXCEEDED: { code: "E-LIMIT", message: "Execution limit exceeded" },
  EXECUTION_FAULT: { code: "E-EXECUTION-FAULT", message: "Execution failed" },
  TIMEOUT: { code: "E-TIMEOUT", message: "Execution timed out" },
} as const;

export type SandboxErrorCategory = keyof typeof SANDBOX_ERROR_TAXONOMY;

export type SandboxErrorCode = (typeof SANDBOX_ERROR_TAXONOMY)[SandboxErrorCategory]["code"];

/** Hint attached to every not-found failure so callers fall back to discovery. */
export const DISCOVERY_HINT = "run list_servers() or search() to discover available tools";

export interface SandboxErrorOptions {
  readonly hint?: string;
  readonly details?: unknown;
}

/**
 * Base class of the typed runtime errors. Subclasses only pin the category;
 * the options bag carries the hint and machine-readable details.
 */
export class SandboxError extends Error {
  readonly category: SandboxErrorCategory;
  readonly code: SandboxErrorCode;
  readonly hint: string | undefined;
  readonly details: unknown;

  constructor(category: SandboxErrorCategory, message?: string, options: SandboxErrorOptions = {}) {
    const taxonomy = SANDBOX_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message);
    this.name = "SandboxError";
    this.category = category;
    this.code = taxonomy.code;
    this.hint = options.hint;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Unknown server or tool name. */
export class NotFoundError extends SandboxError {
  constructor(message: string, options: SandboxErrorOptions = {}) {
    super("NOT_FOUND", message, { hint: DISCOVERY_HINT, ...options });
    this.name = "NotFoundError";
  }
}

/** Arguments rejected by a tool's input schema or a helper's parameter checks. */
export class ToolValidationError extends SandboxError {
  constructor(message: string, options: SandboxErrorOptions = {}) {
    super("VALIDATION_ERROR", message, options);
    this.name = "ToolValidationError";
  }
}

/** A collaborator module failed to load, threw, or returned a malformed result. */
export class CollaboratorError extends SandboxError {
  constructor(message: string, options: SandboxErrorOptions = {}) {
    super("COLLABORATOR_ERROR", message, options);
    this.name = "CollaboratorError";
  }
}

/** Code size, output size or tool-call budget exhausted. */
export class LimitExceededError extends SandboxError {
  constructor(message: string, options: SandboxErrorOptions = {}) {
    super("LIMIT_EXCEEDED", message, options);
    this.name = "LimitExceededError";
  }
}

/** Position of a fault inside the submitted code (1-based). */
export interface SourceLocation {
  readonly line: number;
  readonly column: number | null;
}

/** Uncaught syntax or runtime error raised by the submitted code. */
export class ExecutionFaultError extends SandboxError {
  readonly errorName: string;
  readonly location: SourceLocation | null;

  constructor(errorName: string, message: string, location: SourceLocation | null) {
    super("EXECUTION_FAULT", formatFault(errorName, message, location), { details: { name: errorName, location } });
    this.name = "ExecutionFaultError";
    this.errorName = errorName;
    this.location = location;
  }
}

/** Wall-clock budget exhausted. */
export class ExecutionTimeoutError extends SandboxError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("TIMEOUT", `Execution timed out after ${formatSeconds(timeoutMs)} seconds`, {
      hint: "reduce the work done per execution or raise the timeout",
      details: { timeout_ms: timeoutMs },
    });
    this.name = "ExecutionTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

function formatFault(errorName: string, message: string, location: SourceLocation | null): string {
  const head = message.length > 0 ? `${errorName}: ${message}` : errorName;
  if (!location) {
    return head;
  }
  return location.column === null
    ? `${head} (line ${location.line})`
    : `${head} (line ${location.line}, column ${location.column})`;
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1_000;
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(3);
}

/**
 * Structured failure handed back to sandboxed code instead of a thrown
 * error, so scripts can branch on `success` and retry or fall back.
 */
export type ToolFailure = {
  readonly success: false;
  readonly code: SandboxErrorCode;
  readonly error: string;
  readonly hint?: string;
  readonly details?: unknown;
};

/** Converts a typed error into the structured failure value. */
export function toToolFailure(error: SandboxError): ToolFailure {
  const hint = normaliseErrorHint(error.hint);
  return {
    success: false,
    code: error.code,
    error: normaliseErrorMessage(error.message),
    ...(hint !== undefined ? { hint } : {}),
    ...(error.details !== undefined ? { details: error.details } : {}),
  };
}

/**
 * Wraps an arbitrary thrown value. Typed runtime errors keep their category;
 * anything else is attributed to the collaborator.
 */
export function normaliseThrown(error: unknown, context: string): SandboxError {
  if (error instanceof SandboxError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CollaboratorError(`${context}: ${message}`, {
    details: { name: error instanceof Error ? error.name : typeof error },
  });
}

const KNOWN_CODES: ReadonlySet<string> = new Set(
  Object.values(SANDBOX_ERROR_TAXONOMY).map((entry) => entry.code),
);

/** Type guard recognising {@link ToolFailure} values. */
export function isToolFailure(value: unknown): value is ToolFailure {
  if (!value || typeof value !== "object" || !("success" in value) || !("code" in value) || !("error" in value)) {
    return false;
  }
  return (
    value.success === false &&
    typeof value.code === "string" &&
    KNOWN_CODES.has(value.code) &&
    typeof value.error === "string"
  );
}
