import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { SandboxError } from "../runtime/errors.js";
import { normaliseErrorHint, normaliseErrorMessage } from "../utils/text.js";

/** Code reported when a request fails for a reason outside the taxonomy. */
export const INTERNAL_ERROR_CODE = "E-INTERNAL";

/**
 * Reason a request never reached the sandbox, or the sandbox itself broke.
 * Execution outcomes (timeouts, faults) are not request errors: they travel
 * in the regular payload.
 */
export interface RequestError {
  readonly code: string;
  readonly message: string;
  readonly hint?: string;
  readonly details?: unknown;
}

/** MCP result carrying a {@link RequestError} as JSON text and structured content. */
export type RequestErrorResponse = {
  [key: string]: unknown;
  isError: true;
  content: Array<{ type: "text"; text: string }>;
  structuredContent: { ok: false; error: string; tool: string; message: string; hint?: string; details?: unknown };
};

/**
 * Classifies a thrown value: rejected input becomes `E-VALIDATION` with the
 * zod issues, typed runtime errors keep their own code, and plain errors keep
 * a string `code` when they carry one (`EACCES`, ...).
 */
export function describeRequestError(error: unknown): RequestError {
  const message = normaliseErrorMessage(error instanceof Error ? error.message : String(error));

  if (error instanceof z.ZodError) {
    return {
      code: "E-VALIDATION",
      message,
      hint: "invalid_input",
      details: { issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })) },
    };
  }
  if (error instanceof SandboxError) {
    const hint = normaliseErrorHint(error.hint);
    return {
      code: error.code,
      message,
      ...(hint !== undefined ? { hint } : {}),
      ...(error.details !== undefined ? { details: error.details } : {}),
    };
  }
  const code = error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : INTERNAL_ERROR_CODE;
  return { code, message };
}

/** Logs `<tool>_failed` and renders the failure for the MCP client. */
export function requestErrorResponse(
  logger: StructuredLogger,
  tool: string,
  error: unknown,
  context: Readonly<Record<string, unknown>> = {},
): RequestErrorResponse {
  const described = describeRequestError(error);
  logger.error(`${tool}_failed`, {
    ...context,
    code: described.code,
    message: described.message,
    ...(described.details !== undefined ? { details: described.details } : {}),
  });

  const structuredContent = { ok: false as const, error: described.code, tool, message: described.message };
  const body = {
    ...structuredContent,
    ...(described.hint !== undefined ? { hint: described.hint } : {}),
    ...(described.details !== undefined ? { details: described.details } : {}),
  };
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify(body, null, 2) }],
    structuredContent: body,
  };
}
