import type { McpServer, RegisteredTool } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { ExecutionFaultError, type SourceLocation } from "../runtime/errors.js";
import { HELPER_SUMMARY } from "../sandbox/capabilities.js";
import type { ExecutionResult, ExecutionSandbox, ExecutionStatus } from "../sandbox/executionSandbox.js";
import { requestErrorResponse } from "../server/toolErrors.js";

export const EXECUTE_CODE_TOOL_NAME = "execute_code";

export interface ExecuteCodeToolOptions {
  readonly sandbox: ExecutionSandbox;
  readonly logger: StructuredLogger;
  readonly defaultTimeoutSeconds: number;
  readonly maxTimeoutSeconds: number;
}

export function buildExecuteCodeInputShape(maxTimeoutSeconds: number) {
  return {
    code: z.string().min(1).describe("JavaScript executed as the body of an async function"),
    timeout: z
      .number()
      .int()
      .min(1)
      .max(maxTimeoutSeconds)
      .optional()
      .describe("Wall-clock budget in seconds"),
  };
}

/** Wire form of an execution outcome. */
export interface ExecuteCodePayload {
  [key: string]: unknown;
  output: string;
  result: unknown;
  error: string | null;
  error_code: string | null;
  error_location: SourceLocation | null;
  elapsed_seconds: number;
  status: ExecutionStatus;
  partial_output: boolean;
  output_truncated: boolean;
  tool_calls: number;
}

export function toWirePayload(result: ExecutionResult): ExecuteCodePayload {
  const location = result.error instanceof ExecutionFaultError ? result.error.location : null;
  return {
    output: result.output,
    result: result.error ? null : result.result,
    error: result.error ? result.error.message : null,
    error_code: result.error ? result.error.code : null,
    error_location: location,
    elapsed_seconds: Math.round(result.elapsedMs) / 1_000,
    status: result.status,
    partial_output: result.partialOutput,
    output_truncated: result.outputTruncated,
    tool_calls: result.toolCalls,
  };
}

export function describeExecuteCodeTool(defaultTimeoutSeconds: number, maxTimeoutSeconds: number): string {
  return [
    "Execute JavaScript in an isolated sandbox with progressive tool discovery.",
    `Timeout defaults to ${defaultTimeoutSeconds}s (maximum ${maxTimeoutSeconds}s).`,
    HELPER_SUMMARY,
    "Returns { output, result, error, error_code, error_location, elapsed_seconds, status, partial_output, output_truncated, tool_calls }.",
  ].join("\n");
}

/**
 * Validates the raw arguments, runs the code and renders the outcome. Kept
 * apart from the registration so tests can call it without a transport.
 */
export function createExecuteCodeHandler(options: ExecuteCodeToolOptions): (input: unknown) => Promise<CallToolResult> {
  const schema = z.object(buildExecuteCodeInputShape(options.maxTimeoutSeconds)).strict();

  return async (input: unknown): Promise<CallToolResult> => {
    const parsed = schema.safeParse(input ?? {});
    if (!parsed.success) {
      return requestErrorResponse(options.logger, EXECUTE_CODE_TOOL_NAME, parsed.error);
    }
    const timeoutSeconds = parsed.data.timeout ?? options.defaultTimeoutSeconds;
    try {
      const result = await options.sandbox.execute({ code: parsed.data.code, timeoutMs: timeoutSeconds * 1_000 });
      const payload = toWirePayload(result);
      return {
        content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
        structuredContent: payload,
        ...(result.status === "completed" ? {} : { isError: true }),
      };
    } catch (error) {
      return requestErrorResponse(options.logger, EXECUTE_CODE_TOOL_NAME, error, { timeout_seconds: timeoutSeconds });
    }
  };
}

export function registerExecuteCodeTool(server: McpServer, options: ExecuteCodeToolOptions): RegisteredTool {
  const handler = createExecuteCodeHandler(options);
  return server.registerTool(
    EXECUTE_CODE_TOOL_NAME,
    {
      title: "Execute code",
      description: describeExecuteCodeTool(options.defaultTimeoutSeconds, options.maxTimeoutSeconds),
      inputSchema: buildExecuteCodeInputShape(options.maxTimeoutSeconds),
    },
    async (input: unknown) => handler(input),
  );
}
