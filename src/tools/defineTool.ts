import type { z } from "zod";

import { ToolValidationError, toToolFailure } from "../runtime/errors.js";
import type { ReturnContract, ToolDefinition, ToolInvocationContext, ToolResult } from "../registry/types.js";

export interface ToolSpec<Shape extends z.ZodRawShape> {
  readonly name: string;
  readonly summary: string;
  readonly description?: string;
  readonly input: z.ZodObject<Shape>;
  readonly returns: ReturnContract;
  handler(args: z.output<z.ZodObject<Shape>>, context: ToolInvocationContext): Promise<ToolResult> | ToolResult;
}

/**
 * Builds a {@link ToolDefinition} whose arguments are parsed with the zod
 * input schema before the handler runs. Rejected arguments come back as an
 * `E-VALIDATION` failure listing every issue instead of reaching the handler.
 */
export function defineTool<Shape extends z.ZodRawShape>(spec: ToolSpec<Shape>): ToolDefinition {
  return {
    name: spec.name,
    summary: spec.summary,
    ...(spec.description !== undefined ? { description: spec.description } : {}),
    input: spec.input,
    returns: spec.returns,
    async invoke(args: unknown, context: ToolInvocationContext): Promise<ToolResult> {
      const parsed = spec.input.safeParse(args ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        }));
        const summary = issues.map((issue) => `${issue.path || "(root)"}: ${issue.message}`).join("; ");
        const failure = toToolFailure(
          new ToolValidationError(`invalid arguments for ${context.server}.${context.tool}: ${summary}`, {
            hint: `run describe("${context.server}", "${context.tool}", "full") to inspect the parameters`,
          }),
        );
        return { ...failure, issues };
      }
      return await spec.handler(parsed.data, context);
    },
  };
}
