import { z } from "zod";

import { CollaboratorError, NotFoundError, normaliseThrown } from "../runtime/errors.js";
import type { ServerEntry, ToolDefinition, ToolServerModule } from "./types.js";

/**
 * Loads the collaborator module behind {@link entry}. Nothing is cached here:
 * specifiers go through `import()`, whose module cache is the only memo, so a
 * proxy always reaches the implementation currently registered.
 */
export async function resolveServerModule(entry: ServerEntry): Promise<ToolServerModule> {
  let loaded: unknown;
  try {
    if (entry.module.kind === "loader") {
      loaded = await entry.module.load();
    } else {
      const namespace: unknown = await import(entry.module.specifier);
      loaded = pickExport(namespace);
    }
  } catch (error) {
    throw normaliseThrown(error, `failed to load module of server "${entry.name}"`);
  }
  if (!isToolServerModule(loaded)) {
    throw new CollaboratorError(
      `module of server "${entry.name}" does not export a tool list ({ tools: ToolDefinition[] })`,
    );
  }
  return loaded;
}

/** Finds {@link tool} among the definitions exported by the module. */
export function findTool(entry: ServerEntry, module: ToolServerModule, tool: string): ToolDefinition {
  if (!entry.toolNames.includes(tool)) {
    throw new NotFoundError(`tool "${tool}" is not registered on server "${entry.name}"`, {
      details: { server: entry.name, tool },
    });
  }
  const definition = module.tools.find((candidate) => candidate.name === tool);
  if (!definition) {
    throw new CollaboratorError(`module of server "${entry.name}" does not implement tool "${tool}"`);
  }
  return definition;
}

/** Catalogue modules may export the tool list as `default` or as named `tools`. */
function pickExport(namespace: unknown): unknown {
  if (namespace && typeof namespace === "object" && "default" in namespace && namespace.default !== undefined) {
    return namespace.default;
  }
  return namespace;
}

function isToolDefinition(value: unknown): value is ToolDefinition {
  if (!value || typeof value !== "object") {
    return false;
  }
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "summary" in value &&
    typeof value.summary === "string" &&
    "input" in value &&
    value.input instanceof z.ZodObject &&
    "returns" in value &&
    typeof value.returns === "object" &&
    value.returns !== null &&
    "invoke" in value &&
    typeof value.invoke === "function"
  );
}

export function isToolServerModule(value: unknown): value is ToolServerModule {
  return (
    !!value &&
    typeof value === "object" &&
    "tools" in value &&
    Array.isArray(value.tools) &&
    value.tools.every((tool: unknown) => isToolDefinition(tool))
  );
}
