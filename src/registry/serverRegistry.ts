import { NotFoundError, toToolFailure, type ToolFailure } from "../runtime/errors.js";
import type { ServerEntry, ServerSummary } from "./types.js";

/** Error thrown when the server table is malformed. */
export class RegistryConfigurationError extends Error {
  public readonly code = "E_REGISTRY_CONFIGURATION";

  constructor(message: string) {
    super(message);
    this.name = "RegistryConfigurationError";
  }
}

/**
 * Immutable snapshot of the registered tool servers. Lookups never throw:
 * unknown names come back as structured `E-NOT-FOUND` failures so sandboxed
 * code can branch on them. Iteration follows registration order.
 */
export class ToolServerRegistry {
  private readonly entries: ReadonlyMap<string, ServerEntry>;

  private constructor(entries: ReadonlyMap<string, ServerEntry>) {
    this.entries = entries;
  }

  static create(entries: Iterable<ServerEntry>): ToolServerRegistry {
    const table = new Map<string, ServerEntry>();
    for (const entry of entries) {
      addEntry(table, entry);
    }
    return new ToolServerRegistry(table);
  }

  static empty(): ToolServerRegistry {
    return new ToolServerRegistry(new Map());
  }

  get size(): number {
    return this.entries.size;
  }

  /** Returns a new snapshot including {@link entry}; the receiver is left untouched. */
  withServer(entry: ServerEntry): ToolServerRegistry {
    const table = new Map(this.entries);
    addEntry(table, entry);
    return new ToolServerRegistry(table);
  }

  listServers(): ServerSummary[] {
    return [...this.entries.values()].map((entry) => ({ name: entry.name, description: entry.description }));
  }

  /** Every entry in registration order. */
  servers(): readonly ServerEntry[] {
    return [...this.entries.values()];
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  getServer(name: string): ServerEntry | ToolFailure {
    const entry = this.entries.get(name);
    if (!entry) {
      return toToolFailure(new NotFoundError(`server "${name}" is not registered`, { details: { server: name } }));
    }
    return entry;
  }

  getToolNames(name: string): string[] | ToolFailure {
    const entry = this.getServer(name);
    if ("success" in entry) {
      return entry;
    }
    return [...entry.toolNames];
  }
}

function addEntry(table: Map<string, ServerEntry>, entry: ServerEntry): void {
  const name = entry.name.trim();
  if (name.length === 0 || name !== entry.name) {
    throw new RegistryConfigurationError(`server name "${entry.name}" must be non-empty without surrounding spaces`);
  }
  if (table.has(name)) {
    throw new RegistryConfigurationError(`server "${name}" is registered twice`);
  }
  const seen = new Set<string>();
  for (const tool of entry.toolNames) {
    if (tool.trim().length === 0) {
      throw new RegistryConfigurationError(`server "${name}" declares an empty tool name`);
    }
    if (seen.has(tool)) {
      throw new RegistryConfigurationError(`server "${name}" declares tool "${tool}" twice`);
    }
    seen.add(tool);
  }
  table.set(
    name,
    Object.freeze({
      name,
      description: entry.description,
      toolNames: Object.freeze([...entry.toolNames]),
      module: Object.freeze({ ...entry.module }),
    }),
  );
}
