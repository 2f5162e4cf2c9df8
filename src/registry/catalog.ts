import { readFile } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";

import { z } from "zod";

import { RegistryConfigurationError, ToolServerRegistry } from "./serverRegistry.js";
import type { ServerEntry } from "./types.js";

/** Servers shipped with the runtime. */
export const BUILTIN_SERVERS: readonly ServerEntry[] = [
  {
    name: "url_ping",
    description: "Check whether URLs are reachable and report status codes, timing and headers.",
    toolNames: ["ping_url"],
    module: { kind: "loader", load: async () => (await import("../servers/urlPing.js")).urlPingServer },
  },
];

const CatalogueServerSchema = z
  .object({
    name: z.string().trim().min(1),
    description: z.string().default(""),
    module: z.string().trim().min(1),
    tools: z.array(z.string().trim().min(1)).min(1),
  })
  .strict();

const CatalogueSchema = z.object({ servers: z.array(CatalogueServerSchema) }).strict();

/**
 * Reads a JSON server catalogue. Module paths starting with `.` or `/` are
 * resolved against the catalogue's directory and turned into file URLs;
 * anything else is treated as a package specifier.
 */
export async function loadServerCatalogue(file: string): Promise<ServerEntry[]> {
  const absolute = path.resolve(file);
  let raw: string;
  try {
    raw = await readFile(absolute, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RegistryConfigurationError(`unable to read server catalogue ${absolute}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RegistryConfigurationError(`server catalogue ${absolute} is not valid JSON: ${message}`);
  }

  const parsed = CatalogueSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new RegistryConfigurationError(`server catalogue ${absolute} is invalid: ${issues.join("; ")}`);
  }

  const baseDir = path.dirname(absolute);
  return parsed.data.servers.map((server): ServerEntry => ({
    name: server.name,
    description: server.description,
    toolNames: server.tools,
    module: { kind: "specifier", specifier: resolveSpecifier(server.module, baseDir) },
  }));
}

export function resolveSpecifier(moduleRef: string, baseDir: string): string {
  if (moduleRef.startsWith(".") || path.isAbsolute(moduleRef)) {
    return pathToFileURL(path.resolve(baseDir, moduleRef)).href;
  }
  return moduleRef;
}

export interface BuildRegistryOptions {
  readonly serversFile?: string | null;
  /** Replaces {@link BUILTIN_SERVERS}; tests pass their fixtures here. */
  readonly builtins?: readonly ServerEntry[];
}

/** Builtins first, then catalogue entries, in declaration order. */
export async function buildRegistry(options: BuildRegistryOptions = {}): Promise<ToolServerRegistry> {
  const entries = [...(options.builtins ?? BUILTIN_SERVERS)];
  if (options.serversFile) {
    entries.push(...(await loadServerCatalogue(options.serversFile)));
  }
  return ToolServerRegistry.create(entries);
}
