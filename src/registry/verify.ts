import { resolveServerModule } from "./moduleResolver.js";
import type { ToolServerRegistry } from "./serverRegistry.js";

export interface RegistryProblem {
  readonly server: string;
  readonly tool?: string;
  readonly problem: string;
}

export interface RegistryVerificationReport {
  readonly ok: boolean;
  readonly problems: readonly RegistryProblem[];
  /** Tools exported by a module but not declared in the registry (not an error). */
  readonly undeclared: readonly RegistryProblem[];
}

/**
 * Loads every registered module and checks that each declared tool name has
 * a definition, so proxies never hit a missing implementation at run time.
 */
export async function verifyRegistry(registry: ToolServerRegistry): Promise<RegistryVerificationReport> {
  const problems: RegistryProblem[] = [];
  const undeclared: RegistryProblem[] = [];

  for (const entry of registry.servers()) {
    let implemented: Set<string>;
    try {
      const module = await resolveServerModule(entry);
      implemented = new Set(module.tools.map((tool) => tool.name));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      problems.push({ server: entry.name, problem: message });
      continue;
    }
    for (const tool of entry.toolNames) {
      if (!implemented.has(tool)) {
        problems.push({ server: entry.name, tool, problem: "declared tool has no definition in the module" });
      }
    }
    for (const tool of implemented) {
      if (!entry.toolNames.includes(tool)) {
        undeclared.push({ server: entry.name, tool, problem: "module defines a tool the registry does not declare" });
      }
    }
  }

  return { ok: problems.length === 0, problems, undeclared };
}
