import type { StructuredLogger } from "../logger.js";
import type { ToolServerRegistry } from "../registry/serverRegistry.js";
import { ToolValidationError, normaliseThrown, toToolFailure, type ToolFailure } from "../runtime/errors.js";
import { tokenize } from "../utils/text.js";
import type { SchemaLoader } from "./schemaLoader.js";

export interface SearchMatch {
  readonly server: string;
  readonly tool: string;
  readonly score: number;
  readonly description: string;
}

interface SearchCandidate {
  readonly server: string;
  readonly tool: string;
  readonly summary: string;
}

/**
 * Scores one candidate. The whole query contained in the tool name earns 3
 * and in the summary 1; each token earns 2 in the tool name, 1 in the server
 * name and 1 in the summary.
 */
export function scoreCandidate(query: string, tokens: readonly string[], candidate: SearchCandidate): number {
  const tool = candidate.tool.toLowerCase();
  const server = candidate.server.toLowerCase();
  const summary = candidate.summary.toLowerCase();
  let score = 0;
  if (tool.includes(query)) score += 3;
  if (summary.includes(query)) score += 1;
  for (const token of tokens) {
    if (tool.includes(token)) score += 2;
    if (server.includes(token)) score += 1;
    if (summary.includes(token)) score += 1;
  }
  return score;
}

/** Keyword search over the summary tier of every registered tool. */
export class ToolSearch {
  constructor(
    private readonly registry: ToolServerRegistry,
    private readonly schemaLoader: SchemaLoader,
    private readonly logger: StructuredLogger,
  ) {}

  async search(query: unknown, limit?: unknown): Promise<SearchMatch[] | ToolFailure> {
    if (typeof query !== "string" || query.trim().length === 0) {
      return toToolFailure(new ToolValidationError("query must be a non-empty string"));
    }
    if (limit !== undefined && limit !== null && !(typeof limit === "number" && Number.isInteger(limit) && limit > 0)) {
      return toToolFailure(
        new ToolValidationError("limit must be a positive integer", { details: { limit: String(limit) } }),
      );
    }

    const normalisedQuery = query.trim().toLowerCase();
    const tokens = tokenize(normalisedQuery);
    const candidates = await this.collectCandidates();

    const scored = candidates
      .map((candidate, order) => ({ candidate, order, score: scoreCandidate(normalisedQuery, tokens, candidate) }))
      .filter((entry) => entry.score > 0);
    scored.sort((left, right) => right.score - left.score || left.order - right.order);

    const matches = scored.map(({ candidate, score }) => ({
      server: candidate.server,
      tool: candidate.tool,
      score,
      description: candidate.summary,
    }));
    return typeof limit === "number" ? matches.slice(0, limit) : matches;
  }

  private async collectCandidates(): Promise<SearchCandidate[]> {
    const candidates: SearchCandidate[] = [];
    for (const entry of this.registry.servers()) {
      try {
        const index = await this.schemaLoader.listToolSummaries(entry);
        for (const tool of index.tools) {
          candidates.push({ server: entry.name, tool: tool.name, summary: tool.summary });
        }
      } catch (error) {
        const failure = normaliseThrown(error, `failed to index server "${entry.name}"`);
        this.logger.warn("search_server_skipped", { server: entry.name, code: failure.code, message: failure.message });
      }
    }
    return candidates;
  }
}
