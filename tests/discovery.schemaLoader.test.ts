import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { SchemaLoader, describeParameters, typeName } from "../src/discovery/schemaLoader.js";
import { ToolServerRegistry } from "../src/registry/serverRegistry.js";
import { DISCOVERY_HINT } from "../src/runtime/errors.js";
import { ECHO_ENTRY, createCapturingLogger } from "./helpers/fixtures.js";

function createLoader(): SchemaLoader {
  const { logger } = createCapturingLogger();
  const broken = {
    name: "broken",
    description: "Module that fails to load",
    toolNames: ["anything"],
    module: {
      kind: "loader" as const,
      load: async () => {
        throw new Error("module missing");
      },
    },
  };
  return new SchemaLoader(ToolServerRegistry.create([ECHO_ENTRY, broken]), logger);
}

describe("discovery schema loader", () => {
  it("lists tool names and summaries when the tool is omitted", async () => {
    const loader = createLoader();
    const expected = {
      server: "echo",
      description: "Echo messages back",
      tools: [{ name: "ping", summary: "Echo a message back" }],
    };

    expect(await loader.describe("echo")).to.deep.equal(expected);
    expect(await loader.describe("echo", undefined, "full")).to.deep.equal(expected);
  });

  it("returns only the one-line purpose at the summary level", async () => {
    const loader = createLoader();

    expect(await loader.describe("echo", "ping")).to.deep.equal({
      server: "echo",
      name: "ping",
      summary: "Echo a message back",
    });
  });

  it("returns the full schema with a required message parameter", async () => {
    const loader = createLoader();
    const full = await loader.describe("echo", "ping", "full");

    expect(full).to.deep.equal({
      server: "echo",
      name: "ping",
      summary: "Echo a message back",
      description: "Returns the provided message unchanged so callers can test the round trip.",
      parameters: [{ name: "message", type: "string", required: true, description: "Text echoed back" }],
      returns: { type: "object", description: "The echoed message", properties: { message: "string" } },
    });
    const summary = await loader.describe("echo", "ping", "summary");
    expect(JSON.stringify(summary).length).to.be.lessThan(JSON.stringify(full).length);
  });

  it("is idempotent", async () => {
    const loader = createLoader();

    const first = await loader.describe("echo", "ping", "full");
    const second = await loader.describe("echo", "ping", "full");
    expect(second).to.deep.equal(first);
  });

  it("answers unknown servers and tools with not-found values", async () => {
    const loader = createLoader();

    const server = await loader.describe("nonexistent", "x");
    expect(server).to.include({ success: false, code: "E-NOT-FOUND", hint: DISCOVERY_HINT });

    const tool = await loader.describe("echo", "missing", "full");
    expect(tool).to.include({
      success: false,
      code: "E-NOT-FOUND",
      error: 'tool "missing" is not registered on server "echo"',
    });
  });

  it("rejects unknown detail levels", async () => {
    const loader = createLoader();

    const result = await loader.describe("echo", "ping", "verbose");
    expect(result).to.include({ success: false, code: "E-VALIDATION", error: "detail must be one of summary, full" });
  });

  it("reports module load failures as collaborator errors", async () => {
    const loader = createLoader();

    const result = await loader.describe("broken");
    expect(result).to.include({
      success: false,
      code: "E-COLLABORATOR",
      error: 'failed to load module of server "broken": module missing',
    });
  });
});

describe("discovery zod introspection", () => {
  it("maps wrappers, defaults, enums and composite types", () => {
    const schema = z.object({
      query: z.string().describe("Search terms"),
      limit: z.number().int().min(1).default(10).describe("Maximum results"),
      mode: z.enum(["fast", "deep"]).optional(),
      tags: z.array(z.string()).optional(),
      ratio: z.number().nullable(),
      filters: z.record(z.boolean()).default({}),
      kind: z.literal("page"),
      target: z.union([z.string(), z.number()]),
    });

    expect(describeParameters(schema)).to.deep.equal([
      { name: "query", type: "string", required: true, description: "Search terms" },
      { name: "limit", type: "integer", required: false, default: 10, description: "Maximum results" },
      { name: "mode", type: "enum", required: false, enum: ["fast", "deep"] },
      { name: "tags", type: "array<string>", required: false },
      { name: "ratio", type: "number", required: true },
      { name: "filters", type: "record<string, boolean>", required: false, default: {} },
      { name: "kind", type: "literal", required: true, enum: ["page"] },
      { name: "target", type: "string | number", required: true },
    ]);
  });

  it("sees through transforms and refinements", () => {
    expect(typeName(z.string().transform((value) => value.length))).to.equal("string");
    expect(typeName(z.number().refine((value) => value > 0))).to.equal("number");
    expect(typeName(z.unknown())).to.equal("any");
  });
});
