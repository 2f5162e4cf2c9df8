import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { LimitExceededError } from "../src/runtime/errors.js";
import { describeRequestError, requestErrorResponse } from "../src/server/toolErrors.js";
import { createCapturingLogger } from "./helpers/fixtures.js";

describe("request error responses", () => {
  it("maps zod failures to the validation code with their issues", () => {
    const parsed = z.object({ code: z.string() }).safeParse({ code: 1 });
    if (parsed.success) {
      throw new Error("expected the parse to fail");
    }

    const described = describeRequestError(parsed.error);
    expect(described.code).to.equal("E-VALIDATION");
    expect(described.hint).to.equal("invalid_input");
    expect(described.details).to.deep.equal({ issues: [{ path: "code", message: "Expected string, received number" }] });
  });

  it("keeps the code, hint and details of runtime errors", () => {
    const error = new LimitExceededError("code is too large", { hint: "split it", details: { code_bytes: 10 } });

    expect(describeRequestError(error)).to.deep.equal({
      code: "E-LIMIT",
      message: "code is too large",
      hint: "split it",
      details: { code_bytes: 10 },
    });
  });

  it("falls back to the internal code", () => {
    expect(describeRequestError(new Error("boom"))).to.deep.equal({ code: "E-INTERNAL", message: "boom" });
    expect(describeRequestError("text")).to.deep.equal({ code: "E-INTERNAL", message: "text" });
  });

  it("reuses string codes carried by plain errors", () => {
    const error = Object.assign(new Error("denied"), { code: "EACCES" });

    expect(describeRequestError(error).code).to.equal("EACCES");
  });

  it("logs the failure and renders a JSON error payload", () => {
    const { logger, entries } = createCapturingLogger();

    const response = requestErrorResponse(logger, "execute_code", new Error("sandbox unavailable"), { timeout_seconds: 5 });

    expect(response.isError).to.equal(true);
    expect(response.structuredContent).to.deep.equal({
      ok: false,
      error: "E-INTERNAL",
      tool: "execute_code",
      message: "sandbox unavailable",
    });
    expect(JSON.parse(response.content[0]?.text ?? "")).to.deep.equal(response.structuredContent);
    expect(entries).to.have.length(1);
    expect(entries[0]?.message).to.equal("execute_code_failed");
    expect(entries[0]?.payload).to.deep.equal({
      timeout_seconds: 5,
      code: "E-INTERNAL",
      message: "sandbox unavailable",
    });
  });
});
