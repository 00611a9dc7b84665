import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { describeFailure, NegativeCycleError, normaliseError, UnknownVertexError } from "../src/errors.js";
import { ERROR_CODES, ERROR_TEXT_MAX_LENGTH, normaliseErrorHint, normaliseErrorMessage } from "../src/types.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/**
 * Unit tests covering the error catalogue and the normalisation applied before
 * failures reach the logs or the JSON output.
 */
describe("error normalisation helpers", () => {
  it("exposes the catalogue under flattened keys", () => {
    expect(ERROR_CODES.PATH_NEGATIVE_CYCLE).to.equal("E-PATH-NEGATIVE-CYCLE");
    expect(ERROR_CODES.GRAPH_INVALID_INPUT).to.equal("E-GRAPH-INVALID-INPUT");
    expect(ERROR_CODES.CLI_INVALID_ARGUMENT).to.equal("E-CLI-INVALID-ARGUMENT");
    expect(Object.isFrozen(ERROR_CODES)).to.equal(true);
  });

  it("collapses whitespace and enforces the maximum length on messages", () => {
    expect(normaliseErrorMessage("  multi\nline\tmessage  ")).to.equal("multi line message");
    expect(normaliseErrorMessage("   ")).to.equal("unexpected error");

    const truncated = normaliseErrorMessage("X".repeat(ERROR_TEXT_MAX_LENGTH + 12));
    expect(truncated.length).to.equal(ERROR_TEXT_MAX_LENGTH);
    expect(truncated.endsWith("…")).to.equal(true);
  });

  it("drops empty hints and trims longer ones", () => {
    expect(normaliseErrorHint(undefined)).to.equal(undefined);
    expect(normaliseErrorHint("   ")).to.equal(undefined);
    expect(normaliseErrorHint("   retry   later  ")).to.equal("retry later");
  });

  it("keeps the code, hint and details of domain errors", () => {
    expect(normaliseError(new UnknownVertexError("Q", "source"))).to.deep.equal({
      code: "E-PATH-UNKNOWN-VERTEX",
      message: "unknown source vertex 'Q'",
      hint: "use a vertex declared as a key of the adjacency mapping",
      details: { vertex: "Q", role: "source" },
    });
  });

  it("maps zod failures to the invalid-input code", () => {
    const parsed = z.record(z.array(z.number())).safeParse({ A: ["x"] });
    expect(parsed.success).to.equal(false);
    if (parsed.success) {
      return;
    }

    const normalised = normaliseError(parsed.error);
    expect(normalised.code).to.equal("E-GRAPH-INVALID-INPUT");
    expect(normalised.hint).to.equal("invalid_input");
    expect(normalised.details).to.deep.equal({ issues: parsed.error.issues });
  });

  it("keeps string codes of foreign errors and wraps everything else", () => {
    const missing = Object.assign(new Error("no such file"), { code: "ENOENT" });

    expect(normaliseError(missing)).to.deep.equal({ code: "ENOENT", message: "no such file" });
    expect(normaliseError("boom")).to.deep.equal({ code: "E-PATH-UNEXPECTED", message: "boom" });
    expect(normaliseError(new Error("plain"))).to.deep.equal({ code: "E-PATH-UNEXPECTED", message: "plain" });
  });

  it("logs failures before returning the JSON payload", () => {
    const logger = new RecordingLogger();
    const failure = describeFailure(logger, "closure", new NegativeCycleError(["A"]), { file: "graph.json" });

    expect(failure).to.deep.equal({
      ok: false,
      code: "E-PATH-NEGATIVE-CYCLE",
      message: "the graph contains a negative weight cycle",
      hint: "shortest paths are undefined through a negative cycle",
      details: { cycle: null, vertices: ["A"] },
    });
    expect(logger.entries).to.deep.equal([
      {
        level: "error",
        message: "closure_failed",
        payload: {
          file: "graph.json",
          code: "E-PATH-NEGATIVE-CYCLE",
          message: "the graph contains a negative weight cycle",
          details: { cycle: null, vertices: ["A"] },
        },
      },
    ]);
  });
});
