import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

describe("structured logger", () => {
  const now = () => new Date("2026-01-02T03:04:05.000Z");

  it("writes one JSON line per entry at or above the minimum level", () => {
    const sink = sinon.spy();
    const logger = new StructuredLogger({ minLevel: "info", sink, now });

    logger.debug("ignored");
    logger.info("graph_loaded", { vertices: 5 });
    logger.error("run_failed");

    expect(sink.args).to.deep.equal([
      ['{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","message":"graph_loaded","payload":{"vertices":5}}\n'],
      ['{"timestamp":"2026-01-02T03:04:05.000Z","level":"error","message":"run_failed"}\n'],
    ]);
    expect(logger.isEnabled("debug")).to.equal(false);
    expect(logger.isEnabled("warn")).to.equal(true);
  });

  it("emits everything when no minimum level is configured", () => {
    const logger = new StructuredLogger({ sink: () => undefined });

    expect(logger.isEnabled("debug")).to.equal(true);
  });

  it("spells out infinite distances instead of dropping them to null", () => {
    const sink = sinon.spy();
    const logger = new StructuredLogger({ sink, now });

    logger.debug("distances", { B: Number.POSITIVE_INFINITY, C: Number.NEGATIVE_INFINITY });

    expect(sink.firstCall.args[0]).to.equal(
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"debug","message":"distances","payload":{"B":"Infinity","C":"-Infinity"}}\n',
    );
  });

  it("redacts sensitive keys at any depth when enabled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      sink: () => undefined,
      redactionEnabled: true,
      onEntry: (entry) => entries.push(entry),
      now,
    });

    logger.warn("request", { token: "test-secret", nested: { Password: "test-password" }, list: [{ secret: "x" }], keep: 1 });

    expect(entries).to.deep.equal([
      {
        timestamp: "2026-01-02T03:04:05.000Z",
        level: "warn",
        message: "request",
        payload: { token: "[REDACTED]", nested: { Password: "[REDACTED]" }, list: [{ secret: "[REDACTED]" }], keep: 1 },
      },
    ]);
  });

  it("leaves payloads untouched when redaction is disabled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ sink: () => undefined, onEntry: (entry) => entries.push(entry), now });

    logger.info("request", { token: "test-secret" });

    expect(entries[0].payload).to.deep.equal({ token: "test-secret" });
  });

  it("mirrors lines into the log file, creating its directory", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "shortest-paths-log-"));
    const logFile = path.join(dir, "nested", "run.log");
    try {
      const logger = new StructuredLogger({ sink: () => undefined, logFile, now });
      logger.info("first");
      logger.info("second", { step: 2 });
      await logger.flush();

      const contents = await readFile(logFile, "utf8");
      expect(contents.split("\n")).to.deep.equal([
        '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","message":"first"}',
        '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","message":"second","payload":{"step":2}}',
        "",
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
