import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { JsonlLogger, defaultRunId, logPipelineEvent } from "./logger.js";

describe("JsonlLogger", () => {
  it("appends one JSON object per event", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "facet-refine-log-"));
    const filePath = path.join(dir, "logs", "run.jsonl");
    const logger = new JsonlLogger(filePath, {
      runId: "20261018T120000",
      now: () => new Date("2026-10-18T12:00:00.000Z"),
    });

    logPipelineEvent(logger, "source.loaded", { path: "token.yaml", package: "Token" });
    logPipelineEvent(logger, "validate.complete", { package: "Token", diagnostics: 0 });

    const lines = fs.readFileSync(filePath, "utf8").trimEnd().split("\n");
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      {
        ts: "2026-10-18T12:00:00.000Z",
        type: "source.loaded",
        run_id: "20261018T120000",
        path: "token.yaml",
        package: "Token",
      },
      {
        ts: "2026-10-18T12:00:00.000Z",
        type: "validate.complete",
        run_id: "20261018T120000",
        package: "Token",
        diagnostics: 0,
      },
    ]);
  });

  it("ignores events when logging is off", () => {
    expect(() => logPipelineEvent(null, "emit.complete")).not.toThrow();
  });
});

describe("defaultRunId", () => {
  it("formats a compact UTC timestamp", () => {
    expect(defaultRunId(new Date("2026-10-18T12:34:56.789Z"))).toBe("20261018T123456");
  });
});
