/*
Purpose: append structured pipeline events to a JSONL file.
Assumptions: one writer per file; events never go to stdout so CLI output stays parseable.
Usage: const log = new JsonlLogger(path, { runId }); logPipelineEvent(log, "validate.complete", { ... }).
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export type JsonlLoggerOptions = {
  runId?: string;
  now?: () => Date;
};

export class JsonlLogger {
  public readonly filePath: string;
  private readonly runId?: string;
  private readonly now: () => Date;

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.runId = options.runId;
    this.now = options.now ?? (() => new Date());
    fse.ensureDirSync(path.dirname(this.filePath));
  }

  log(event: { type: string } & JsonObject): void {
    const { type, ...payload } = event;
    const record: JsonObject = { ts: this.now().toISOString(), type };
    if (this.runId !== undefined) {
      record.run_id = this.runId;
    }
    fs.appendFileSync(this.filePath, `${JSON.stringify({ ...record, ...payload })}\n`, "utf8");
  }
}

/** No-op when logging is not configured. */
export function logPipelineEvent(
  logger: JsonlLogger | null,
  type: string,
  payload: JsonObject = {},
): void {
  if (!logger) return;
  logger.log({ ...payload, type });
}

export function defaultRunId(now: Date = new Date()): string {
  return now.toISOString().replace(/[-:]/g, "").replace(/\..*$/, "");
}
