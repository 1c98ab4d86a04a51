import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type Phase = "pre" | "post";

export type LogEvent = {
  ts: string;
  type: string;
  run_id: string;
  phase?: Phase;
  attempt?: number;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  phase?: Phase;
  attempt?: number;
  payload?: JsonObject;
  ts?: string | Date;
};

export type EventLogger = {
  log: (event: LogEventInput) => void;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly runId: string,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.runId));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(`Warning: failed to close log file ${this.filePath}: ${formatErrorMessage(err)}`);
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(
        `Warning: failed to write log event to ${this.filePath}: ${formatErrorMessage(err)}`,
      );
    }
  }
}

export const silentLogger: EventLogger = { log: () => undefined };

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, runId: string): LogEvent {
  const { ts, type, phase, attempt, payload } = event;

  const result: LogEvent = {
    ts: typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow(),
    type,
    run_id: runId,
  };

  if (phase) {
    result.phase = phase;
  }
  if (attempt !== undefined) {
    result.attempt = attempt;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}
