import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = {
  ts: string;
  type: string;
  command?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type EventSink = {
  log(event: LogEventInput): void;
};

type EventDefaults = {
  command?: string;
};

type LogFailureAction = "write" | "close";

export const noopEventSink: EventSink = {
  log: () => undefined,
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventSink {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    private readonly isDebugEnabled = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { payload, ts, type } = event;

  const result: LogEvent = {
    ts: typeof ts === "string" ? ts : (ts ?? new Date()).toISOString(),
    type,
  };

  if (defaults.command) {
    result.command = defaults.command;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logEvent(sink: EventSink, type: string, payload: JsonObject = {}): void {
  sink.log({ type, payload });
}

export function combineEventSinks(...sinks: EventSink[]): EventSink {
  return {
    log: (event) => {
      for (const sink of sinks) sink.log(event);
    },
  };
}

// One line per event on stderr, for --verbose.
export function createConsoleEventSink(write: (line: string) => void = console.error): EventSink {
  return {
    log: (event) => {
      const payload = event.payload && Object.keys(event.payload).length > 0 ? event.payload : null;
      write(payload ? `${event.type} ${JSON.stringify(payload)}` : event.type);
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
