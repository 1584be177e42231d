import { randomUUID } from "node:crypto";
import { isAnnotationContractError } from "./errors.js";

type LogLevel = "info" | "warn" | "error";
type LogFields = Record<string, unknown>;

/** One annotation run over a batch; every line it logs carries these fields. */
export type AnnotationRun = {
  readonly runId: string;
  readonly stage: string;
  readonly documents: number;
  readonly startedAt: number;
};

const MAX_MESSAGE_LENGTH = 240;

export function toErrorMessage(error: unknown): string {
  const raw =
    error instanceof Error ? error.message : typeof error === "string" ? error : "unknown error";
  const message = raw.replace(/\s+/g, " ").trim();
  return message.length <= MAX_MESSAGE_LENGTH
    ? message
    : `${message.slice(0, MAX_MESSAGE_LENGTH - 1)}…`;
}

// stdout belongs to the MCP stdio transport; every level goes to stderr
function writeLine(level: LogLevel, event: string, fields: LogFields) {
  console.error(JSON.stringify({ ts: new Date().toISOString(), level, event, ...fields }));
}

function runFields(run: AnnotationRun): LogFields {
  return {
    runId: run.runId,
    stage: run.stage,
    documents: run.documents,
    elapsedMs: Date.now() - run.startedAt,
  };
}

export function startRun(stage: string, documents: number): AnnotationRun {
  const run: AnnotationRun = {
    runId: randomUUID().slice(0, 8),
    stage,
    documents,
    startedAt: Date.now(),
  };
  writeLine("info", "run.start", runFields(run));
  return run;
}

export function logRunEvent(
  run: AnnotationRun,
  event: string,
  fields: LogFields = {},
  level: Exclude<LogLevel, "error"> = "info",
) {
  writeLine(level, event, { ...runFields(run), ...fields });
}

export function finishRun(run: AnnotationRun, fields: LogFields = {}) {
  writeLine("info", "run.end", { ...runFields(run), ...fields });
}

/** Contract errors also log their detail record so the offending span or type is visible. */
export function failRun(run: AnnotationRun, error: unknown) {
  writeLine("error", `${run.stage}.failed`, {
    ...runFields(run),
    message: toErrorMessage(error),
    ...(isAnnotationContractError(error) ? { details: error.details } : {}),
  });
}

/** For collaborators that log outside a run (registry fallbacks, transport). */
export function warnLog(event: string, fields: LogFields = {}) {
  writeLine("warn", event, fields);
}
