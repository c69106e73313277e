import { getRequestId } from "./request-context";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
) {
  const entry = {
    level,
    message,
    ts: Date.now(),
    requestId: getRequestId() ?? null,
    ...meta,
  };

  // JSON-only output (log aggregation safe)
  if (level === "ERROR") {
    console.error(JSON.stringify(entry));
    return;
  }
  console.log(JSON.stringify(entry));
}

export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return {
      errorName: err.name,
      errorMessage: err.message,
      stack: process.env.NODE_ENV === "production" ? undefined : err.stack,
    };
  }
  return { errorValue: String(err) };
}
