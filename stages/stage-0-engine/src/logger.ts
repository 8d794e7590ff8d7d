import type {
  AttemptLog,
  ErrorLog,
  Logger,
  RequestLog,
  ResponseLog,
} from "./types.js";

export type LogLevel = "silent" | "error" | "info";

function toJson(entry: RequestLog | ResponseLog | ErrorLog | AttemptLog): string {
  return JSON.stringify(entry);
}

export function createConsoleLogger(level: LogLevel = "info"): Logger {
  return {
    logRequest(entry: RequestLog) {
      if (level === "info") {
        console.log(toJson(entry));
      }
    },
    logResponse(entry: ResponseLog) {
      if (level === "info") {
        console.log(toJson(entry));
      }
    },
    logError(entry: ErrorLog) {
      if (level === "info" || level === "error") {
        console.error(toJson(entry));
      }
    },
    logAttempt(entry: AttemptLog) {
      if (level === "info") {
        console.log(toJson(entry));
      } else if (level === "error" && entry.status === "exhausted") {
        console.error(toJson(entry));
      }
    },
  };
}

export function createSilentLogger(): Logger {
  return createConsoleLogger("silent");
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "silent" || value === "error" || value === "info";
}
