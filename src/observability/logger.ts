import crypto from "node:crypto";

export interface LogContext {
  runId: string;
  commitSha?: string;
  branch?: string;
}

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  commitSha?: string;
  branch?: string;
}

export type LogSink = (entry: LogEntry) => void;

const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === "error") console.error(line);
  else console.log(line);
};

class Logger {
  private context: LogContext | null = null;
  private sink: LogSink = consoleSink;

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  /** Replaces the output sink; passing nothing restores console output. */
  setSink(sink?: LogSink): void {
    this.sink = sink ?? consoleSink;
  }

  private log(
    level: LogLevel,
    phase: string,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId: this.context?.runId || "unknown",
      phase,
      message,
      data,
    };
    if (this.context?.commitSha) entry.commitSha = this.context.commitSha;
    if (this.context?.branch) entry.branch = this.context.branch;
    this.sink(entry);
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log("info", phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log("warn", phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log("error", phase, message, data);
  }
}

export const logger = new Logger();

export function generateRunId(): string {
  return crypto.randomBytes(8).toString("hex");
}
