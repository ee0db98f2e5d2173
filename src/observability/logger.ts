import { LOG_LEVELS, LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  level?: LogLevel;
}

export type LogWriter = (line: string) => void;

// stdout is reserved for rendered output, so every level goes to stderr.
const writeToStderr: LogWriter = (line) => {
  console.error(line);
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private readonly context: Required<LoggerContext>;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, writer: LogWriter = writeToStderr) {
    this.context = { ...context, level: context.level ?? "info" };
    this.writer = writer;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component }, this.writer);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.context.level);
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writer(JSON.stringify(payload));
  }
}
