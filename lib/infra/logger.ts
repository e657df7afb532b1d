import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
  child(scope: string): Logger;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = String(raw || "").trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  if (value === "warning") return "warn";
  return fallback;
}

function colorLevel(level: LogLevel): string {
  const label = level.toUpperCase().padEnd(5);
  if (level === "error") return pc.red(label);
  if (level === "warn") return pc.yellow(label);
  if (level === "debug") return pc.dim(label);
  return pc.cyan(label);
}

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly scope = "",
    private readonly write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
  ) {}

  private emit(level: LogLevel, message: string, error?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const scope = this.scope ? ` ${pc.magenta(`[${this.scope}]`)}` : "";
    let line = `${pc.dim(new Date().toISOString())} ${colorLevel(level)}${scope} ${message}`;
    if (error !== undefined) {
      line += `: ${errorMessage(error)}`;
      if (level === "error" && error instanceof Error && error.stack && this.level === "debug") {
        line += `\n${pc.dim(error.stack)}`;
      }
    }
    this.write(line);
  }

  debug(message: string): void {
    this.emit("debug", message);
  }

  info(message: string): void {
    this.emit("info", message);
  }

  warn(message: string, error?: unknown): void {
    this.emit("warn", message, error);
  }

  error(message: string, error?: unknown): void {
    this.emit("error", message, error);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new ConsoleLogger(this.level, nested, this.write);
  }
}

class SilentLogger implements Logger {
  debug(): void {}

  info(): void {}

  warn(): void {}

  error(): void {}

  child(): Logger {
    return this;
  }
}

export function createSilentLogger(): Logger {
  return new SilentLogger();
}

export function createLogger(scope = "feedpress", level = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  return new ConsoleLogger(level, scope);
}
