/**
 * Console logger
 * Diagnostics go to stderr so stdout only carries device responses
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  dim: "\x1b[2m",
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class ConsoleLogger implements Logger {
  private minLevel: number;
  private color: boolean;
  private write: (line: string) => void;

  constructor(
    level: LogLevel = "info",
    options: { color?: boolean; write?: (line: string) => void } = {}
  ) {
    this.minLevel = LOG_LEVELS.indexOf(level);
    this.color = options.color ?? process.stderr.isTTY === true;
    this.write = options.write ?? ((line) => console.error(line));
  }

  debug(message: string): void {
    if (this.enabled("debug")) this.write(this.paint(COLORS.dim, `# ${message}`));
  }

  info(message: string): void {
    if (this.enabled("info")) this.write(message);
  }

  warn(message: string): void {
    if (this.enabled("warn")) this.write(this.paint(COLORS.yellow, `WARNING: ${message}`));
  }

  error(message: string): void {
    if (this.enabled("error")) this.write(this.paint(COLORS.red, `ERROR: ${message}`));
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.minLevel;
  }

  private paint(color: string, text: string): string {
    return this.color ? `${color}${text}${COLORS.reset}` : text;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Logger that keeps entries in memory (for tests)
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}
