export type LogLevel = "error" | "warn" | "info" | "log" | "debug";

/**
 * Same surface as a language server connection console.
 */
export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  log(message: string): void;
  debug(message: string): void;
}

export class ConsoleLogger implements Logger {
  constructor(private readonly options: { debug?: boolean } = {}) {}

  error(message: string): void {
    console.error(`[ERROR] ${message}`);
  }

  warn(message: string): void {
    console.warn(`[WARN] ${message}`);
  }

  info(message: string): void {
    console.info(`[INFO] ${message}`);
  }

  log(message: string): void {
    console.log(message);
  }

  debug(message: string): void {
    if (!this.options.debug) return;
    console.debug(`[DEBUG] ${message}`);
  }
}

export type LogEntry = { level: LogLevel; message: string };

export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  log(message: string): void {
    this.entries.push({ level: "log", message });
  }

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  messages(level: LogLevel): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }
}
