/**
 * Namespaced logger backed by the console.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  namespace?: string;
}

export class Logger {
  readonly level: LogLevel;
  readonly namespace: string | undefined;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "warn";
    this.namespace = options.namespace;
  }

  /**
   * Logger for a sub-component; namespaces nest with ":".
   */
  child(namespace: string): Logger {
    const ns = this.namespace ? `${this.namespace}:${namespace}` : namespace;
    return new Logger({ level: this.level, namespace: ns });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level] && level !== "silent";
  }

  debug(text: string): void {
    if (this.isEnabled("debug")) console.debug(this.format(text));
  }

  info(text: string): void {
    if (this.isEnabled("info")) console.info(this.format(text));
  }

  warn(text: string): void {
    if (this.isEnabled("warn")) console.warn(this.format(text));
  }

  error(text: string): void {
    if (this.isEnabled("error")) console.error(this.format(text));
  }

  private format(text: string): string {
    return this.namespace ? `[${this.namespace}] ${text}` : text;
  }
}

/** Logger that prints nothing */
export const silentLogger = new Logger({ level: "silent" });
