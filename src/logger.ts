import type { LogLevel } from "./schema-config.js";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type PrintLevel = Exclude<LogLevel, "silent">;

export class Logger {
  public constructor(
    private readonly level: LogLevel = "info",
    private readonly scope?: string
  ) {}

  /**
   * Returns a logger that prefixes every line with `[scope]`, e.g. the
   * worker pid.
   */
  public child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, nested);
  }

  public enabled(level: PrintLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  public debug(message: string): void {
    this.print("debug", message);
  }

  public info(message: string): void {
    this.print("info", message);
  }

  public warn(message: string): void {
    this.print("warn", message);
  }

  public error(message: string): void {
    this.print("error", message);
  }

  public format(
    level: PrintLevel,
    message: string,
    now: Date = new Date()
  ): string {
    const scope = this.scope ? ` [${this.scope}]` : "";
    const tag = level.toUpperCase();
    return `[${now.toISOString()}] [${tag}]${scope} ${message}`;
  }

  private print(level: PrintLevel, message: string): void {
    if (!this.enabled(level)) {
      return;
    }

    const output = this.format(level, message);
    if (level === "error" || level === "warn") {
      console.error(output);
      return;
    }

    console.log(output);
  }
}
