export const LEVEL_PRIORITY = {
  none: 0,
  error: 1,
  warning: 2,
  info: 3,
  debug: 4,
  all: 5,
} as const satisfies Record<string, number>;

export type LogLevel = keyof typeof LEVEL_PRIORITY;

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export type LogFields = Record<string, string | number | boolean | null>;

export class Logger {
  readonly level: LogLevel;
  readonly scope: string | undefined;
  private threshold: number;

  constructor(level: LogLevel = DEFAULT_LOG_LEVEL, scope?: string) {
    this.level = level;
    this.scope = scope;
    this.threshold = LEVEL_PRIORITY[level];
  }

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  error(msg: string, fields?: LogFields): void {
    if (this.threshold >= LEVEL_PRIORITY.error) {
      console.error(this.format("ERROR", msg, fields));
    }
  }

  warn(msg: string, fields?: LogFields): void {
    if (this.threshold >= LEVEL_PRIORITY.warning) {
      console.warn(this.format("WARN", msg, fields));
    }
  }

  info(msg: string, fields?: LogFields): void {
    if (this.threshold >= LEVEL_PRIORITY.info) {
      console.log(this.format("INFO", msg, fields));
    }
  }

  debug(msg: string, fields?: LogFields): void {
    if (this.threshold >= LEVEL_PRIORITY.debug) {
      console.log(this.format("DEBUG", msg, fields));
    }
  }

  private format(label: string, msg: string, fields?: LogFields): string {
    const scope = this.scope ? ` [${this.scope}]` : "";
    const suffix =
      fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
    return `[${new Date().toISOString()}] [${label}]${scope} ${msg}${suffix}`;
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}
