export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "SILENT";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
  SILENT: 100,
};

function isLogLevel(s: string): s is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, s);
}

function envLevel(): LogLevel {
  const raw = (process.env.TASKER_LOG_LEVEL ?? "").toUpperCase();
  return isLogLevel(raw) ? raw : "INFO";
}

export class Logger {
  private static _verbose = false;
  private static _level: LogLevel | null = null;

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }

  /** Overrides TASKER_LOG_LEVEL; pass null to go back to the environment. */
  static setLevel(level: LogLevel | null) { Logger._level = level; }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[Logger._level ?? envLevel()];
  }

  static info(...args: unknown[]) {
    if (Logger.enabled("INFO")) console.log(...args);
  }

  static warn(...args: unknown[]) {
    if (Logger.enabled("WARN")) console.warn(...args);
  }

  static error(...args: unknown[]) {
    if (Logger.enabled("ERROR")) console.error(...args);
  }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND a DEBUG level
    if (Logger._verbose && Logger.enabled("DEBUG")) console.log(...args);
  }
}
