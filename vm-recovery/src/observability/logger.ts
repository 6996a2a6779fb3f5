export interface LogContext {
  readonly component?: string;
  readonly restorePoint?: string;
  readonly vmName?: string;
  readonly namespace?: string;
  readonly phase?: string;
  readonly [key: string]: unknown;
}

export type LogFormat = "json" | "text";

export interface LoggerOptions {
  readonly format?: LogFormat;
  /** Route every level to stderr so stdout stays free for command output. */
  readonly stderrOnly?: boolean;
}

export interface Logger {
  child(context: LogContext): Logger;
  info(message: string, fields?: LogContext): void;
  warn(message: string, fields?: LogContext): void;
  error(message: string, fields?: LogContext): void;
}

type LogLevel = "info" | "warn" | "error";

export function createLogger(
  context: LogContext = {},
  options: LoggerOptions = {},
): Logger {
  return {
    child(childContext: LogContext): Logger {
      return createLogger(
        {
          ...context,
          ...compact(childContext),
        },
        options,
      );
    },
    info(message: string, fields?: LogContext): void {
      writeLog("info", message, context, fields, options);
    },
    warn(message: string, fields?: LogContext): void {
      writeLog("warn", message, context, fields, options);
    },
    error(message: string, fields?: LogContext): void {
      writeLog("error", message, context, fields, options);
    },
  };
}

function writeLog(
  level: LogLevel,
  message: string,
  context: LogContext,
  fields: LogContext | undefined,
  options: LoggerOptions,
): void {
  const merged = {
    ...compact(context),
    ...compact(fields),
  };

  const serialized =
    options.format === "text"
      ? formatText(level, message, merged)
      : JSON.stringify({
          ts: new Date().toISOString(),
          level,
          message,
          ...merged,
        });

  if (level === "error" || options.stderrOnly) {
    console.error(serialized);
    return;
  }

  if (level === "warn") {
    console.warn(serialized);
    return;
  }

  console.log(serialized);
}

function formatText(
  level: LogLevel,
  message: string,
  fields: Record<string, unknown>,
): string {
  const pairs = Object.entries(fields)
    .filter(([key]) => key !== "component")
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  const suffix = pairs.length > 0 ? ` (${pairs.join(" ")})` : "";
  return `[${level.toUpperCase()}] ${message}${suffix}`;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function compact(input: LogContext | undefined): Record<string, unknown> {
  if (!input) {
    return {};
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
