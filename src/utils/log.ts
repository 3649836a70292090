export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

function formatValue(value: string | number | boolean | null): string {
  const text = String(value);
  return /[\s"=]/.test(text) ? JSON.stringify(text) : text;
}

export function formatLogLine(level: LogLevel, message: string, fields?: LogFields): string {
  const parts = [`[${level.toUpperCase()}]`, message];
  for (const [key, value] of Object.entries(fields ?? {})) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(" ");
}

export function createConsoleLogger(): Logger {
  return {
    info: (message, fields) => console.log(formatLogLine("info", message, fields)),
    warn: (message, fields) => console.warn(formatLogLine("warn", message, fields)),
    error: (message, fields) => console.error(formatLogLine("error", message, fields))
  };
}
