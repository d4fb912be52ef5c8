import chalk from "chalk";

type LogLevel = "success" | "info" | "warn" | "error";

interface LogOptions {
  scope?: string;
  data?: unknown;
}

interface Logger {
  success: (message: string, options?: LogOptions) => void;
  info: (message: string, options?: LogOptions) => void;
  warn: (message: string, options?: LogOptions) => void;
  error: (message: string, options?: LogOptions) => void;
}

const formatData = (data: unknown): string => {
  if (data === undefined) {
    return "";
  }
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  if (typeof data === "string") {
    return data;
  }
  if (typeof data === "number" || typeof data === "boolean") {
    return String(data);
  }
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return "Unable to serialize log data.";
  }
};

const formatScope = (options?: LogOptions) =>
  options?.scope ? ` ${chalk.gray(`[${options.scope}]`)}` : "";

const appendData = (
  base: string,
  options?: LogOptions,
  color: (value: string) => string = (value) => value
) => {
  const data = formatData(options?.data);
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${color(data)}`;
};

const formatLine = (
  level: LogLevel,
  message: string,
  options?: LogOptions
) => {
  const timestamp = chalk.gray(new Date().toLocaleString());
  const scope = formatScope(options);

  if (level === "success") {
    return appendData(
      `${timestamp} ${chalk.greenBright("SUCCESS")}${scope} ${message}`,
      options
    );
  }
  if (level === "warn") {
    return appendData(
      `${timestamp} ${chalk.yellowBright(`WARN${scope} ${message}`)}`,
      options,
      chalk.yellowBright
    );
  }
  if (level === "error") {
    return appendData(
      `${timestamp} ${chalk.redBright("ERROR")}${scope} ${message}`,
      options
    );
  }
  return appendData(`${timestamp}${scope} ${message}`, options);
};

const writeLog = (level: LogLevel, message: string, options?: LogOptions) => {
  const line = formatLine(level, message, options);
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export const logger: Logger = {
  success: (message, options) => writeLog("success", message, options),
  info: (message, options) => writeLog("info", message, options),
  warn: (message, options) => writeLog("warn", message, options),
  error: (message, options) => writeLog("error", message, options),
};

export { formatData };
export type { LogOptions, Logger };
