export type LogLevel = "info" | "warn" | "error";

export type Logger = (level: LogLevel, message: string, meta?: Record<string, unknown>) => void;

export const noopLogger: Logger = () => {};

/** Logger that writes one line per event to the console. */
export const consoleLogger: Logger = (level, message, meta) => {
  const line = meta ? `${message} ${JSON.stringify(meta)}` : message;
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.info(line);
};
