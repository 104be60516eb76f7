import type { LogFields, Logger } from "@maplink/types";

const write =
  (sink: (...args: unknown[]) => void) =>
  (event: string, fields?: LogFields): void => {
    if (fields) {
      sink(event, fields);
    } else {
      sink(event);
    }
  };

export const consoleLogger: Logger = {
  info: write(console.log),
  warn: write(console.warn),
  error: write(console.error),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);
