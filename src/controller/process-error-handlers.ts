import { logger } from "../logger";
import { isTransientError } from "../session/error-policy";
import { formatError } from "../session/errors";

declare global {
  // eslint-disable-next-line no-var
  var __pollbotProcessErrorHandlersRegistered: boolean | undefined;
}

export function handleUnhandledRejection(reason: unknown): void {
  if (isTransientError(reason)) {
    logger.warn(
      { error: formatError(reason), recoverable: true },
      "Suppressed recoverable unhandled rejection",
    );
    return;
  }
  logger.error({ error: formatError(reason) }, "Unhandled rejection");
}

export function handleUncaughtException(error: unknown): void {
  if (isTransientError(error)) {
    logger.warn(
      { error: formatError(error), recoverable: true },
      "Suppressed recoverable uncaught exception",
    );
    return;
  }
  logger.fatal({ error: formatError(error) }, "Uncaught exception");
  process.exitCode = 1;
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__pollbotProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__pollbotProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", handleUnhandledRejection);
  process.on("uncaughtException", handleUncaughtException);
}
