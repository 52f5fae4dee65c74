import { formatError } from "./errors";

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1000;

export interface SessionErrorDecision {
  retry: boolean;
  delayMs: number;
  reason: "transient_error" | "retries_exhausted" | "terminal_error";
}

export interface SessionErrorPolicy {
  readonly maxRetries: number;
  /** `attempt` counts failures already retried for the current call, starting at 0. */
  decide(error: unknown, attempt: number): SessionErrorDecision;
}

function hasTransientFlag(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  if ("transient" in error && error.transient === true) {
    return true;
  }
  return "cause" in error && error.cause !== error && hasTransientFlag(error.cause);
}

export function isTransientError(error: unknown): boolean {
  if (hasTransientFlag(error)) {
    return true;
  }
  const lower = formatError(error).toLowerCase();
  return (
    lower.includes("timeout") ||
    lower.includes("timed out") ||
    lower.includes("temporarily unavailable") ||
    lower.includes("network") ||
    lower.includes("econnreset") ||
    lower.includes("econnrefused") ||
    lower.includes("socket hang up") ||
    lower.includes("rate limit") ||
    /\b5\d\d\b/.test(lower)
  );
}

export class DefaultSessionErrorPolicy implements SessionErrorPolicy {
  constructor(
    readonly maxRetries: number = DEFAULT_MAX_RETRIES,
    private readonly baseDelayMs: number = DEFAULT_BASE_DELAY_MS,
  ) {}

  decide(error: unknown, attempt: number): SessionErrorDecision {
    if (!isTransientError(error)) {
      return { retry: false, delayMs: 0, reason: "terminal_error" };
    }

    if (attempt < this.maxRetries) {
      return {
        retry: true,
        delayMs: this.baseDelayMs * 2 ** attempt,
        reason: "transient_error",
      };
    }

    return { retry: false, delayMs: 0, reason: "retries_exhausted" };
  }
}
