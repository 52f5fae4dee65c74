function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Raised by a capability call; `transient` marks failures worth retrying. */
export class CapabilityError extends Error {
  readonly transient: boolean;

  constructor(message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CapabilityError";
    this.transient = options.transient ?? false;
  }
}

export class AuthenticationError extends Error {
  constructor(cause: unknown) {
    super(messageOf(cause), { cause });
    this.name = "AuthenticationError";
  }
}

export class DetectionError extends Error {
  constructor(cause: unknown) {
    super(messageOf(cause), { cause });
    this.name = "DetectionError";
  }
}

export class AnswerError extends Error {
  constructor(
    readonly pollId: string,
    cause: unknown,
  ) {
    super(messageOf(cause), { cause });
    this.name = "AnswerError";
  }
}

export class DuplicateSessionTokenError extends Error {
  constructor(readonly token: string) {
    super(`Session token already registered: ${token}`);
    this.name = "DuplicateSessionTokenError";
  }
}

export class InvalidSessionConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid session config: ${issues.join("; ")}`);
    this.name = "InvalidSessionConfigError";
  }
}

export function formatError(error: unknown): string {
  return messageOf(error);
}
