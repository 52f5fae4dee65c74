import { z } from "zod";
import type { SessionConfig } from "./types";
import {
  DEFAULT_CLOSED_WAIT_SECONDS,
  DEFAULT_LIFETIME_SECONDS,
  DEFAULT_OPEN_WAIT_SECONDS,
  LOGIN_MODES,
  MAX_WAIT_SECONDS,
  type SessionDefaults,
} from "../config/schema/sessions";
import { InvalidSessionConfigError } from "./errors";

const requiredText = (label: string) =>
  z
    .string({ error: `${label} is required` })
    .trim()
    .min(1, { error: `${label} is required` });

export const SessionConfigInputSchema = z
  .object({
    identity: requiredText("identity"),
    secret: z
      .string({ error: "secret is required" })
      .refine((value) => value.trim().length > 0, { error: "secret is required" }),
    host: requiredText("host"),
    loginMode: z.enum(LOGIN_MODES).optional(),
    lifetimeSeconds: z.number().positive().optional(),
    closedWaitSeconds: z.number().nonnegative().max(MAX_WAIT_SECONDS).optional(),
    openWaitSeconds: z.number().nonnegative().max(MAX_WAIT_SECONDS).optional(),
  })
  .strict();

export type SessionConfigInput = z.input<typeof SessionConfigInputSchema>;

/**
 * Validates operator input and returns a frozen {@link SessionConfig}. Values missing
 * from the input come from `defaults`, then from the built-in defaults.
 *
 * The secret is kept verbatim; identity and host are trimmed.
 */
export function createSessionConfig(
  input: unknown,
  defaults: SessionDefaults = {},
): SessionConfig {
  const result = SessionConfigInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSessionConfigError(
      result.error.issues.map((issue) => {
        const field = issue.path.join(".");
        return field ? `${field}: ${issue.message}` : issue.message;
      }),
    );
  }
  const parsed = result.data;
  return Object.freeze({
    identity: parsed.identity,
    secret: parsed.secret,
    host: parsed.host,
    loginMode: parsed.loginMode ?? defaults.loginMode ?? "standard",
    lifetimeSeconds: parsed.lifetimeSeconds ?? defaults.lifetimeSeconds ?? DEFAULT_LIFETIME_SECONDS,
    closedWaitSeconds:
      parsed.closedWaitSeconds ?? defaults.closedWaitSeconds ?? DEFAULT_CLOSED_WAIT_SECONDS,
    openWaitSeconds:
      parsed.openWaitSeconds ?? defaults.openWaitSeconds ?? DEFAULT_OPEN_WAIT_SECONDS,
  });
}

/** Config summary safe for logs and API responses. */
export function describeSessionConfig(config: SessionConfig): Record<string, unknown> {
  return {
    identity: config.identity,
    host: config.host,
    loginMode: config.loginMode,
    lifetimeSeconds: config.lifetimeSeconds,
    closedWaitSeconds: config.closedWaitSeconds,
    openWaitSeconds: config.openWaitSeconds,
  };
}
