import { z } from "zod";

export const LOGIN_MODES = ["standard", "institutional-sso"] as const;
export type LoginMode = (typeof LOGIN_MODES)[number];

export const DEFAULT_LIFETIME_SECONDS = 4800;
export const DEFAULT_CLOSED_WAIT_SECONDS = 5;
export const DEFAULT_OPEN_WAIT_SECONDS = 5;
export const DEFAULT_STOP_GRACE_MS = 5000;
// One Node timer's limit, in whole seconds.
export const MAX_WAIT_SECONDS = 2_147_483;

export const SessionRetryConfigSchema = z
  .object({
    maxRetries: z.number().int().nonnegative().optional(),
    baseDelayMs: z.number().int().nonnegative().optional(),
  })
  .strict();

export const SessionDefaultsSchema = z
  .object({
    loginMode: z.enum(LOGIN_MODES).optional(),
    lifetimeSeconds: z.number().positive().optional(),
    closedWaitSeconds: z.number().nonnegative().max(MAX_WAIT_SECONDS).optional(),
    openWaitSeconds: z.number().nonnegative().max(MAX_WAIT_SECONDS).optional(),
  })
  .strict();

export const SessionsConfigSchema = z
  .object({
    defaults: SessionDefaultsSchema.optional(),
    retry: SessionRetryConfigSchema.optional(),
    stopGraceMs: z.number().int().nonnegative().optional(),
    // Absent means unbounded: events stay buffered until a controller drains them.
    maxBufferedEvents: z.number().int().positive().optional(),
  })
  .strict();

export type SessionDefaults = z.infer<typeof SessionDefaultsSchema>;
export type SessionRetryConfig = z.infer<typeof SessionRetryConfigSchema>;
export type SessionsConfig = z.infer<typeof SessionsConfigSchema>;
