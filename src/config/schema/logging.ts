import { z } from "zod";

export const LoggingSchema = z
  .object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).optional(),
  })
  .strict();

export type LoggingConfig = z.infer<typeof LoggingSchema>;
