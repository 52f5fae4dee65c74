import { z } from "zod";
import { CapabilityConfigSchema } from "./capability";
import { LoggingSchema } from "./logging";
import { ServerConfigSchema } from "./server";
import { SessionsConfigSchema } from "./sessions";

export const PollbotConfigSchema = z
  .object({
    $schema: z.string().optional(),
    logging: LoggingSchema.optional(),
    server: ServerConfigSchema.optional(),
    sessions: SessionsConfigSchema.optional(),
    capability: CapabilityConfigSchema.optional(),
  })
  .strict();

export type PollbotConfig = z.infer<typeof PollbotConfigSchema>;
