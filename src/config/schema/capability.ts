import { z } from "zod";

export const CapabilityConfigSchema = z
  .object({
    module: z.string().min(1),
    options: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export type CapabilityConfig = z.infer<typeof CapabilityConfigSchema>;
