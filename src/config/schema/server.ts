import { z } from "zod";

export const DEFAULT_SERVER_HOST = "127.0.0.1";
export const DEFAULT_SERVER_PORT = 3988;
export const DEFAULT_REFRESH_MS = 2000;

export const ServerConfigSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    authToken: z.string().min(1).optional(),
    allowOrigins: z.array(z.string().min(1)).optional(),
    refreshMs: z.number().int().positive().optional(),
  })
  .strict();

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
