import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

// Settings are namespaced so the host process's own variables never reach the schema.
const EnvSchema = z.object({
  AUCTION_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  AUCTION_MAX_BIDS: z.coerce.number().int().positive().default(10000)
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return EnvSchema.parse(source);
}

export const env = parseEnv(process.env);
