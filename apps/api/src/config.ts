import { z } from "zod";

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATABASE_URL: z.string().url().optional(),
  PARTICIPANT_ID: z.string().min(1),
  PROTOCOL_ADDRESS: z.string().url(),
  NEGOTIATION_BATCH_SIZE: z.coerce.number().int().positive().default(5),
  NEGOTIATION_ITERATION_WAIT_MS: z.coerce.number().int().positive().default(1000),
  NEGOTIATION_LEASE_MS: z.coerce.number().int().positive().default(60_000),
  NEGOTIATION_SEND_RETRY_LIMIT: z.coerce.number().int().positive().default(7),
  NEGOTIATION_SEND_RETRY_BASE_DELAY_MS: z.coerce.number().int().positive().default(1000),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Validate the environment. Throws with every problem listed when it is unusable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  return parsed.data;
}
