import { z } from "zod";

export interface AppConfig {
  port: number;
  databasePath: string;
  corsOrigin: string;
  logRequests: boolean;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_PATH: z.string().min(1).default("trivia.db"),
  CORS_ORIGIN: z.string().min(1).default("*"),
  LOG_REQUESTS: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

/**
 * Reads settings from the environment (populated from .env by dotenv)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid configuration - ${problems}`);
  }

  return {
    port: parsed.data.PORT,
    databasePath: parsed.data.DATABASE_PATH,
    corsOrigin: parsed.data.CORS_ORIGIN,
    logRequests: parsed.data.LOG_REQUESTS,
  };
}
