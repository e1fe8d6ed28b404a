import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DATABASE_URL: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(5000),
  // A card needs at least this many lessons before it can be accepted
  MIN_LESSONS_PER_ACCEPT: z.coerce.number().int().min(0).default(1),
  HISTORY_LIMIT: z.coerce.number().int().min(1).max(500).default(50),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface EngineOptions {
  minLessonsPerAccept: number;
  historyLimit: number;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  databaseUrl?: string;
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  engine: EngineOptions;
}

export const defaultEngineOptions: EngineOptions = {
  minLessonsPerAccept: 1,
  historyLimit: 50,
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join("; ")}`);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    databaseUrl: env.DATABASE_URL,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    engine: {
      minLessonsPerAccept: env.MIN_LESSONS_PER_ACCEPT,
      historyLimit: env.HISTORY_LIMIT,
    },
  };
}
