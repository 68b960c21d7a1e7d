// config/appConfig.ts
import { z } from "zod";

export interface AppConfig {
  port: number;
  nodeEnv: string;
  adminUsername: string;
  adminPassword: string;
  sessionTtlHours: number;
  databaseUrl?: string;
  databaseName?: string;
  /** Empty means any origin. */
  corsOrigins: string[];
}

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(4000)),
  NODE_ENV: z.preprocess(blankToUndefined, z.string().default("development")),
  ADMIN_USERNAME: z.preprocess(blankToUndefined, z.string().default("admin")),
  ADMIN_PASSWORD: z.preprocess(blankToUndefined, z.string().default("password123")),
  ADMIN_SESSION_TTL_HOURS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(24)),
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
  DATABASE_NAME: z.preprocess(blankToUndefined, z.string().optional()),
  CORS_ORIGINS: z.string().optional(),
});

const parseCorsOrigins = (raw: string | undefined): string[] =>
  (raw ?? "")
    .split(/[,\s]+/)
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

/**
 * Builds the configuration once at startup. Nothing else reads `process.env`;
 * the result is handed to every component that needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment variable ${issue.path.join(".")}: ${issue.message}`);
  }
  const vars = parsed.data;

  return Object.freeze({
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    adminUsername: vars.ADMIN_USERNAME,
    adminPassword: vars.ADMIN_PASSWORD,
    sessionTtlHours: vars.ADMIN_SESSION_TTL_HOURS,
    databaseUrl: vars.DATABASE_URL,
    databaseName: vars.DATABASE_NAME,
    corsOrigins: parseCorsOrigins(vars.CORS_ORIGINS),
  });
}
