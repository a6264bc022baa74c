import * as path from "path";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_FILE: z.string().min(1).default("taskboard.db"),
  TOKEN_SECRET: z
    .string({ required_error: "is required" })
    .min(16, "must be at least 16 characters"),
  TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(30),
  ADMIN_EMAIL: z.string().email().optional(),
  ADMIN_PASSWORD: z.string().min(8).optional(),
  ADMIN_NAME: z.string().min(1).default("Administrator"),
});

export interface AdminSeed {
  email: string;
  password: string;
  fullName: string;
}

export interface AppConfig {
  port: number;
  /** Absolute path, or ":memory:". */
  databaseFile: string;
  tokenSecret: string;
  tokenTtlSeconds: number;
  admin: AdminSeed | null;
}

/**
 * Read configuration from the environment. There is no fallback signing
 * secret: startup fails until TOKEN_SECRET is set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const vars = parsed.data;

  if ((vars.ADMIN_EMAIL === undefined) !== (vars.ADMIN_PASSWORD === undefined)) {
    throw new Error(
      "Invalid configuration: ADMIN_EMAIL and ADMIN_PASSWORD must be set together"
    );
  }

  return {
    port: vars.PORT,
    databaseFile:
      vars.DATABASE_FILE === ":memory:"
        ? vars.DATABASE_FILE
        : path.resolve(vars.DATABASE_FILE),
    tokenSecret: vars.TOKEN_SECRET,
    tokenTtlSeconds: vars.TOKEN_TTL_MINUTES * 60,
    admin:
      vars.ADMIN_EMAIL !== undefined && vars.ADMIN_PASSWORD !== undefined
        ? {
            email: vars.ADMIN_EMAIL,
            password: vars.ADMIN_PASSWORD,
            fullName: vars.ADMIN_NAME,
          }
        : null,
  };
}
