import { z } from "zod";

const DATABASE_NAME_RE = /^[a-zA-Z0-9_-]+$/;

const EnvSchema = z.object({
  // Mirrors psql's sslmode; "require" encrypts without verifying the server certificate.
  PGSSLMODE: z.enum(["disable", "require", "verify-full"]).default("require"),
  PGCONNECT_TIMEOUT: z.coerce.number().int().positive().max(300).default(10),
  PRECHECK_ADMIN_DATABASE: z.string().min(1).max(63).regex(DATABASE_NAME_RE).default("postgres"),
  PRECHECK_CONCURRENCY: z.coerce.number().int().positive().max(64).default(4),
  PRECHECK_PROBE_TIMEOUT_MS: z.coerce.number().int().min(100).max(10 * 60 * 1000).default(30_000),
  DB_POOL_MAX_PER_DATABASE: z.coerce.number().int().positive().max(16).default(2),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PRECHECK_REPORT_FORMAT: z.enum(["text", "json"]).default("text"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment:\n${msg}`);
  }
  return parsed.data;
}
