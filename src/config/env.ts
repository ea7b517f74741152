import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // ─── Slack defaults (used when a task does not carry its own) ────
  SLACK_TOKEN: z.string().min(1).optional(),
  SLACK_DOMAIN: z.string().min(1).optional(),

  // ─── HTTP service ─────────────────────────────────────────────────
  ALLOWED_ORIGINS: z.string().default('http://localhost:5173'),
  // Bearer key for /tasks. Unset disables the task routes.
  API_KEY: z.string().min(16).optional(),
  // Root for uploadFile paths sent over HTTP. Unset disables uploads there.
  UPLOAD_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
      process.exit(1);
    }
    _env = parsed.data;
  }
  return _env;
}

/** Parse an arbitrary env record without touching the cached process env. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}
