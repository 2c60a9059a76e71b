import { z } from 'zod';

/**
 * Process-level settings, read from environment variables.
 */
export const hostConfigSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  EVENTS_STREAM: z.string().min(1).default('events_stream'),
  QUEUE_CAPACITY: z.coerce.number().int().min(1).default(1000),
  BRIDGE_MAX_RESTARTS: z.coerce.number().int().min(0).default(0),
  BRIDGE_RESTART_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  FORWARD_RETRY_MS: z.coerce.number().int().min(0).default(1000),
  FORWARD_DRAIN_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  SOURCE_CONFIG: z.string().min(1).optional(),
});

export type HostConfig = z.infer<typeof hostConfigSchema>;

/**
 * Parses host settings from `env`. Empty strings count as unset.
 * Throws with every invalid variable listed.
 */
export function loadHostConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = hostConfigSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return parsed.data;
}
