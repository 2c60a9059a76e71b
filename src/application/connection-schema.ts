import { z } from 'zod';
import { StartupError } from '../domain/index.js';
import type { ConnectionConfig } from '../domain/index.js';

/**
 * Zod schema for a broker source definition.
 *
 * Only `host`, `port` and `topic` matter to the bridge. Credentials, TLS,
 * client id and QoS are passed through to the transport untouched.
 */
export const connectionConfigSchema = z.object({
  host: z.string().trim().min(1, 'must be a non-empty string'),
  port: z
    .number()
    .int('must be an integer')
    .min(1, 'must be between 1 and 65535')
    .max(65535, 'must be between 1 and 65535'),
  topic: z.string().min(1, 'must be a non-empty string'),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0),
  client_id: z.string().min(1).optional(),
  credentials: z
    .object({
      username: z.string().min(1, 'must be a non-empty string'),
      password: z.string().optional(),
    })
    .optional(),
  tls: z
    .object({
      ca_certs: z.string().min(1).optional(),
      client_cert: z.string().min(1).optional(),
      client_key: z.string().min(1).optional(),
      reject_unauthorized: z.boolean().optional(),
    })
    .optional(),
});

export type ConnectionConfigInput = z.input<typeof connectionConfigSchema>;

/**
 * Validates an untyped source definition.
 *
 * Throws StartupError naming the first invalid field; never touches the
 * network.
 */
export function parseConnectionConfig(raw: unknown): ConnectionConfig {
  const parsed = connectionConfigSchema.safeParse(raw);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'source';
    const reason = issue?.message ?? 'invalid value';
    throw new StartupError(`Invalid source configuration: ${field}: ${reason}`, {
      field,
      cause: parsed.error,
    });
  }

  const { credentials, tls, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    credentials: credentials ? Object.freeze({ ...credentials }) : undefined,
    tls: tls ? Object.freeze({ ...tls }) : undefined,
  });
}
