import { z } from 'zod';

const SessionConfigSchema = z.object({
  ttlSec: z.coerce.number().min(1).default(1800),
  maxEntries: z.coerce.number().int().min(1).default(10_000),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export function loadSessionConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const config = SessionConfigSchema.parse({
    ttlSec: env.SESSION_TTL_SEC || 1800,
    maxEntries: env.SESSION_MAX_ENTRIES || 10_000,
  });
  return config;
}
