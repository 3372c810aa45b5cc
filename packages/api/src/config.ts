// Server configuration
//
// Read once from the environment at startup. Storage is in-memory unless
// DATABASE_URL is set.

import { z } from 'zod';
import type { ContentFormatRules } from '@quire/protocol';
import { DEFAULT_CONTENT_FORMAT } from '@quire/protocol';
import type { LogLevel } from '@quire/runtime';

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DB_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CONTENT_PREFIX: z.string().min(1).optional(),
  CONTENT_SUFFIX: z.string().min(1).optional(),
  /** Comma-separated list */
  THUMBNAIL_PREFIXES: z.string().min(1).optional(),
});

export type AppConfig = {
  databaseUrl?: string;
  dbMaxConnections: number;
  port: number;
  logLevel: LogLevel;
  contentFormat: ContentFormatRules;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const thumbnailPrefixes = parsed.THUMBNAIL_PREFIXES?.split(',')
    .map((prefix) => prefix.trim())
    .filter((prefix) => prefix.length > 0);

  return {
    databaseUrl: parsed.DATABASE_URL,
    dbMaxConnections: parsed.DB_MAX_CONNECTIONS,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    contentFormat: {
      contentPrefix: parsed.CONTENT_PREFIX ?? DEFAULT_CONTENT_FORMAT.contentPrefix,
      contentSuffix: parsed.CONTENT_SUFFIX ?? DEFAULT_CONTENT_FORMAT.contentSuffix,
      thumbnailPrefixes:
        thumbnailPrefixes && thumbnailPrefixes.length > 0
          ? thumbnailPrefixes
          : DEFAULT_CONTENT_FORMAT.thumbnailPrefixes,
    },
  };
}
