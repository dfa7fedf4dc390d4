import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';
import { TRAVERSAL_CONFIG } from '../entities/CursorConstants.js';

/**
 * Environment flags arrive as strings; only "true" and "1" switch them on.
 */
const flag = (defaultValue: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .default(defaultValue)
    .transform((value) =>
      typeof value === 'boolean' ? value : ['true', '1'].includes(value.trim().toLowerCase())
    );

/**
 * Centralised configuration schema for ziptree.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Upper bound on cursors visited by a single traversal driver call (0 = unlimited)
  ZIPTREE_TRAVERSAL_LIMIT: z.coerce
    .number()
    .int()
    .min(0)
    .default(TRAVERSAL_CONFIG.DEFAULT_MAX_STEPS),

  // Check capability objects with zod when a cursor is created
  ZIPTREE_VALIDATE_CAPABILITY: flag(true),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [
    // Order matters: later adapters win -> env overrides `.env` defaults.
    dotEnvAdapter({ path: '.env', silent: true }),
    envAdapter(),
  ],
});
