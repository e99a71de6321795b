/**
 * Environment configuration.
 *
 * Values come from process.env (a local .env file is loaded first) and are
 * validated once at import time. Invalid values fail fast with the zod issues.
 */

import 'dotenv/config';
import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Item type name used when WORK_ITEM_TYPE is unset; eligible for the first-type fallback. */
export const DEFAULT_WORK_ITEM_TYPE = 'Issue';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  PROJECT_API_BASE_URL: z.string().url().default('https://project.feishu.cn'),
  PROJECT_PLUGIN_TOKEN: optionalString,
  PROJECT_USER_KEY: optionalString,
  PROJECT_KEY: optionalString,
  PROJECT_NAME: optionalString,
  WORK_ITEM_TYPE: z.string().trim().min(1).default(DEFAULT_WORK_ITEM_TYPE),
  TENANT_GROUP_ID: z.coerce.number().int().min(0).default(0),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CONCURRENCY_LIMIT: z.coerce.number().int().min(1).max(10).default(2),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  MCP_TITLE: z.string().default('Work Item Metadata MCP'),
  MCP_VERSION: z.string().default('0.1.0'),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export const config: AppConfig = loadConfig();
