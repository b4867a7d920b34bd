import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  // Comma-separated rule ids, e.g. "TitleFromPosition,Filepart2EpisodeTitle"
  EPISODE_TITLE_DISABLED_RULES: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    ),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(`Invalid environment: ${result.error.message}`, fields);
  }
  return result.data;
}

export const config: AppConfig = loadConfig();
