import { z } from 'zod';
import { ConfigurationError } from './types.js';

export const DEFAULT_BASE_URL = 'https://app.visual-layer.com/api/v1';
export const DEFAULT_TIMEOUT_MS = 30_000;

const envSchema = z.object({
  VISUAL_LAYER_API_KEY: z.string().min(1, 'API key must not be empty'),
  VISUAL_LAYER_API_SECRET: z.string().min(1, 'API secret must not be empty'),
  VISUAL_LAYER_BASE_URL: z.string().url('Invalid base URL').optional().default(DEFAULT_BASE_URL),
  VISUAL_LAYER_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(DEFAULT_TIMEOUT_MS),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional()
    .default('warn'),
});

export interface ClientConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl: string;
  timeout: number;
  logLevel: string;
}

/**
 * Read client settings from environment variables.
 *
 * @throws ConfigurationError naming every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    apiKey: parsed.VISUAL_LAYER_API_KEY,
    apiSecret: parsed.VISUAL_LAYER_API_SECRET,
    baseUrl: parsed.VISUAL_LAYER_BASE_URL.replace(/\/$/, ''),
    timeout: parsed.VISUAL_LAYER_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}
