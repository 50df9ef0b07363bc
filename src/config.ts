import { z } from 'zod';

import { ConfigurationError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.prd.realitydefender.xyz';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_CONCURRENCY = 5;

/** Polling budget used by `detectFile` when the caller does not pass one. */
export const DEFAULT_DETECT_POLLING = {
  maxAttempts: 150,
  pollingIntervalMs: 2000,
} as const;

export const clientConfigSchema = z.object({
  apiKey: z
    .string({ required_error: 'API key is required' })
    .trim()
    .min(1, 'API key is required'),
  baseUrl: z
    .string()
    .trim()
    .min(1, 'Base URL cannot be empty')
    .url('Base URL must be a valid URL')
    .refine((value) => /^https?:\/\//i.test(value), 'Base URL must use http or https')
    .transform((value) => value.replace(/\/+$/, '')),
  timeoutMs: z.number().int().positive(),
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;

export interface ClientConfigInput {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export const resolveConfig = (partial: ClientConfigInput = {}): ClientConfig => {
  const merged = {
    apiKey: partial.apiKey,
    baseUrl: partial.baseUrl ?? DEFAULT_BASE_URL,
    timeoutMs: partial.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };

  const parsed = clientConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ConfigurationError(issue?.message ?? 'unknown validation failure');
  }
  return parsed.data;
};

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const timeout = env.AUTHENTICITY_TIMEOUT_MS;
  return resolveConfig({
    apiKey: env.AUTHENTICITY_API_KEY,
    baseUrl: env.AUTHENTICITY_BASE_URL,
    timeoutMs: timeout ? Number(timeout) : undefined,
  });
}
