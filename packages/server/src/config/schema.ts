import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const configSchema = z.object({
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(29316),
    maxBodyBytes: z.number().int().positive().default(5 * 1024 * 1024),
  }).default({}),
  mongodb: z.object({
    uri: z.string(),
    collectionName: z.string().default('subscriptions'),
  }),
  redis: z.object({
    url: z.string().url(),
  }),
  outbox: z.object({
    streamKey: z.string().default('hubrelay:notifications'),
    maxStreamLength: z.number().int().nonnegative().default(100_000),
    dedupeTtlSeconds: z.number().int().nonnegative().default(86_400),
  }).default({}),
  secrets: z.object({
    webhookKey: z.string().min(16),
  }),
  aggregation: z.object({
    // Negative disables coalescing
    timeoutMs: z.number().int().min(-1).default(1000),
  }).default({}),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
  }).default({}),
  health: z.object({
    enabled: z.boolean().default(true),
    port: z.number().int().positive().default(9090),
  }).default({}),
});

export type ValidatedConfig = z.infer<typeof configSchema>;
