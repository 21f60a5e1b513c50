// Application configuration management with environment variable parsing and validation
import { z } from 'zod';

const configSchema = z.object({
  port: z.number().min(1).max(65535),
  nodeEnv: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),

  // Extraction results live for one hour unless an operator overrides it
  cacheTtlSec: z.number().positive(),
  cacheMaxSize: z.number().int().positive(),
  cacheNamespace: z.string().min(1),

  maxStatsValue: z.number().int().nonnegative(),
  maxFragmentBytes: z.number().int().positive(),

  rateLimitMax: z.number().positive(),
  rateLimitTimeWindow: z.string(),
});

export type GatewayConfig = z.infer<typeof configSchema>;

const rawConfig = {
  port: Number.parseInt(process.env.GATEWAY_PORT || '7777', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',

  cacheTtlSec: Number.parseInt(process.env.CACHE_TTL_SEC || '3600', 10),
  cacheMaxSize: Number.parseInt(process.env.CACHE_MAX_SIZE || '1000', 10),
  cacheNamespace: process.env.CACHE_NAMESPACE || 'stats_counter_',

  maxStatsValue: Number.parseInt(process.env.MAX_STATS_VALUE || '1000000000000', 10),
  maxFragmentBytes: Number.parseInt(process.env.MAX_FRAGMENT_BYTES || '1048576', 10), // 1MB

  rateLimitMax: Number.parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
  rateLimitTimeWindow: process.env.RATE_LIMIT_TIME_WINDOW || '1 minute',
};

const configValidation = configSchema.safeParse(rawConfig);

if (!configValidation.success) {
  // biome-ignore lint/suspicious/noConsole: Configuration error logging is necessary at startup
  console.error('❌ Invalid configuration:', configValidation.error.issues);
  process.exit(1);
}

export const config: GatewayConfig = configValidation.data;
