import { z } from 'zod';

const CatalogConfigSchema = z.object({
  baseUrl: z.string().url().default('https://api4.thetvdb.com/v4'),
  apiKey: z.string().default(''),
  pin: z.string().optional(),
  maxAttempts: z.coerce.number().int().min(1).max(5).default(2),
  minTimeMs: z.coerce.number().int().min(0).default(100),
  maxConcurrent: z.coerce.number().int().min(1).default(4),
});

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;

export function loadCatalogConfig(): CatalogConfig {
  return CatalogConfigSchema.parse({
    baseUrl: process.env.TVDB_BASE_URL || undefined,
    apiKey: process.env.TVDB_API_KEY || undefined,
    pin: process.env.TVDB_PIN || undefined,
    maxAttempts: process.env.CATALOG_MAX_ATTEMPTS || undefined,
    minTimeMs: process.env.CATALOG_MIN_TIME_MS || undefined,
    maxConcurrent: process.env.CATALOG_MAX_CONCURRENCY || undefined,
  });
}
