import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => value === 'true');

const csv = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? undefined
      : value
          .split(',')
          .map((segment) => segment.trim())
          .filter((segment) => segment.length > 0)
  );

export const ConfigSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HTTP_HOST: z.string().default('0.0.0.0'),
    HTTP_PORT: z.coerce.number().int().positive().default(8080),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    STORAGE_DRIVER: z.enum(['memory', 's3']).default('memory'),
    S3_BUCKET: z.string().min(1).optional(),
    S3_REGION: z.string().min(1).default('us-east-1'),
    S3_ENDPOINT: z.string().url().optional(),
    S3_FORCE_PATH_STYLE: booleanFlag,
    STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    STORE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    METRICS_SNAPSHOT_PATH: z.string().min(1).default('data/metrics.json'),
    CRAWL_MAX_DEPTH: z.coerce.number().int().min(0).default(4),
    REBUILD_CONCURRENCY: z.coerce.number().int().positive().default(8),
    VIEW_CONCURRENCY: z.coerce.number().int().positive().default(8),
    SIGNED_URL_TTL_SECONDS: z.coerce.number().int().positive().max(604_800).default(3600),
    INLINE_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
    RESERVED_SEGMENTS: csv
  })
  .superRefine((value, ctx) => {
    if (value.STORAGE_DRIVER === 's3' && !value.S3_BUCKET) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['S3_BUCKET'], message: 'S3_BUCKET is required for the s3 driver' });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | undefined;

export const loadConfig = (): Config => {
  if (!config) {
    config = ConfigSchema.parse(process.env);
  }
  return config;
};

export const resetConfigForTests = () => {
  config = undefined;
};
