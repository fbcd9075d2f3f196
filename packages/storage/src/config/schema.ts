import { z } from "zod";
import { DEFAULT_DELIMITER } from "../types";

const S3AdapterConfigSchema = z.object({
  bucket: z.string().min(1),
  region: z.string().min(1).default("us-east-1"),
  endpoint: z.string().url().optional(),
  forcePathStyle: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(10_000),
  retryAttempts: z.number().int().min(1).max(10).default(3),
  delimiter: z.string().length(1).default(DEFAULT_DELIMITER),
});

export type S3AdapterConfig = z.infer<typeof S3AdapterConfigSchema>;

export function parseS3AdapterConfig(input: unknown): S3AdapterConfig {
  const parsed = S3AdapterConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid S3 adapter configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}
