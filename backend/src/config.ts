import { z } from 'zod';

const booleanFlag = z
  .string()
  .optional()
  .transform(value => (value || 'false').toLowerCase() === 'true');

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  MODEL_URL: optionalString,
  MODEL_FORMAT: z.enum(['layers', 'graph']).default('layers'),
  SUPABASE_URL: optionalString.pipe(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  PREDICTIONS_TABLE: z.string().min(1).default('predictions'),
  STORAGE_BUCKET: z.string().min(1).default('predictions'),
  STORE_IMAGES: booleanFlag,
  MAX_IMAGE_SIZE_BYTES: z.coerce.number().int().positive().default(8 * 1024 * 1024),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PERSIST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(100).default(50)
});

export type ModelFormat = 'layers' | 'graph';

export type AppConfig = {
  port: number;
  model: { url: string | undefined; format: ModelFormat };
  supabase: { url: string; serviceRoleKey: string } | null;
  predictionsTable: string;
  storageBucket: string;
  storeImages: boolean;
  maxImageSizeBytes: number;
  inferenceTimeoutMs: number;
  persistTimeoutMs: number;
  rateLimit: { windowMs: number; max: number };
  confidenceThreshold: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;

  if (Boolean(values.SUPABASE_URL) !== Boolean(values.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new Error('Invalid configuration: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together');
  }

  return {
    port: values.PORT,
    model: { url: values.MODEL_URL, format: values.MODEL_FORMAT },
    supabase:
      values.SUPABASE_URL && values.SUPABASE_SERVICE_ROLE_KEY
        ? { url: values.SUPABASE_URL, serviceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    predictionsTable: values.PREDICTIONS_TABLE,
    storageBucket: values.STORAGE_BUCKET,
    storeImages: values.STORE_IMAGES,
    maxImageSizeBytes: values.MAX_IMAGE_SIZE_BYTES,
    inferenceTimeoutMs: values.INFERENCE_TIMEOUT_MS,
    persistTimeoutMs: values.PERSIST_TIMEOUT_MS,
    rateLimit: { windowMs: values.RATE_LIMIT_WINDOW_MS, max: values.RATE_LIMIT_MAX },
    confidenceThreshold: values.CONFIDENCE_THRESHOLD
  };
}
