import { z } from 'zod';

export const rowErrorPolicySchema = z.enum(['fail-fast', 'best-effort']);

/**
 * What happens to a data row without a customer code: `fail-fast` aborts the
 * whole upload, `best-effort` skips the row and lists it in the summary.
 */
export type RowErrorPolicy = z.infer<typeof rowErrorPolicySchema>;

const envSchema = z.object({
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_USER: z.string().min(1).default('sales'),
  POSTGRES_PASSWORD: z.string().default('salespass'),
  POSTGRES_DB: z.string().min(1).default('salesdb'),
  UPLOAD_MAX_FILE_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  SHEET_HEADER_ROW: z.coerce.number().int().min(0).default(4),
  SHEET_NAME: z
    .string()
    .trim()
    .min(1)
    .optional(),
  ROW_ERROR_POLICY: rowErrorPolicySchema.default('best-effort'),
});

export type AppConfig = {
  port: number;
  postgres: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };
  upload: {
    maxFileSize: number;
    headerRow: number;
    sheetName?: string;
    policy: RowErrorPolicy;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.API_PORT,
    postgres: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
    },
    upload: {
      maxFileSize: parsed.UPLOAD_MAX_FILE_SIZE,
      headerRow: parsed.SHEET_HEADER_ROW,
      sheetName: parsed.SHEET_NAME,
      policy: parsed.ROW_ERROR_POLICY,
    },
  };
}
