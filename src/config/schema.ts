import { z } from 'zod';

export const IRadioConfigSchema = z.object({
  baseUrl: z.string().url('iRadio base URL must be a valid URL'),
  timeout: z.number().min(1000, 'Timeout must be at least 1000ms'),
  retries: z.number().int().min(1, 'At least one fetch attempt is required'),
  retryDelayMs: z.number().min(0),
  encoding: z.string().min(1, 'Page encoding is required'),
  verifySsl: z.boolean(),
  userAgent: z.string().min(1),
});

export const PaginationConfigSchema = z.object({
  maxPages: z.number().int().min(1, 'Max pages must be at least 1'),
  minRecordsPerPage: z.number().int().min(0),
  pageDelayMs: z.number().min(0),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

export const OutputConfigSchema = z.object({
  path: z.string().min(1, 'Output path is required'),
  appendDedupe: z.boolean(),
  debugDir: z.string().optional(),
});

export const AppConfigSchema = z.object({
  iradio: IRadioConfigSchema,
  pagination: PaginationConfigSchema,
  logging: LoggingConfigSchema,
  output: OutputConfigSchema,
});

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
