import { z } from 'zod';
import type { Compatibility, DetailRecord, ErrorRecord } from '../types/index.js';

const compatibilitySchema: z.ZodType<Compatibility> = z.object({
  status: z.enum(['skipped', 'absent', 'empty', 'present']),
  makes: z.array(z.string()),
  years: z.array(z.string()),
  entries: z.array(z.object({ make: z.string(), year: z.string() })),
  totalPages: z.number().int().min(0),
  pagesVisited: z.number().int().min(0),
  complete: z.boolean(),
  warning: z.string().optional(),
});

export const detailRecordSchema: z.ZodType<DetailRecord> = z.object({
  itemId: z.string().min(1),
  url: z.string(),
  title: z.string(),
  price: z.string(),
  currency: z.string(),
  brand: z.string(),
  condition: z.string(),
  productType: z.string(),
  mpn: z.string(),
  description: z.string(),
  specifics: z.record(z.string()),
  images: z.array(z.string()),
  compatibility: compatibilitySchema,
  scrapedAt: z.string(),
});

export const errorRecordSchema: z.ZodType<ErrorRecord> = z.object({
  itemId: z.string().min(1),
  url: z.string(),
  errorType: z.enum(['FetchTimeout', 'FetchFailed', 'BlockedPage', 'MalformedPage', 'PaginationDesync']),
  message: z.string(),
  occurredAt: z.string(),
});

/**
 * On-disk checkpoint document
 */
export const checkpointSchema = z.object({
  target: z.string(),
  updatedAt: z.string(),
  records: z.array(detailRecordSchema),
  errors: z.array(errorRecordSchema),
});

export type CheckpointDocument = z.infer<typeof checkpointSchema>;
