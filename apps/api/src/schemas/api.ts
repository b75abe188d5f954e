/**
 * API Schemas with Zod validation
 *
 * Request schemas for the search endpoints and the shared error body
 */

import { z } from 'zod';

const dateParam = z.coerce.date();

export const SearchFiltersSchema = z.object({
  fileTypes: z.array(z.string().min(1)).optional(),
  tags: z.array(z.string().min(1)).optional(),
  dateFrom: dateParam.optional(),
  dateTo: dateParam.optional(),
}).strict();

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(1000, 'Query too long'),
  limit: z.coerce.number().int().min(1).max(100).optional(),
  mode: z.enum(['semantic', 'keyword']).optional().default('semantic'),
  filters: SearchFiltersSchema.optional(),
});

export const RelatedParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const RelatedQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).optional().default(5),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string(),
  statusCode: z.number(),
  timestamp: z.string(),
  details: z.record(z.unknown()).optional(),
});

export type SearchRequestBody = z.infer<typeof SearchRequestSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

export function validateSearchRequest(data: unknown): SearchRequestBody {
  return SearchRequestSchema.parse(data);
}

export function createErrorResponse(
  error: string,
  message: string,
  statusCode: number = 400,
  details?: Record<string, unknown>
): ErrorResponse {
  return {
    error,
    message,
    statusCode,
    timestamp: new Date().toISOString(),
    ...(details ? { details } : {}),
  };
}
