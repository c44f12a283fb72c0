/**
 * `?limit=&offset=` pagination for list endpoints. Lists are filtered in the
 * store and sliced here, after decryption and masking.
 */
import { z } from 'zod';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/** Query string values arrive as strings; coerce before range checks. */
export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  offset: z.coerce.number().int().min(0).default(0),
});

export type PaginationQuery = z.infer<typeof paginationSchema>;

export interface PaginatedResponse<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export function paginate<T>(all: readonly T[], { limit, offset }: PaginationQuery): PaginatedResponse<T> {
  return {
    items: all.slice(offset, offset + limit),
    total: all.length,
    limit,
    offset,
    hasMore: offset + limit < all.length,
  };
}
