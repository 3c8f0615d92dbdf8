import { z } from "zod";
import type { Page, PageResult } from "../store/types.js";

export const paginationSchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().positive().max(100).default(20),
});

export type PaginationQuery = z.infer<typeof paginationSchema>;

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  pages: number;
}

export function toPage(query: PaginationQuery): Page {
  return { skip: (query.page - 1) * query.limit, limit: query.limit };
}

export function paginatedResult<T>(result: PageResult<T>, query: PaginationQuery): PaginatedResult<T> {
  return {
    data: result.rows,
    total: result.total,
    page: query.page,
    limit: query.limit,
    pages: Math.ceil(result.total / query.limit),
  };
}
