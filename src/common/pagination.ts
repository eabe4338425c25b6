import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

export class PaginationQuery {
  @ApiPropertyOptional({ minimum: 1, default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @ApiPropertyOptional({ minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;
}

export interface PageRequest {
  page: number;
  limit: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
}

export interface PaginatedResponse<T> {
  results: T[];
  meta: {
    total: number;
    page: number;
    limit: number;
    totalPages: number;
  };
}

export interface PageLimits {
  defaultLimit: number;
  maxLimit: number;
}

export const CATALOG_PAGE_LIMITS: PageLimits = { defaultLimit: 20, maxLimit: 100 };

export function toPageRequest(query: PaginationQuery, limits: PageLimits): PageRequest {
  return {
    page: query.page ?? 1,
    limit: Math.min(query.limit ?? limits.defaultLimit, limits.maxLimit),
  };
}

export function toSkipTake({ page, limit }: PageRequest): { skip: number; take: number } {
  return { skip: (page - 1) * limit, take: limit };
}

export function toPaginatedResponse<T, R>(
  page: Page<T>,
  map: (item: T) => R,
): PaginatedResponse<R> {
  return {
    results: page.items.map(map),
    meta: {
      total: page.total,
      page: page.page,
      limit: page.limit,
      totalPages: Math.ceil(page.total / page.limit),
    },
  };
}

export const RESERVATION_PAGE_LIMITS: PageLimits = { defaultLimit: 5, maxLimit: 10 };
