import 'reflect-metadata';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';

export const ARTICLES_DEFAULT_LIMIT = 20;
export const ARTICLES_MAX_LIMIT = 100;

/**
 * Query of GET /api/articles, defaulting to the newest page
 */
export class ArticlesQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(ARTICLES_MAX_LIMIT)
  limit: number = ARTICLES_DEFAULT_LIMIT;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset: number = 0;

  /**
   * Access key, checked before validation
   */
  @IsOptional()
  @IsString()
  key?: string;
}
