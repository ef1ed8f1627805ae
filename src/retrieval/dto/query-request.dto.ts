/**
 * Query Request DTO
 */

import { IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Max, Min } from 'class-validator';

export class QueryRequestDto {
  @IsString()
  @IsNotEmpty()
  query!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  limit?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  prefetchLimit?: number;

  @IsOptional()
  @IsNumber()
  scoreThreshold?: number;
}
