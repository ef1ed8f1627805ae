import { IsArray, IsInt, IsObject, IsOptional, IsString, Max, Min } from 'class-validator';

export class IndexPagesDto {
  @IsArray()
  @IsObject({ each: true })
  pages!: Array<Record<string, unknown>>;

  @IsOptional()
  @IsString()
  collection?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(64)
  batchSize?: number;
}
