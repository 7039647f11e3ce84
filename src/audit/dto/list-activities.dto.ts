import { Transform } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class ListActivitiesQueryDto {
  @Transform(({ value }) => (value !== undefined ? Number(value) : 20))
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  limit: number = 20;
}
