import { Transform } from 'class-transformer';
import { IsInt, Max, Min } from 'class-validator';

export class MonthlyRevenueQueryDto {
  /** Meses calendario hacia atrás, incluido el actual */
  @Transform(({ value }) => (value !== undefined ? Number(value) : 6))
  @IsInt()
  @Min(1)
  @Max(24)
  months: number = 6;
}
