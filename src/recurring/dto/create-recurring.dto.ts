// src/recurring/dto/create-recurring.dto.ts
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { IsCalendarDate } from '../../billing/dto/is-calendar-date.decorator';
import { LineItemDto } from '../../billing/dto/line-item.dto';
import { RECURRING_FREQUENCIES, RecurringFrequency } from '../schedule';

export class CreateRecurringDto {
  @IsInt()
  customerId!: number;

  @IsIn(RECURRING_FREQUENCIES, { message: 'frequency inválida' })
  frequency!: RecurringFrequency;

  /** Primera generación (YYYY-MM-DD) */
  @IsCalendarDate()
  startDate!: string;

  @IsOptional()
  @IsCalendarDate()
  endDate?: string;

  @IsOptional()
  @IsString()
  notes?: string;

  /** Plantilla de líneas; al menos una */
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  items!: LineItemDto[];
}
