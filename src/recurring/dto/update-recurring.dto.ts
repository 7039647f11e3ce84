import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { IsCalendarDate } from '../../billing/dto/is-calendar-date.decorator';
import { IsOmittable } from '../../billing/dto/is-omittable.decorator';
import { LineItemDto } from '../../billing/dto/line-item.dto';
import { RECURRING_FREQUENCIES, RecurringFrequency } from '../schedule';

/** Cliente y fecha de inicio no cambian; `items` reemplaza la plantilla completa. */
export class UpdateRecurringDto {
  @IsOmittable()
  @IsIn(RECURRING_FREQUENCIES, { message: 'frequency inválida' })
  frequency?: RecurringFrequency;

  /** null quita la fecha fin */
  @IsOptional()
  @IsCalendarDate()
  endDate?: string | null;

  @IsOmittable()
  @IsBoolean()
  isActive?: boolean;

  @IsOptional()
  @IsString()
  notes?: string | null;

  @IsOmittable()
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  items?: LineItemDto[];
}
