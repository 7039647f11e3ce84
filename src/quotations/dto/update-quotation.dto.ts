import { IsInt, IsOptional, IsString } from 'class-validator';
import { IsCalendarDate } from '../../billing/dto/is-calendar-date.decorator';
import { IsOmittable } from '../../billing/dto/is-omittable.decorator';

export class UpdateQuotationDto {
  @IsOmittable()
  @IsInt()
  customerId?: number;

  @IsOmittable()
  @IsCalendarDate()
  quotationDate?: string;

  /** null quita la vigencia */
  @IsOptional()
  @IsCalendarDate()
  validUntil?: string | null;

  @IsOptional()
  @IsString()
  notes?: string | null;
}
