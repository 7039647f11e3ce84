// src/quotations/dto/create-quotation.dto.ts
import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { IsCalendarDate } from '../../billing/dto/is-calendar-date.decorator';
import { LineItemDto } from '../../billing/dto/line-item.dto';

export class CreateQuotationDto {
  @IsInt()
  customerId!: number;

  /** Fecha del documento (YYYY-MM-DD) */
  @IsCalendarDate()
  quotationDate!: string;

  /** Vigencia de la oferta */
  @IsOptional()
  @IsCalendarDate()
  validUntil?: string;

  @IsOptional()
  @IsString()
  notes?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  items!: LineItemDto[];
}
