// src/invoices/dto/create-invoice.dto.ts
import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { IsCalendarDate } from '../../billing/dto/is-calendar-date.decorator';
import { LineItemDto } from '../../billing/dto/line-item.dto';
import {
  INITIAL_INVOICE_STATUSES,
  InvoiceStatus,
} from '../../billing/lifecycle/invoice-status';

export class CreateInvoiceDto {
  @IsInt()
  customerId!: number;

  /** Fecha de emisión (YYYY-MM-DD) */
  @IsCalendarDate()
  invoiceDate!: string;

  @IsOptional()
  @IsCalendarDate()
  dueDate?: string;

  /** draft (default) o sent */
  @IsOptional()
  @IsIn(INITIAL_INVOICE_STATUSES)
  status?: InvoiceStatus;

  @IsOptional()
  @IsString()
  notes?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  items!: LineItemDto[];
}
