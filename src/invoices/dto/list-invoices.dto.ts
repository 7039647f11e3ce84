// src/invoices/dto/list-invoices.dto.ts
import { Transform } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsPositive, Max, Min } from 'class-validator';
import {
  INVOICE_STATUSES,
  InvoiceStatus,
} from '../../billing/lifecycle/invoice-status';

export class ListInvoicesQueryDto {
  @Transform(({ value }) => (value !== undefined ? Number(value) : 1))
  @IsInt()
  @Min(1)
  page: number = 1;

  @Transform(({ value }) =>
    value !== undefined ? Math.min(100, Math.max(1, Number(value))) : 20,
  )
  @IsInt()
  @Min(1)
  @Max(100)
  pageSize: number = 20;

  @Transform(({ value }) =>
    value !== undefined && value !== '' ? Number(value) : undefined,
  )
  @IsOptional()
  @IsPositive()
  customerId?: number;

  @IsOptional()
  @IsIn(INVOICE_STATUSES, { message: 'status inválido' })
  status?: InvoiceStatus;

  /** Vencimiento asc/desc (sin vencimiento al final) o creación desc (default) */
  @IsOptional()
  @IsIn(['createdAt', 'dueDate'])
  sort?: 'createdAt' | 'dueDate' = 'createdAt';

  @IsOptional()
  @IsIn(['asc', 'desc'])
  order?: 'asc' | 'desc' = 'desc';
}
