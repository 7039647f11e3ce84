// src/quotations/dto/list-quotations.dto.ts
import { Transform } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import {
  QUOTATION_STATUSES,
  QuotationStatus,
} from '../../billing/lifecycle/quotation-status';

export const QUOTATION_SORTS = [
  'createdAt',
  'quotationDate',
  'total',
] as const;
export type QuotationSort = (typeof QUOTATION_SORTS)[number];

export class ListQuotationsQueryDto {
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

  /** Busca en el número o en la razón social del cliente */
  @IsOptional()
  @IsString()
  @MaxLength(100)
  search?: string;

  @IsOptional()
  @IsIn(QUOTATION_STATUSES, { message: 'status inválido' })
  status?: QuotationStatus;

  @IsOptional()
  @IsIn(QUOTATION_SORTS)
  sort?: QuotationSort = 'createdAt';

  @IsOptional()
  @IsIn(['asc', 'desc'])
  order?: 'asc' | 'desc' = 'desc';
}
