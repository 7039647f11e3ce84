import { IsInt, IsOptional, IsString } from 'class-validator';
import { IsCalendarDate } from '../../billing/dto/is-calendar-date.decorator';
import { IsOmittable } from '../../billing/dto/is-omittable.decorator';

/** Solo cabecera: cliente, fechas y notas. Las líneas van por sus propios endpoints. */
export class UpdateInvoiceDto {
  @IsOmittable()
  @IsInt()
  customerId?: number;

  @IsOmittable()
  @IsCalendarDate()
  invoiceDate?: string;

  /** null quita el vencimiento */
  @IsOptional()
  @IsCalendarDate()
  dueDate?: string | null;

  @IsOptional()
  @IsString()
  notes?: string | null;
}
