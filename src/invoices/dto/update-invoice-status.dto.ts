import { IsIn } from 'class-validator';
import {
  INVOICE_STATUSES,
  InvoiceStatus,
} from '../../billing/lifecycle/invoice-status';

export class UpdateInvoiceStatusDto {
  @IsIn(INVOICE_STATUSES, { message: 'status inválido' })
  status!: InvoiceStatus;
}
