import { IsIn } from 'class-validator';
import {
  QUOTATION_STATUSES,
  QuotationStatus,
} from '../../billing/lifecycle/quotation-status';

export class UpdateQuotationStatusDto {
  /** `converted` se rechaza en el servicio: solo /convert lo escribe */
  @IsIn(QUOTATION_STATUSES, { message: 'status inválido' })
  status!: QuotationStatus;
}
