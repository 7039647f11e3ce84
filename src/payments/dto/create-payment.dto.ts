// src/payments/dto/create-payment.dto.ts
import {
  IsIn,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  MaxLength,
} from 'class-validator';
import { IsCalendarDate } from '../../billing/dto/is-calendar-date.decorator';
import { PAYMENT_METHODS, PaymentMethod } from '../entities/payment.entity';

export class CreatePaymentDto {
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  /** Fecha del pago (YYYY-MM-DD); por defecto hoy */
  @IsOptional()
  @IsCalendarDate()
  paymentDate?: string;

  @IsOptional()
  @IsIn(PAYMENT_METHODS, { message: 'paymentMethod inválido' })
  paymentMethod?: PaymentMethod;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  notes?: string;
}
