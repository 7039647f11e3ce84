// src/payments/payments.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { CurrentOwner } from '../auth/current-owner.decorator';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { PaymentsService } from './payments.service';

/** Pagos (recibos) de una factura de venta */
@Controller('invoices/:invoiceId/payments')
export class PaymentsController {
  constructor(private readonly payments: PaymentsService) {}

  @Get()
  list(
    @CurrentOwner() ownerId: string,
    @Param('invoiceId', ParseIntPipe) invoiceId: number,
  ) {
    return this.payments.list(ownerId, invoiceId);
  }

  @Post()
  apply(
    @CurrentOwner() ownerId: string,
    @Param('invoiceId', ParseIntPipe) invoiceId: number,
    @Body() dto: CreatePaymentDto,
  ) {
    return this.payments.apply(ownerId, invoiceId, dto);
  }

  @Delete(':paymentId')
  remove(
    @CurrentOwner() ownerId: string,
    @Param('invoiceId', ParseIntPipe) invoiceId: number,
    @Param('paymentId', ParseIntPipe) paymentId: number,
  ) {
    return this.payments.remove(ownerId, invoiceId, paymentId);
  }
}
