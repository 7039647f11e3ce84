// src/payments/payments.service.ts
import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import Decimal from 'decimal.js';
import { DataSource, EntityManager } from 'typeorm';
import { AuditService } from '../audit/audit.service';
import { InvoiceStatus } from '../billing/lifecycle/invoice-status';
import { Clock } from '../common/clock';
import { formatMoney } from '../common/rounding';
import { Invoice } from '../invoices/entities/invoice.entity';
import {
  newestPaymentFirst,
  paidAmountOf,
  reconciledStatus,
  remainingAmountOf,
} from '../invoices/invoice-balance';
import { InvoicesService } from '../invoices/invoices.service';
import { NotificationsService } from '../notifications/notifications.service';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { Payment } from './entities/payment.entity';

/** Estado de la factura tras conciliar sus pagos. */
export interface Reconciliation {
  invoiceId: number;
  status: InvoiceStatus;
  total: number;
  paidAmount: number;
  remainingAmount: number;
}

export interface AppliedPayment extends Reconciliation {
  payment: Payment;
}

/**
 * Conciliación de pagos contra facturas.
 * Σ pagos ≤ total en todo momento; el estado sigue a reconciledStatus.
 */
@Injectable()
export class PaymentsService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly invoices: InvoicesService,
    private readonly audit: AuditService,
    private readonly notifications: NotificationsService,
    private readonly clock: Clock,
  ) {}

  async list(ownerId: string, invoiceId: number): Promise<Payment[]> {
    const manager = this.dataSource.manager;
    await this.invoices.findOwned(manager, ownerId, invoiceId);
    const payments = await manager.find(Payment, { where: { invoiceId } });
    return payments.sort(newestPaymentFirst);
  }

  async apply(
    ownerId: string,
    invoiceId: number,
    dto: CreatePaymentDto,
  ): Promise<AppliedPayment> {
    const { invoice, payment, result, previousStatus } =
      await this.dataSource.transaction(async (manager) => {
        const invoice = await this.invoices.findOwned(
          manager,
          ownerId,
          invoiceId,
        );
        if (invoice.status === 'cancelled') {
          throw new ConflictException(
            'Cannot record a payment on a cancelled invoice',
          );
        }

        const paid = await this.paidAmount(manager, invoiceId);
        const maximum = remainingAmountOf(invoice.total, paid);
        if (new Decimal(paid).plus(dto.amount).greaterThan(invoice.total)) {
          throw new ConflictException(
            `Payment exceeds the outstanding balance; the maximum amount is ${formatMoney(maximum)}`,
          );
        }

        const payment = await manager.save(
          manager.create(Payment, {
            invoiceId,
            amount: dto.amount,
            paymentDate: dto.paymentDate ?? this.clock.today(),
            paymentMethod: dto.paymentMethod ?? 'bank_transfer',
            notes: dto.notes ?? null,
          }),
        );

        const previousStatus = invoice.status;
        const result = await this.reconcile(manager, invoice);
        return { invoice, payment, result, previousStatus };
      });

    await this.audit.record({
      ownerId,
      action: 'payment',
      entityType: 'payment',
      entityId: payment.id,
      description: `Payment of ${formatMoney(payment.amount)} recorded for invoice '${invoice.number}'`,
    });
    await this.notifications.notify({
      ownerId,
      type: 'payment_received',
      title: 'Payment received',
      message: `A payment of ${formatMoney(payment.amount)} was recorded for invoice ${invoice.number}.`,
      entityType: 'invoice',
      entityId: invoice.id,
    });
    if (result.status === 'paid' && previousStatus !== 'paid') {
      await this.notifications.notify({
        ownerId,
        type: 'invoice_paid',
        title: 'Invoice paid',
        message: `Invoice ${invoice.number} is fully paid.`,
        entityType: 'invoice',
        entityId: invoice.id,
      });
    }

    return { payment, ...result };
  }

  async remove(
    ownerId: string,
    invoiceId: number,
    paymentId: number,
  ): Promise<Reconciliation> {
    const { invoice, payment, result } = await this.dataSource.transaction(
      async (manager) => {
        const invoice = await this.invoices.findOwned(
          manager,
          ownerId,
          invoiceId,
        );
        const payment = await manager.findOne(Payment, {
          where: { id: paymentId, invoiceId },
        });
        if (!payment) throw new NotFoundException('Payment not found');

        await manager.delete(Payment, { id: paymentId });
        const result = await this.reconcile(manager, invoice);
        return { invoice, payment, result };
      },
    );

    await this.audit.record({
      ownerId,
      action: 'delete',
      entityType: 'payment',
      entityId: payment.id,
      description: `Payment of ${formatMoney(payment.amount)} removed from invoice '${invoice.number}'`,
    });
    return result;
  }

  private async paidAmount(
    manager: EntityManager,
    invoiceId: number,
  ): Promise<number> {
    return paidAmountOf(await manager.find(Payment, { where: { invoiceId } }));
  }

  /** Recalcula lo pagado y ajusta el estado (ver reconciledStatus). */
  private async reconcile(
    manager: EntityManager,
    invoice: Invoice,
  ): Promise<Reconciliation> {
    const paid = await this.paidAmount(manager, invoice.id);
    const status = reconciledStatus(invoice.status, invoice.total, paid);

    if (status !== invoice.status) {
      await manager.update(Invoice, { id: invoice.id }, { status });
      invoice.status = status;
    }

    return {
      invoiceId: invoice.id,
      status,
      total: invoice.total,
      paidAmount: paid,
      remainingAmount: remainingAmountOf(invoice.total, paid),
    };
  }
}
