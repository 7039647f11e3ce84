// src/invoices/invoice-balance.ts
import Decimal from 'decimal.js';
import { InvoiceStatus } from '../billing/lifecycle/invoice-status';
import { round2, sumMoney } from '../common/rounding';
import { Payment } from '../payments/entities/payment.entity';
import { Invoice } from './entities/invoice.entity';

export type InvoiceWithBalance = Invoice & {
  paidAmount: number;
  remainingAmount: number;
};

/** Suma de los pagos registrados (2 decimales). */
export function paidAmountOf(payments: readonly Pick<Payment, 'amount'>[]): number {
  return sumMoney(payments.map((p) => p.amount));
}

/** Saldo pendiente; nunca negativo. */
export function remainingAmountOf(total: number, paid: number): number {
  return round2(Decimal.max(new Decimal(total).minus(paid), 0));
}

/**
 * Estado que corresponde a lo pagado frente al total:
 *   pagado > 0 y pagado ≥ total → paid (desde cualquier estado previo)
 *   pagado < total y estaba paid → sent (nunca vuelve a draft)
 */
export function reconciledStatus(
  current: InvoiceStatus,
  total: number,
  paid: number,
): InvoiceStatus {
  const p = new Decimal(paid);
  if (p.greaterThan(0) && p.greaterThanOrEqualTo(total)) return 'paid';
  if (current === 'paid' && p.lessThan(total)) return 'sent';
  return current;
}

export function withBalance(invoice: Invoice): InvoiceWithBalance {
  const paidAmount = paidAmountOf(invoice.payments ?? []);
  return {
    ...invoice,
    paidAmount,
    remainingAmount: remainingAmountOf(invoice.total, paidAmount),
  };
}

/** Orden de listado de pagos: fecha de pago desc, luego id desc. */
export function newestPaymentFirst(
  a: Pick<Payment, 'id' | 'paymentDate'>,
  b: Pick<Payment, 'id' | 'paymentDate'>,
): number {
  if (a.paymentDate !== b.paymentDate) {
    return a.paymentDate < b.paymentDate ? 1 : -1;
  }
  return b.id - a.id;
}
