// src/billing/lifecycle/invoice-status.ts
import { ConflictException } from '@nestjs/common';

export const INVOICE_STATUSES = ['draft', 'sent', 'paid', 'cancelled'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

/** Estados en los que la cabecera y las líneas se pueden modificar. */
export const EDITABLE_INVOICE_STATUSES: readonly InvoiceStatus[] = [
  'draft',
  'sent',
];

/** Estados con los que se puede crear una factura. */
export const INITIAL_INVOICE_STATUSES: readonly InvoiceStatus[] = [
  'draft',
  'sent',
];

/**
 * Política de cambio de estado manual: PERMISIVA.
 * Cualquier origen admite cualquier destino (incluido volver a draft o marcar paid sin pagos).
 * Las transiciones automáticas por pagos están en PaymentsService.
 */
export const INVOICE_STATUS_TRANSITIONS: Readonly<
  Record<InvoiceStatus, readonly InvoiceStatus[]>
> = {
  draft: INVOICE_STATUSES,
  sent: INVOICE_STATUSES,
  paid: INVOICE_STATUSES,
  cancelled: INVOICE_STATUSES,
};

export const INVOICE_STATUS_LABELS: Record<InvoiceStatus, string> = {
  draft: 'Draft',
  sent: 'Sent',
  paid: 'Paid',
  cancelled: 'Cancelled',
};

export function canTransitionInvoice(
  from: InvoiceStatus,
  to: InvoiceStatus,
): boolean {
  return INVOICE_STATUS_TRANSITIONS[from].includes(to);
}

export function isInvoiceEditable(status: InvoiceStatus): boolean {
  return EDITABLE_INVOICE_STATUSES.includes(status);
}

export function assertInvoiceEditable(status: InvoiceStatus): void {
  if (!isInvoiceEditable(status)) {
    throw new ConflictException(
      `Only draft and sent invoices can be edited (current status: ${status})`,
    );
  }
}
