// src/billing/lifecycle/quotation-status.ts
import { BadRequestException, ConflictException } from '@nestjs/common';

export const QUOTATION_STATUSES = [
  'draft',
  'sent',
  'accepted',
  'rejected',
  'converted',
] as const;
export type QuotationStatus = (typeof QUOTATION_STATUSES)[number];

/** Estados que se pueden fijar con el cambio de estado genérico. */
export const SETTABLE_QUOTATION_STATUSES = [
  'draft',
  'sent',
  'accepted',
  'rejected',
] as const satisfies readonly QuotationStatus[];

/**
 * Entre estados no convertidos se permite cualquier cambio.
 * `converted` es terminal y solo lo escribe la conversión a factura.
 */
export const QUOTATION_STATUS_TRANSITIONS: Readonly<
  Record<QuotationStatus, readonly QuotationStatus[]>
> = {
  draft: SETTABLE_QUOTATION_STATUSES,
  sent: SETTABLE_QUOTATION_STATUSES,
  accepted: SETTABLE_QUOTATION_STATUSES,
  rejected: SETTABLE_QUOTATION_STATUSES,
  converted: [],
};

export const QUOTATION_STATUS_LABELS: Record<QuotationStatus, string> = {
  draft: 'Draft',
  sent: 'Sent',
  accepted: 'Accepted',
  rejected: 'Rejected',
  converted: 'Converted to invoice',
};

export function canTransitionQuotation(
  from: QuotationStatus,
  to: QuotationStatus,
): boolean {
  return QUOTATION_STATUS_TRANSITIONS[from].includes(to);
}

/** Una cotización convertida es un registro histórico: no admite ninguna mutación. */
export function assertQuotationMutable(status: QuotationStatus): void {
  if (status === 'converted') {
    throw new ConflictException(
      'Quotation has been converted to an invoice and can no longer be modified',
    );
  }
}

export function assertQuotationTransition(
  from: QuotationStatus,
  to: QuotationStatus,
): void {
  assertQuotationMutable(from);
  if (to === 'converted') {
    throw new BadRequestException(
      'Use the convert operation to turn a quotation into an invoice',
    );
  }
  if (!canTransitionQuotation(from, to)) {
    throw new ConflictException(`Cannot change quotation from ${from} to ${to}`);
  }
}
