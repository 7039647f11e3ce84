import { BadRequestException, ConflictException } from '@nestjs/common';
import {
  INVOICE_STATUSES,
  assertInvoiceEditable,
  canTransitionInvoice,
  isInvoiceEditable,
} from '../lifecycle/invoice-status';
import {
  SETTABLE_QUOTATION_STATUSES,
  assertQuotationMutable,
  assertQuotationTransition,
  canTransitionQuotation,
} from '../lifecycle/quotation-status';

describe('invoice lifecycle', () => {
  test('manual status changes are permissive', () => {
    for (const from of INVOICE_STATUSES) {
      for (const to of INVOICE_STATUSES) {
        expect(canTransitionInvoice(from, to)).toBe(true);
      }
    }
  });

  test('only draft and sent invoices are editable', () => {
    expect(isInvoiceEditable('draft')).toBe(true);
    expect(isInvoiceEditable('sent')).toBe(true);
    expect(isInvoiceEditable('paid')).toBe(false);
    expect(isInvoiceEditable('cancelled')).toBe(false);
  });

  test('editing a paid invoice is a conflict', () => {
    expect(() => assertInvoiceEditable('paid')).toThrow(ConflictException);
    expect(() => assertInvoiceEditable('paid')).toThrow(
      'Only draft and sent invoices can be edited (current status: paid)',
    );
    expect(() => assertInvoiceEditable('sent')).not.toThrow();
  });
});

describe('quotation lifecycle', () => {
  test('any non-converted status can move to another non-converted status', () => {
    for (const from of SETTABLE_QUOTATION_STATUSES) {
      for (const to of SETTABLE_QUOTATION_STATUSES) {
        expect(canTransitionQuotation(from, to)).toBe(true);
      }
    }
  });

  test('converted is terminal', () => {
    expect(canTransitionQuotation('converted', 'draft')).toBe(false);
    expect(() => assertQuotationMutable('converted')).toThrow(ConflictException);
    expect(() => assertQuotationTransition('converted', 'sent')).toThrow(
      ConflictException,
    );
  });

  test('converted cannot be set through the generic status change', () => {
    expect(() => assertQuotationTransition('accepted', 'converted')).toThrow(
      BadRequestException,
    );
    expect(() => assertQuotationTransition('accepted', 'converted')).toThrow(
      'Use the convert operation to turn a quotation into an invoice',
    );
  });

  test('regular transitions pass', () => {
    expect(() => assertQuotationTransition('sent', 'accepted')).not.toThrow();
    expect(() => assertQuotationTransition('rejected', 'draft')).not.toThrow();
  });
});
