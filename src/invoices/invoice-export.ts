// src/invoices/invoice-export.ts
import { formatMoney } from '../common/rounding';
import { Customer } from '../customers/entities/customer.entity';
import { InvoiceStatus } from '../billing/lifecycle/invoice-status';
import { Invoice } from './entities/invoice.entity';
import { InvoiceItem } from './entities/invoice-item.entity';

/**
 * Esquema fijo de exportación (consumido por integraciones externas).
 * Los importes salen como string con 2 decimales para no perder ceros.
 */
export interface InvoiceExport {
  number: string;
  invoiceDate: string;
  dueDate: string | null;
  status: InvoiceStatus;
  customer: {
    companyName: string;
    contactName: string | null;
    email: string | null;
    address: string | null;
    taxNumber: string | null;
  };
  lines: Array<{
    description: string;
    quantity: string;
    unitPrice: string;
    taxRate: number;
    lineTotal: string;
    taxAmount: string;
  }>;
  subtotal: string;
  taxTotal: string;
  total: string;
}

export function toInvoiceExport(
  invoice: Invoice,
  customer: Customer,
  items: readonly InvoiceItem[],
): InvoiceExport {
  return {
    number: invoice.number,
    invoiceDate: invoice.invoiceDate,
    dueDate: invoice.dueDate,
    status: invoice.status,
    customer: {
      companyName: customer.companyName,
      contactName: customer.contactName,
      email: customer.email,
      address: customer.address,
      taxNumber: customer.taxNumber,
    },
    lines: items.map((it) => ({
      description: it.description,
      quantity: formatMoney(it.quantity),
      unitPrice: formatMoney(it.unitPrice),
      taxRate: it.taxRate,
      lineTotal: formatMoney(it.lineTotal),
      taxAmount: formatMoney(it.taxAmount),
    })),
    subtotal: formatMoney(invoice.subtotal),
    taxTotal: formatMoney(invoice.taxTotal),
    total: formatMoney(invoice.total),
  };
}
