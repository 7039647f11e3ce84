import { Activity } from '../audit/entities/activity.entity';
import { DocumentSequence } from '../billing/numbering/document-sequence.entity';
import { Customer } from '../customers/entities/customer.entity';
import { Invoice } from '../invoices/entities/invoice.entity';
import { InvoiceItem } from '../invoices/entities/invoice-item.entity';
import { Notification } from '../notifications/entities/notification.entity';
import { Payment } from '../payments/entities/payment.entity';
import { Quotation } from '../quotations/entities/quotation.entity';
import { QuotationItem } from '../quotations/entities/quotation-item.entity';
import { RecurringItem } from '../recurring/entities/recurring-item.entity';
import { RecurringSchedule } from '../recurring/entities/recurring-schedule.entity';

export const BILLING_ENTITIES = [
  Activity,
  Customer,
  DocumentSequence,
  Invoice,
  InvoiceItem,
  Payment,
  Quotation,
  QuotationItem,
  RecurringSchedule,
  RecurringItem,
  Notification,
];
