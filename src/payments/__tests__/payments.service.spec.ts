import {
  ConflictException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { InvoicesService } from '../../invoices/invoices.service';
import { Notification } from '../../notifications/entities/notification.entity';
import { NotificationsService } from '../../notifications/notifications.service';
import { Payment } from '../entities/payment.entity';
import { PaymentsService } from '../payments.service';
import {
  BillingTestContext,
  OTHER_OWNER,
  OWNER,
  createBillingTestingModule,
  createCustomer,
} from '../../__tests__/testing-module';

describe('PaymentsService', () => {
  let ctx: BillingTestContext;
  let invoices: InvoicesService;
  let payments: PaymentsService;

  // total = 1000 + 20% = 1200.00
  const createInvoice = async (status: 'draft' | 'sent' = 'sent') => {
    const customer = await createCustomer(ctx);
    return invoices.create(OWNER, {
      customerId: customer.id,
      invoiceDate: '2026-03-01',
      status,
      items: [
        { description: 'Annual licence', quantity: 1, unitPrice: 1000, taxRate: 20 },
      ],
    });
  };

  beforeEach(async () => {
    ctx = await createBillingTestingModule();
    invoices = ctx.moduleRef.get(InvoicesService);
    payments = ctx.moduleRef.get(PaymentsService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    return ctx.close();
  });

  test('partial, full and removed payments drive the status', async () => {
    const invoice = await createInvoice();
    expect(invoice.total).toBe(1200);

    const first = await payments.apply(OWNER, invoice.id, {
      amount: 700,
      paymentDate: '2026-03-05',
    });
    expect(first.status).toBe('sent');
    expect(first.paidAmount).toBe(700);
    expect(first.remainingAmount).toBe(500);

    const second = await payments.apply(OWNER, invoice.id, {
      amount: 500,
      paymentDate: '2026-03-10',
    });
    expect(second.status).toBe('paid');
    expect(second.remainingAmount).toBe(0);

    const afterRemoval = await payments.remove(
      OWNER,
      invoice.id,
      second.payment.id,
    );
    expect(afterRemoval).toEqual({
      invoiceId: invoice.id,
      status: 'sent',
      total: 1200,
      paidAmount: 700,
      remainingAmount: 500,
    });
    expect((await invoices.findOne(OWNER, invoice.id)).status).toBe('sent');
  });

  test('a draft invoice paid in full goes straight to paid', async () => {
    const invoice = await createInvoice('draft');
    const result = await payments.apply(OWNER, invoice.id, { amount: 1200 });
    expect(result.status).toBe('paid');
    expect(result.payment.paymentDate).toBe('2026-03-15');
    expect(result.payment.paymentMethod).toBe('bank_transfer');
  });

  test('removing a payment from a draft invoice keeps it draft', async () => {
    const invoice = await createInvoice('draft');
    const applied = await payments.apply(OWNER, invoice.id, { amount: 100 });
    const result = await payments.remove(OWNER, invoice.id, applied.payment.id);
    expect(result.status).toBe('draft');
  });

  test('overpayment is rejected with the maximum amount', async () => {
    const invoice = await createInvoice();
    await expect(
      payments.apply(OWNER, invoice.id, { amount: 1200.01 }),
    ).rejects.toThrow(
      'Payment exceeds the outstanding balance; the maximum amount is 1200.00',
    );

    await payments.apply(OWNER, invoice.id, { amount: 700 });
    const attempt = payments.apply(OWNER, invoice.id, { amount: 600 });
    await expect(attempt).rejects.toBeInstanceOf(ConflictException);
    await expect(
      payments.apply(OWNER, invoice.id, { amount: 600 }),
    ).rejects.toThrow('the maximum amount is 500.00');

    expect(await ctx.dataSource.manager.count(Payment)).toBe(1);
  });

  test('cancelled invoices take no payments', async () => {
    const invoice = await createInvoice();
    await invoices.updateStatus(OWNER, invoice.id, 'cancelled');
    await expect(
      payments.apply(OWNER, invoice.id, { amount: 10 }),
    ).rejects.toThrow('Cannot record a payment on a cancelled invoice');
  });

  test('invoices of another owner are not found', async () => {
    const invoice = await createInvoice();
    await expect(
      payments.apply(OTHER_OWNER, invoice.id, { amount: 10 }),
    ).rejects.toBeInstanceOf(NotFoundException);
    await expect(payments.list(OTHER_OWNER, invoice.id)).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  test('removing an unknown payment is not found', async () => {
    const invoice = await createInvoice();
    await expect(
      payments.remove(OWNER, invoice.id, 42),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  test('list returns newest payments first', async () => {
    const invoice = await createInvoice();
    await payments.apply(OWNER, invoice.id, { amount: 100, paymentDate: '2026-03-01' });
    await payments.apply(OWNER, invoice.id, { amount: 200, paymentDate: '2026-03-10' });
    await payments.apply(OWNER, invoice.id, { amount: 300, paymentDate: '2026-03-05' });

    const listed = await payments.list(OWNER, invoice.id);
    expect(listed.map((p) => p.amount)).toEqual([200, 300, 100]);
  });

  test('notifies after commit: payment received and invoice paid', async () => {
    const invoice = await createInvoice();
    await payments.apply(OWNER, invoice.id, { amount: 1200 });

    const notifications = await ctx.moduleRef
      .get(NotificationsService)
      .list(OWNER);
    expect(notifications.map((n) => n.type).sort()).toEqual([
      'invoice_paid',
      'payment_received',
    ]);
  });

  test('a failing notification store does not undo the payment', async () => {
    const invoice = await createInvoice();
    const repo = ctx.moduleRef.get<Repository<Notification>>(
      getRepositoryToken(Notification),
    );
    jest
      .spyOn(repo, 'insert')
      .mockRejectedValue(new Error('notification store offline'));
    const warn = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);

    const result = await payments.apply(OWNER, invoice.id, { amount: 1200 });

    expect(result.status).toBe('paid');
    expect(await ctx.dataSource.manager.count(Payment)).toBe(1);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
