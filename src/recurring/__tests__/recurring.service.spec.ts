import {
  BadRequestException,
  ConflictException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { Customer } from '../../customers/entities/customer.entity';
import { Invoice } from '../../invoices/entities/invoice.entity';
import { InvoicesService } from '../../invoices/invoices.service';
import { NotificationsService } from '../../notifications/notifications.service';
import { CreateRecurringDto } from '../dto/create-recurring.dto';
import { RecurringSchedule } from '../entities/recurring-schedule.entity';
import { RecurringController } from '../recurring.controller';
import { RecurringService } from '../recurring.service';
import {
  BillingTestContext,
  OTHER_OWNER,
  OWNER,
  createBillingTestingModule,
  createCustomer,
} from '../../__tests__/testing-module';

describe('RecurringService', () => {
  let ctx: BillingTestContext;
  let recurring: RecurringService;
  let customer: Customer;

  const dto = (overrides: Partial<CreateRecurringDto> = {}): CreateRecurringDto => ({
    customerId: customer.id,
    frequency: 'monthly',
    startDate: '2026-03-15',
    items: [
      { description: 'Managed hosting', quantity: 1, unitPrice: 49.9, taxRate: 20 },
    ],
    ...overrides,
  });

  const reload = (id: number) =>
    ctx.dataSource.manager.findOneByOrFail(RecurringSchedule, { id });

  beforeEach(async () => {
    ctx = await createBillingTestingModule();
    recurring = ctx.moduleRef.get(RecurringService);
    customer = await createCustomer(ctx);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    return ctx.close();
  });

  describe('CRUD', () => {
    test('create starts the cursor at the start date', async () => {
      const schedule = await recurring.create(OWNER, dto());
      expect(schedule).toMatchObject({
        nextRunDate: '2026-03-15',
        isActive: true,
        totalGenerated: 0,
        lastGeneratedAt: null,
        frequencyLabel: 'Monthly',
        previewTotals: { subtotal: 49.9, taxTotal: 9.98, total: 59.88 },
      });
      expect(schedule.items).toHaveLength(1);
    });

    test('create needs a template item and a coherent end date', async () => {
      await expect(
        recurring.create(OWNER, dto({ items: [] })),
      ).rejects.toBeInstanceOf(BadRequestException);
      await expect(
        recurring.create(OWNER, dto({ endDate: '2026-03-01' })),
      ).rejects.toThrow('endDate must not be before startDate');
    });

    test('update replaces the whole template', async () => {
      const schedule = await recurring.create(OWNER, dto());
      const updated = await recurring.update(OWNER, schedule.id, {
        frequency: 'quarterly',
        items: [
          { description: 'Support plan', quantity: 2, unitPrice: 25, taxRate: 10 },
          { description: 'Backups', quantity: 1, unitPrice: 5, taxRate: 10 },
        ],
      });
      expect(updated.frequency).toBe('quarterly');
      expect(updated.items?.map((i) => i.description)).toEqual([
        'Support plan',
        'Backups',
      ]);
      expect(updated.previewTotals).toEqual({
        subtotal: 55,
        taxTotal: 5.5,
        total: 60.5,
      });
    });

    test('toggle pauses and resumes', async () => {
      const schedule = await recurring.create(OWNER, dto());
      expect((await recurring.toggle(OWNER, schedule.id)).isActive).toBe(false);
      expect((await recurring.toggle(OWNER, schedule.id)).isActive).toBe(true);
    });

    test('list filters by active flag', async () => {
      const a = await recurring.create(OWNER, dto());
      await recurring.create(OWNER, dto({ startDate: '2026-04-01' }));
      await recurring.toggle(OWNER, a.id);

      expect(await recurring.list(OWNER)).toHaveLength(2);
      const active = await recurring.list(OWNER, true);
      expect(active.map((s) => s.nextRunDate)).toEqual(['2026-04-01']);
    });

    test('another owner cannot read or delete', async () => {
      const schedule = await recurring.create(OWNER, dto());
      await expect(
        recurring.findOne(OTHER_OWNER, schedule.id),
      ).rejects.toBeInstanceOf(NotFoundException);
      await expect(
        recurring.remove(OTHER_OWNER, schedule.id),
      ).rejects.toBeInstanceOf(NotFoundException);
      await expect(recurring.remove(OWNER, schedule.id)).resolves.toEqual({
        deleted: true,
      });
    });
  });

  describe('generate', () => {
    test('builds a draft invoice and advances the cursor with month-end clamping', async () => {
      const schedule = await recurring.create(OWNER, dto({ startDate: '2026-01-31' }));
      const { invoice, nextRunDate, finished } = await recurring.generateNow(
        OWNER,
        schedule.id,
      );

      expect(invoice).toMatchObject({
        number: 'INV-0001',
        status: 'draft',
        invoiceDate: '2026-03-15',
        dueDate: '2026-04-14',
        notes: `Auto-generated from recurring schedule #${schedule.id} (Monthly)`,
        subtotal: 49.9,
        taxTotal: 9.98,
        total: 59.88,
      });
      expect(nextRunDate).toBe('2026-02-28');
      expect(finished).toBe(false);

      const after = await reload(schedule.id);
      expect(after.nextRunDate).toBe('2026-02-28');
      expect(after.totalGenerated).toBe(1);
      expect(after.lastGeneratedAt).not.toBeNull();
      expect(after.isActive).toBe(true);
    });

    test('deactivates when the advanced cursor passes the end date', async () => {
      const schedule = await recurring.create(
        OWNER,
        dto({ startDate: '2026-03-01', endDate: '2026-03-20' }),
      );
      const result = await recurring.generateNow(OWNER, schedule.id);

      expect(result.finished).toBe(true);
      expect(result.nextRunDate).toBe('2026-04-01');
      expect((await reload(schedule.id)).isActive).toBe(false);
      expect(await ctx.dataSource.manager.count(Invoice)).toBe(1);

      const types = (
        await ctx.moduleRef.get(NotificationsService).list(OWNER)
      ).map((n) => n.type);
      expect(types.sort()).toEqual(['recurring_finished', 'recurring_generated']);
    });

    test('a paused schedule must be resumed before generating', async () => {
      const schedule = await recurring.create(OWNER, dto());
      await recurring.toggle(OWNER, schedule.id);
      await expect(
        recurring.generateNow(OWNER, schedule.id),
      ).rejects.toBeInstanceOf(ConflictException);
    });
  });

  describe('processDue', () => {
    test('deactivates schedules whose end date has passed without generating', async () => {
      const schedule = await recurring.create(
        OWNER,
        dto({ startDate: '2026-01-01', endDate: '2026-02-01' }),
      );

      const result = await recurring.processDue('2026-03-15');

      expect(result).toEqual({
        today: '2026-03-15',
        due: 1,
        generated: 0,
        deactivated: 1,
        failures: [],
      });
      expect((await reload(schedule.id)).isActive).toBe(false);
      expect(await ctx.dataSource.manager.count(Invoice)).toBe(0);
    });

    test('is safe to re-run on the same day', async () => {
      await recurring.create(OWNER, dto());

      const first = await recurring.processDue('2026-03-15');
      const second = await recurring.processDue('2026-03-15');

      expect(first.generated).toBe(1);
      expect(second.due).toBe(0);
      expect(await ctx.dataSource.manager.count(Invoice)).toBe(1);
    });

    test('generates one invoice per sweep for a schedule that is behind', async () => {
      const schedule = await recurring.create(OWNER, dto({ startDate: '2026-01-31' }));

      await recurring.processDue('2026-03-15');
      expect((await reload(schedule.id)).nextRunDate).toBe('2026-02-28');

      await recurring.processDue('2026-03-15');
      expect((await reload(schedule.id)).nextRunDate).toBe('2026-03-28');
      expect(await ctx.dataSource.manager.count(Invoice)).toBe(2);
    });

    test('skips schedules not yet due and inactive ones', async () => {
      await recurring.create(OWNER, dto({ startDate: '2026-03-16' }));
      const paused = await recurring.create(OWNER, dto());
      await recurring.toggle(OWNER, paused.id);

      const result = await recurring.processDue('2026-03-15');
      expect(result.due).toBe(0);
    });

    test('the owner route sweeps only the caller schedules', async () => {
      const globex = await createCustomer(ctx, OTHER_OWNER, 'Globex');
      const foreignExpired = await recurring.create(
        OTHER_OWNER,
        dto({ customerId: globex.id, startDate: '2026-01-01', endDate: '2026-02-01' }),
      );
      const foreignDue = await recurring.create(
        OTHER_OWNER,
        dto({ customerId: globex.id }),
      );
      await recurring.create(OWNER, dto());

      const result = await ctx.moduleRef
        .get(RecurringController)
        .processDue(OWNER, {});

      expect(result).toEqual({
        today: '2026-03-15',
        due: 1,
        generated: 1,
        deactivated: 0,
        failures: [],
      });
      expect((await reload(foreignExpired.id)).isActive).toBe(true);
      const untouched = await reload(foreignDue.id);
      expect(untouched.nextRunDate).toBe('2026-03-15');
      expect(untouched.totalGenerated).toBe(0);
      expect(await ctx.dataSource.manager.count(Invoice)).toBe(1);
    });

    test('the owner route rejects a cut-off date later than today', async () => {
      const schedule = await recurring.create(
        OWNER,
        dto({ endDate: '2026-06-30' }),
      );

      await expect(
        ctx.moduleRef
          .get(RecurringController)
          .processDue(OWNER, { today: '2099-01-01' }),
      ).rejects.toBeInstanceOf(BadRequestException);

      const after = await reload(schedule.id);
      expect(after.isActive).toBe(true);
      expect(after.totalGenerated).toBe(0);
    });

    test('the owner route accepts a past cut-off date', async () => {
      await recurring.create(OWNER, dto());
      const result = await recurring.processDueForOwner(OWNER, '2026-03-10');
      expect(result.due).toBe(0);
    });

    test('one failing schedule out of five does not stop the others', async () => {
      const failingCustomer = await createCustomer(ctx, OWNER, 'Broken Co');
      const schedules: RecurringSchedule[] = [];
      for (let i = 0; i < 5; i++) {
        const customerId = i === 2 ? failingCustomer.id : customer.id;
        schedules.push(await recurring.create(OWNER, dto({ customerId })));
      }
      const failing = schedules[2];

      const invoices = ctx.moduleRef.get(InvoicesService);
      const createInTransaction = invoices.createInTransaction.bind(invoices);
      jest
        .spyOn(invoices, 'createInTransaction')
        .mockImplementation(async (manager, ownerId, input) => {
          // Falla después de escribir: la transacción debe deshacer la factura
          const invoice = await createInTransaction(manager, ownerId, input);
          if (input.customerId === failingCustomer.id) {
            throw new Error('template rejected');
          }
          return invoice;
        });
      const errors = jest
        .spyOn(Logger.prototype, 'error')
        .mockImplementation(() => undefined);

      const result = await recurring.processDue('2026-03-15');

      expect(result.due).toBe(5);
      expect(result.generated).toBe(4);
      expect(result.failures).toEqual([
        { scheduleId: failing.id, ownerId: OWNER, error: 'template rejected' },
      ]);
      expect(errors).toHaveBeenCalledTimes(1);

      const numbers = (await ctx.dataSource.manager.find(Invoice, { order: { id: 'ASC' } })).map(
        (i) => i.number,
      );
      expect(numbers).toEqual(['INV-0001', 'INV-0002', 'INV-0003', 'INV-0004']);

      const untouched = await reload(failing.id);
      expect(untouched.nextRunDate).toBe('2026-03-15');
      expect(untouched.totalGenerated).toBe(0);
    });
  });
});
