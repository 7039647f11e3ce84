// src/recurring/recurring.service.ts
import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, LessThanOrEqual } from 'typeorm';
import { AuditService } from '../audit/audit.service';
import {
  DocumentTotals,
  aggregateTotals,
} from '../billing/document-aggregator';
import { DocumentLineInput, priceLine } from '../billing/line-calculator';
import { Clock } from '../common/clock';
import { addDaysTo } from '../common/dates';
import { CustomersService } from '../customers/customers.service';
import { Invoice } from '../invoices/entities/invoice.entity';
import { InvoicesService } from '../invoices/invoices.service';
import { NotificationsService } from '../notifications/notifications.service';
import { CreateRecurringDto } from './dto/create-recurring.dto';
import { UpdateRecurringDto } from './dto/update-recurring.dto';
import { RecurringItem } from './entities/recurring-item.entity';
import { RecurringSchedule } from './entities/recurring-schedule.entity';
import { FREQUENCY_LABELS, computeNextRun } from './schedule';

export type RecurringScheduleView = RecurringSchedule & {
  frequencyLabel: string;
  /** Totales que tendría la próxima factura con la plantilla actual */
  previewTotals: DocumentTotals;
};

export interface GenerationResult {
  invoice: Invoice;
  nextRunDate: string;
  /** La plantilla quedó desactivada por superar la fecha fin */
  finished: boolean;
}

export interface SweepFailure {
  scheduleId: number;
  ownerId: string;
  error: string;
}

export interface SweepResult {
  today: string;
  due: number;
  generated: number;
  deactivated: number;
  failures: SweepFailure[];
}

/**
 * Facturación recurrente.
 * Cada generación es todo-o-nada: factura + avance del cursor en una transacción.
 */
@Injectable()
export class RecurringService {
  private readonly logger = new Logger(RecurringService.name);
  private readonly paymentTermDays: number;

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly invoices: InvoicesService,
    private readonly customers: CustomersService,
    private readonly audit: AuditService,
    private readonly notifications: NotificationsService,
    private readonly clock: Clock,
    cfg: ConfigService,
  ) {
    this.paymentTermDays = Number(cfg.get('DEFAULT_PAYMENT_TERM_DAYS') ?? 30);
  }

  // ===== CRUD =====

  list(ownerId: string, isActive?: boolean) {
    return this.dataSource.manager.find(RecurringSchedule, {
      where: { ownerId, isActive },
      relations: { customer: true },
      order: { nextRunDate: 'ASC', id: 'ASC' },
    });
  }

  async findOne(ownerId: string, id: number): Promise<RecurringScheduleView> {
    const schedule = await this.findOwned(this.dataSource.manager, ownerId, id, {
      withCustomer: true,
    });
    const items = schedule.items ?? [];
    return {
      ...schedule,
      frequencyLabel: FREQUENCY_LABELS[schedule.frequency],
      previewTotals: aggregateTotals(items.map(priceLine)),
    };
  }

  async create(
    ownerId: string,
    dto: CreateRecurringDto,
  ): Promise<RecurringScheduleView> {
    if (!dto.items.length) {
      throw new BadRequestException(
        'A recurring schedule needs at least one template item',
      );
    }
    if (dto.endDate && dto.endDate < dto.startDate) {
      throw new BadRequestException('endDate must not be before startDate');
    }

    const { schedule, companyName } = await this.dataSource.transaction(
      async (manager) => {
        const customer = await this.customers.findOwned(
          manager,
          ownerId,
          dto.customerId,
        );
        const schedule = await manager.save(
          manager.create(RecurringSchedule, {
            ownerId,
            customerId: dto.customerId,
            frequency: dto.frequency,
            startDate: dto.startDate,
            endDate: dto.endDate ?? null,
            nextRunDate: dto.startDate,
            isActive: true,
            notes: dto.notes ?? null,
            lastGeneratedAt: null,
            totalGenerated: 0,
          }),
        );
        await this.insertTemplate(manager, schedule.id, dto.items);
        return { schedule, companyName: customer.companyName };
      },
    );

    await this.audit.record({
      ownerId,
      action: 'create',
      entityType: 'recurring_schedule',
      entityId: schedule.id,
      description: `Recurring schedule created (${companyName}, ${FREQUENCY_LABELS[schedule.frequency]})`,
    });
    return this.findOne(ownerId, schedule.id);
  }

  /** Frecuencia, fecha fin, notas, estado y, opcionalmente, la plantilla completa. */
  async update(
    ownerId: string,
    id: number,
    dto: UpdateRecurringDto,
  ): Promise<RecurringScheduleView> {
    await this.dataSource.transaction(async (manager) => {
      const current = await this.findOwned(manager, ownerId, id);
      if (dto.endDate != null && dto.endDate < current.startDate) {
        throw new BadRequestException('endDate must not be before startDate');
      }

      const patch: Partial<
        Pick<RecurringSchedule, 'frequency' | 'endDate' | 'isActive' | 'notes'>
      > = {};
      if (dto.frequency != null) patch.frequency = dto.frequency;
      if (dto.endDate !== undefined) patch.endDate = dto.endDate;
      if (dto.isActive != null) patch.isActive = dto.isActive;
      if (dto.notes !== undefined) patch.notes = dto.notes;
      if (Object.keys(patch).length) {
        await manager.update(RecurringSchedule, { id }, patch);
      }

      if (dto.items) {
        if (!dto.items.length) {
          throw new BadRequestException(
            'A recurring schedule needs at least one template item',
          );
        }
        await manager.delete(RecurringItem, { scheduleId: id });
        await this.insertTemplate(manager, id, dto.items);
      }
    });

    await this.audit.record({
      ownerId,
      action: 'update',
      entityType: 'recurring_schedule',
      entityId: id,
      description: `Recurring schedule #${id} updated`,
    });
    return this.findOne(ownerId, id);
  }

  async toggle(ownerId: string, id: number): Promise<RecurringScheduleView> {
    const isActive = await this.dataSource.transaction(async (manager) => {
      const current = await this.findOwned(manager, ownerId, id);
      const isActive = !current.isActive;
      await manager.update(RecurringSchedule, { id }, { isActive });
      return isActive;
    });

    await this.audit.record({
      ownerId,
      action: 'update',
      entityType: 'recurring_schedule',
      entityId: id,
      description: `Recurring schedule #${id} ${isActive ? 'activated' : 'paused'}`,
    });
    return this.findOne(ownerId, id);
  }

  async remove(ownerId: string, id: number): Promise<{ deleted: true }> {
    await this.dataSource.transaction(async (manager) => {
      await this.findOwned(manager, ownerId, id);
      await manager.delete(RecurringItem, { scheduleId: id });
      await manager.delete(RecurringSchedule, { id });
    });

    await this.audit.record({
      ownerId,
      action: 'delete',
      entityType: 'recurring_schedule',
      entityId: id,
      description: `Recurring schedule #${id} deleted`,
    });
    return { deleted: true };
  }

  // ===== Generación =====

  /** Generación manual inmediata (no espera a la fecha del cursor). */
  async generateNow(ownerId: string, id: number): Promise<GenerationResult> {
    const schedule = await this.findOwned(this.dataSource.manager, ownerId, id);
    if (!schedule.isActive) {
      throw new ConflictException(
        'Recurring schedule is paused; activate it before generating',
      );
    }
    return this.generate(schedule);
  }

  /**
   * Crea la factura desde la plantilla y avanza el cursor, en una sola transacción.
   * Si el nuevo cursor supera endDate, la plantilla se desactiva (la factura generada se mantiene).
   */
  async generate(
    schedule: RecurringSchedule,
    today: string = this.clock.today(),
  ): Promise<GenerationResult> {
    const items = schedule.items ?? (await this.loadTemplate(schedule.id));
    if (!items.length) {
      throw new BadRequestException(
        `Recurring schedule #${schedule.id} has no template items`,
      );
    }

    const result = await this.dataSource.transaction(async (manager) => {
      const invoice = await this.invoices.createInTransaction(
        manager,
        schedule.ownerId,
        {
          customerId: schedule.customerId,
          invoiceDate: today,
          dueDate: addDaysTo(today, this.paymentTermDays),
          status: 'draft',
          notes: this.generatedNotes(schedule),
          items,
        },
      );

      const nextRunDate = computeNextRun(
        schedule.nextRunDate,
        schedule.frequency,
      );
      const finished = schedule.endDate !== null && nextRunDate > schedule.endDate;
      await manager.update(
        RecurringSchedule,
        { id: schedule.id },
        {
          nextRunDate,
          totalGenerated: schedule.totalGenerated + 1,
          lastGeneratedAt: this.clock.now(),
          isActive: finished ? false : schedule.isActive,
        },
      );
      return { invoice, nextRunDate, finished };
    });

    this.logger.log(
      `Recurring schedule #${schedule.id} generated invoice ${result.invoice.number}; next run ${result.nextRunDate}`,
    );
    await this.afterGeneration(schedule, result);
    return result;
  }

  /**
   * Barrido manual de las plantillas de un propietario.
   * La fecha de corte puede ser pasada, nunca posterior a hoy.
   */
  processDueForOwner(ownerId: string, today?: string): Promise<SweepResult> {
    const now = this.clock.today();
    if (today !== undefined && today > now) {
      throw new BadRequestException(
        `today must not be later than the current date (${now})`,
      );
    }
    return this.processDue(today ?? now, ownerId);
  }

  /**
   * Barrido de plantillas vencidas (nextRunDate ≤ hoy); sin `ownerId` recorre todos
   * los propietarios (cron y script).
   * Cada plantilla se procesa aislada: un fallo se registra y el barrido continúa.
   */
  async processDue(
    today: string = this.clock.today(),
    ownerId?: string,
  ): Promise<SweepResult> {
    const due = await this.dataSource.manager.find(RecurringSchedule, {
      where: {
        isActive: true,
        nextRunDate: LessThanOrEqual(today),
        ...(ownerId === undefined ? {} : { ownerId }),
      },
      relations: { items: true },
      order: { nextRunDate: 'ASC', id: 'ASC' },
    });

    const result: SweepResult = {
      today,
      due: due.length,
      generated: 0,
      deactivated: 0,
      failures: [],
    };

    for (const schedule of due) {
      try {
        // La fecha fin se compara contra HOY, no contra el cursor
        if (schedule.endDate !== null && schedule.endDate < today) {
          await this.deactivateExpired(schedule);
          result.deactivated += 1;
          continue;
        }
        await this.generate(schedule, today);
        result.generated += 1;
      } catch (e) {
        const error = e instanceof Error ? e.message : String(e);
        this.logger.error(
          `Recurring schedule #${schedule.id} failed to generate: ${error}`,
        );
        result.failures.push({
          scheduleId: schedule.id,
          ownerId: schedule.ownerId,
          error,
        });
      }
    }

    this.logger.log(
      `Recurring sweep ${today}: ${result.due} due, ${result.generated} generated, ${result.deactivated} deactivated, ${result.failures.length} failed`,
    );
    return result;
  }

  // ===== Helpers =====

  private async findOwned(
    manager: EntityManager,
    ownerId: string,
    id: number,
    opts: { withCustomer?: boolean } = {},
  ): Promise<RecurringSchedule> {
    const schedule = await manager.findOne(RecurringSchedule, {
      where: { id, ownerId },
      relations: { items: true, customer: opts.withCustomer ?? false },
    });
    if (!schedule) throw new NotFoundException('Recurring schedule not found');
    schedule.items?.sort((a, b) => a.id - b.id);
    return schedule;
  }

  private loadTemplate(scheduleId: number) {
    return this.dataSource.manager.find(RecurringItem, {
      where: { scheduleId },
      order: { id: 'ASC' },
    });
  }

  private async insertTemplate(
    manager: EntityManager,
    scheduleId: number,
    items: readonly DocumentLineInput[],
  ): Promise<void> {
    await manager.insert(
      RecurringItem,
      items.map((it) => ({
        scheduleId,
        productId: it.productId ?? null,
        description: it.description.trim(),
        quantity: it.quantity,
        unitPrice: it.unitPrice,
        taxRate: it.taxRate,
      })),
    );
  }

  private generatedNotes(schedule: RecurringSchedule): string {
    const note = `Auto-generated from recurring schedule #${schedule.id} (${FREQUENCY_LABELS[schedule.frequency]})`;
    return schedule.notes ? `${note}\n${schedule.notes}` : note;
  }

  private async deactivateExpired(schedule: RecurringSchedule): Promise<void> {
    await this.dataSource.manager.update(
      RecurringSchedule,
      { id: schedule.id },
      { isActive: false },
    );
    this.logger.log(
      `Recurring schedule #${schedule.id} ended on ${schedule.endDate}; deactivated`,
    );
    await this.notifications.notify({
      ownerId: schedule.ownerId,
      type: 'recurring_finished',
      title: 'Recurring schedule finished',
      message: `Recurring schedule #${schedule.id} reached its end date and was deactivated.`,
      entityType: 'recurring_schedule',
      entityId: schedule.id,
    });
  }

  private async afterGeneration(
    schedule: RecurringSchedule,
    result: GenerationResult,
  ): Promise<void> {
    const { invoice } = result;
    await this.audit.record({
      ownerId: schedule.ownerId,
      action: 'generate',
      entityType: 'invoice',
      entityId: invoice.id,
      description: `Invoice '${invoice.number}' generated from recurring schedule #${schedule.id}`,
    });
    await this.notifications.notify({
      ownerId: schedule.ownerId,
      type: 'recurring_generated',
      title: 'Recurring invoice generated',
      message: `Invoice ${invoice.number} was generated from recurring schedule #${schedule.id}.`,
      entityType: 'invoice',
      entityId: invoice.id,
    });
    if (result.finished) {
      await this.notifications.notify({
        ownerId: schedule.ownerId,
        type: 'recurring_finished',
        title: 'Recurring schedule finished',
        message: `Recurring schedule #${schedule.id} passed its end date and was deactivated.`,
        entityType: 'recurring_schedule',
        entityId: schedule.id,
      });
    }
  }
}
