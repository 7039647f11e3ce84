// src/recurring/recurring.scheduler.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { RecurringService, SweepResult } from './recurring.service';

/**
 * Barrido diario de facturas recurrentes.
 * Asume un único proceso activo; si un barrido sigue en curso el siguiente se omite.
 */
@Injectable()
export class RecurringScheduler {
  private readonly logger = new Logger(RecurringScheduler.name);
  private readonly enabled: boolean;
  private running = false;

  constructor(
    private readonly recurring: RecurringService,
    cfg: ConfigService,
  ) {
    this.enabled = String(cfg.get('RECURRING_SWEEP_ENABLED') ?? 'true') !== 'false';
  }

  @Cron(CronExpression.EVERY_DAY_AT_1AM, { name: 'recurring-invoices' })
  async sweep(): Promise<SweepResult | null> {
    if (!this.enabled) return null;
    if (this.running) {
      this.logger.warn('Previous recurring sweep still running; skipping');
      return null;
    }

    this.running = true;
    try {
      return await this.recurring.processDue();
    } catch (e) {
      this.logger.error(
        `Recurring sweep aborted: ${e instanceof Error ? e.message : String(e)}`,
      );
      return null;
    } finally {
      this.running = false;
    }
  }
}
