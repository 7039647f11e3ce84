import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  Activity,
  ActivityAction,
  ActivityEntityType,
} from './entities/activity.entity';

type AuditPayload = {
  ownerId: string;
  action: ActivityAction;
  entityType: ActivityEntityType;
  entityId: number | null;
  description: string;
};

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectRepository(Activity)
    private readonly activities: Repository<Activity>,
  ) {}

  /**
   * Registra una entrada legible del historial.
   * Se llama después del commit; si falla solo se loguea, nunca interrumpe la operación.
   */
  async record(p: AuditPayload): Promise<void> {
    try {
      await this.activities.insert({
        ownerId: p.ownerId,
        action: p.action,
        entityType: p.entityType,
        entityId: p.entityId,
        description: p.description,
      });
    } catch (e) {
      this.logger.warn(
        `Activity log failed (${p.action} ${p.entityType}#${p.entityId ?? '-'}): ${
          e instanceof Error ? e.message : String(e)
        }`,
      );
    }
  }

  listRecent(ownerId: string, limit = 20) {
    return this.activities.find({
      where: { ownerId },
      order: { createdAt: 'DESC', id: 'DESC' },
      take: Math.min(Math.max(limit, 1), 100),
    });
  }
}
