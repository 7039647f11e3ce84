// src/notifications/notifications.service.ts
import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Notification, NotificationType } from './entities/notification.entity';

export type NotifyInput = {
  ownerId: string;
  type: NotificationType;
  title: string;
  message: string;
  entityType?: string;
  entityId?: number;
};

/**
 * Avisos internos para el propietario.
 * Siempre se disparan después del commit y en modo best-effort:
 * un fallo aquí no deshace ni bloquea la operación financiera.
 */
@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(
    @InjectRepository(Notification)
    private readonly notifications: Repository<Notification>,
  ) {}

  async notify(input: NotifyInput): Promise<void> {
    try {
      await this.notifications.insert({
        ownerId: input.ownerId,
        type: input.type,
        title: input.title,
        message: input.message,
        entityType: input.entityType ?? null,
        entityId: input.entityId ?? null,
        isRead: false,
      });
    } catch (e) {
      this.logger.warn(
        `Notification '${input.type}' for owner ${input.ownerId} dropped: ${
          e instanceof Error ? e.message : String(e)
        }`,
      );
    }
  }

  list(ownerId: string) {
    return this.notifications.find({
      where: { ownerId },
      order: { isRead: 'ASC', createdAt: 'DESC', id: 'DESC' },
      take: 50,
    });
  }

  async markRead(ownerId: string, id: number): Promise<Notification> {
    const notification = await this.notifications.findOne({
      where: { id, ownerId },
    });
    if (!notification) throw new NotFoundException('Notification not found');
    if (!notification.isRead) {
      await this.notifications.update({ id }, { isRead: true });
      notification.isRead = true;
    }
    return notification;
  }
}
