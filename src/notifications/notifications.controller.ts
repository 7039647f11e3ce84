import { Controller, Get, Param, ParseIntPipe, Patch } from '@nestjs/common';
import { CurrentOwner } from '../auth/current-owner.decorator';
import { NotificationsService } from './notifications.service';

@Controller('notifications')
export class NotificationsController {
  constructor(private readonly notifications: NotificationsService) {}

  @Get()
  list(@CurrentOwner() ownerId: string) {
    return this.notifications.list(ownerId);
  }

  @Patch(':id/read')
  markRead(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.notifications.markRead(ownerId, id);
  }
}
