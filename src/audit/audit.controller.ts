import { Controller, Get, Query } from '@nestjs/common';
import { CurrentOwner } from '../auth/current-owner.decorator';
import { AuditService } from './audit.service';
import { ListActivitiesQueryDto } from './dto/list-activities.dto';

@Controller('activities')
export class AuditController {
  constructor(private readonly audit: AuditService) {}

  @Get()
  list(
    @CurrentOwner() ownerId: string,
    @Query() query: ListActivitiesQueryDto,
  ) {
    return this.audit.listRecent(ownerId, query.limit);
  }
}
