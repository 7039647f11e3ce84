// src/recurring/recurring.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { CurrentOwner } from '../auth/current-owner.decorator';
import { CreateRecurringDto } from './dto/create-recurring.dto';
import { ListRecurringQueryDto } from './dto/list-recurring.dto';
import { ProcessDueDto } from './dto/process-due.dto';
import { UpdateRecurringDto } from './dto/update-recurring.dto';
import { RecurringService } from './recurring.service';

/**
 * Facturas recurrentes (plantillas)
 * - El barrido automático corre en RecurringScheduler.
 * - /generate y /process-due permiten forzarlo a mano, solo sobre las plantillas propias.
 */
@Controller('recurring')
export class RecurringController {
  constructor(private readonly recurring: RecurringService) {}

  @Get()
  list(
    @CurrentOwner() ownerId: string,
    @Query() query: ListRecurringQueryDto,
  ) {
    return this.recurring.list(ownerId, query.isActive);
  }

  /** Ejecuta el barrido de vencidas del propietario (el de todo el sistema es del cron) */
  @Post('process-due')
  processDue(@CurrentOwner() ownerId: string, @Body() dto: ProcessDueDto) {
    return this.recurring.processDueForOwner(ownerId, dto.today);
  }

  @Get(':id')
  findOne(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.recurring.findOne(ownerId, id);
  }

  @Post()
  create(@CurrentOwner() ownerId: string, @Body() dto: CreateRecurringDto) {
    return this.recurring.create(ownerId, dto);
  }

  @Put(':id')
  update(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateRecurringDto,
  ) {
    return this.recurring.update(ownerId, id, dto);
  }

  @Post(':id/toggle')
  toggle(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.recurring.toggle(ownerId, id);
  }

  /** Genera ahora la próxima factura de la plantilla */
  @Post(':id/generate')
  generate(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.recurring.generateNow(ownerId, id);
  }

  @Delete(':id')
  remove(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.recurring.remove(ownerId, id);
  }
}
