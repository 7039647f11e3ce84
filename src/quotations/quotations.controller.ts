// src/quotations/quotations.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { CurrentOwner } from '../auth/current-owner.decorator';
import { LineItemDto } from '../billing/dto/line-item.dto';
import { CreateQuotationDto } from './dto/create-quotation.dto';
import { ListQuotationsQueryDto } from './dto/list-quotations.dto';
import { UpdateQuotationStatusDto } from './dto/update-quotation-status.dto';
import { UpdateQuotationDto } from './dto/update-quotation.dto';
import { QuotationsService } from './quotations.service';

/**
 * Cotizaciones
 * - Mismas reglas de cálculo que las facturas.
 * - Una cotización convertida queda como registro histórico (solo lectura).
 */
@Controller('quotations')
export class QuotationsController {
  constructor(private readonly quotations: QuotationsService) {}

  @Get()
  list(
    @CurrentOwner() ownerId: string,
    @Query() query: ListQuotationsQueryDto,
  ) {
    return this.quotations.list(ownerId, query);
  }

  /** Próximo número de la serie del año (no lo consume) */
  @Get('next-number')
  nextNumber(@CurrentOwner() ownerId: string) {
    return this.quotations.nextNumber(ownerId);
  }

  @Get(':id')
  findOne(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.quotations.findOne(ownerId, id);
  }

  @Post()
  create(@CurrentOwner() ownerId: string, @Body() dto: CreateQuotationDto) {
    return this.quotations.create(ownerId, dto);
  }

  @Put(':id')
  update(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateQuotationDto,
  ) {
    return this.quotations.update(ownerId, id, dto);
  }

  @Patch(':id/status')
  updateStatus(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateQuotationStatusDto,
  ) {
    return this.quotations.updateStatus(ownerId, id, dto.status);
  }

  @Post(':id/items')
  addItem(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: LineItemDto,
  ) {
    return this.quotations.addItem(ownerId, id, dto);
  }

  @Delete(':id/items/:itemId')
  removeItem(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Param('itemId', ParseIntPipe) itemId: number,
  ) {
    return this.quotations.removeItem(ownerId, id, itemId);
  }

  /** Crea la factura a partir de la cotización (una sola vez) */
  @Post(':id/convert')
  convert(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.quotations.convert(ownerId, id);
  }

  @Delete(':id')
  remove(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.quotations.remove(ownerId, id);
  }
}
