// src/invoices/invoices.controller.ts
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
import { CreateInvoiceDto } from './dto/create-invoice.dto';
import { ListInvoicesQueryDto } from './dto/list-invoices.dto';
import { MonthlyRevenueQueryDto } from './dto/monthly-revenue.dto';
import { UpdateInvoiceStatusDto } from './dto/update-invoice-status.dto';
import { UpdateInvoiceDto } from './dto/update-invoice.dto';
import { InvoicesService } from './invoices.service';

/**
 * Facturas de venta
 * - Totales siempre calculados en backend a partir de las líneas.
 * - Cabecera y líneas editables solo en draft / sent.
 */
@Controller('invoices')
export class InvoicesController {
  constructor(private readonly invoices: InvoicesService) {}

  /** Listado paginado/filtrado */
  @Get()
  list(@CurrentOwner() ownerId: string, @Query() query: ListInvoicesQueryDto) {
    return this.invoices.list(ownerId, query);
  }

  /** Conteos por estado y montos cobrados / pendientes */
  @Get('stats')
  stats(@CurrentOwner() ownerId: string) {
    return this.invoices.stats(ownerId);
  }

  /** Ingresos cobrados por mes para el tablero */
  @Get('monthly-revenue')
  monthlyRevenue(
    @CurrentOwner() ownerId: string,
    @Query() query: MonthlyRevenueQueryDto,
  ) {
    return this.invoices.monthlyRevenue(ownerId, query.months);
  }

  /** Factura con líneas, pagos, pagado y saldo */
  @Get(':id')
  findOne(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.invoices.findOne(ownerId, id);
  }

  /** Representación fija para serializadores externos (UBL / PDF) */
  @Get(':id/export')
  export(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.invoices.exportInvoice(ownerId, id);
  }

  @Post()
  create(@CurrentOwner() ownerId: string, @Body() dto: CreateInvoiceDto) {
    return this.invoices.create(ownerId, dto);
  }

  @Put(':id')
  update(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateInvoiceDto,
  ) {
    return this.invoices.update(ownerId, id, dto);
  }

  @Patch(':id/status')
  updateStatus(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateInvoiceStatusDto,
  ) {
    return this.invoices.updateStatus(ownerId, id, dto.status);
  }

  @Post(':id/items')
  addItem(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: LineItemDto,
  ) {
    return this.invoices.addItem(ownerId, id, dto);
  }

  @Delete(':id/items/:itemId')
  removeItem(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
    @Param('itemId', ParseIntPipe) itemId: number,
  ) {
    return this.invoices.removeItem(ownerId, id, itemId);
  }

  @Delete(':id')
  remove(
    @CurrentOwner() ownerId: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.invoices.remove(ownerId, id);
  }
}
