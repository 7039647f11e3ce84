// src/quotations/quotations.service.ts
import {
  BadRequestException,
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { AuditService } from '../audit/audit.service';
import { recomputeTotals } from '../billing/document-aggregator';
import {
  QUOTATION_STATUS_LABELS,
  QuotationStatus,
  assertQuotationMutable,
  assertQuotationTransition,
} from '../billing/lifecycle/quotation-status';
import { DocumentLineInput, priceLine } from '../billing/line-calculator';
import { NumberingService } from '../billing/numbering/numbering.service';
import { Clock } from '../common/clock';
import { formatMoney } from '../common/rounding';
import { CustomersService } from '../customers/customers.service';
import { InvoiceWithBalance } from '../invoices/invoice-balance';
import { InvoicesService } from '../invoices/invoices.service';
import { CreateQuotationDto } from './dto/create-quotation.dto';
import { ListQuotationsQueryDto } from './dto/list-quotations.dto';
import { UpdateQuotationDto } from './dto/update-quotation.dto';
import { QuotationItem } from './entities/quotation-item.entity';
import { Quotation } from './entities/quotation.entity';

/**
 * Cotizaciones (proformas).
 * Mismo cálculo que las facturas; `converted` es terminal y solo lo escribe convert().
 */
@Injectable()
export class QuotationsService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly numbering: NumberingService,
    private readonly customers: CustomersService,
    private readonly invoices: InvoicesService,
    private readonly audit: AuditService,
    private readonly clock: Clock,
  ) {}

  // ===== Lectura =====

  async list(ownerId: string, q: ListQuotationsQueryDto) {
    const { page, pageSize } = q;
    const qb = this.dataSource.manager
      .createQueryBuilder(Quotation, 'quotation')
      .leftJoinAndSelect('quotation.customer', 'customer')
      .where('quotation.ownerId = :ownerId', { ownerId });

    const term = q.search?.trim().toLowerCase();
    if (term) {
      qb.andWhere(
        '(LOWER(quotation.number) LIKE :term OR LOWER(customer.companyName) LIKE :term)',
        { term: `%${term}%` },
      );
    }
    if (q.status) qb.andWhere('quotation.status = :status', { status: q.status });

    const direction = q.order === 'asc' ? 'ASC' : 'DESC';
    qb.orderBy(`quotation.${q.sort ?? 'createdAt'}`, direction)
      .addOrderBy('quotation.id', direction)
      .skip((page - 1) * pageSize)
      .take(pageSize);

    const [items, total] = await qb.getManyAndCount();
    return { items, total, page, pageSize };
  }

  async findOne(ownerId: string, id: number): Promise<Quotation> {
    const quotation = await this.dataSource.manager.findOne(Quotation, {
      where: { id, ownerId },
      relations: { customer: true, items: true },
    });
    if (!quotation) throw new NotFoundException('Quotation not found');
    quotation.items?.sort((a, b) => a.id - b.id);
    return quotation;
  }

  /** Vista previa del próximo número (no lo reserva). */
  async nextNumber(ownerId: string): Promise<{ number: string }> {
    return {
      number: await this.numbering.peek(ownerId, 'quotation', this.clock.today()),
    };
  }

  private async findOwned(
    manager: EntityManager,
    ownerId: string,
    id: number,
  ): Promise<Quotation> {
    const quotation = await manager.findOne(Quotation, {
      where: { id, ownerId },
    });
    if (!quotation) throw new NotFoundException('Quotation not found');
    return quotation;
  }

  // ===== Mutaciones =====

  async create(ownerId: string, dto: CreateQuotationDto): Promise<Quotation> {
    const { quotation, companyName } = await this.dataSource.transaction(
      async (manager) => {
        const customer = await this.customers.findOwned(
          manager,
          ownerId,
          dto.customerId,
        );
        // La serie anual sigue el año en curso, no la fecha del documento
        const number = await this.numbering.next(
          manager,
          ownerId,
          'quotation',
          this.clock.today(),
        );

        const quotation = await manager.save(
          manager.create(Quotation, {
            ownerId,
            customerId: dto.customerId,
            number,
            quotationDate: dto.quotationDate,
            validUntil: dto.validUntil ?? null,
            status: 'draft',
            notes: dto.notes ?? null,
            convertedInvoiceId: null,
          }),
        );

        const lines = dto.items.map(priceLine);
        if (lines.length) {
          await manager.insert(
            QuotationItem,
            lines.map((l) => ({ ...l, quotationId: quotation.id })),
          );
        }
        await this.refreshTotals(manager, quotation.id);
        return { quotation, companyName: customer.companyName };
      },
    );

    await this.audit.record({
      ownerId,
      action: 'create',
      entityType: 'quotation',
      entityId: quotation.id,
      description: `Quotation '${quotation.number}' created (${companyName})`,
    });
    return this.findOne(ownerId, quotation.id);
  }

  async update(
    ownerId: string,
    id: number,
    dto: UpdateQuotationDto,
  ): Promise<Quotation> {
    const quotation = await this.dataSource.transaction(async (manager) => {
      const current = await this.findOwned(manager, ownerId, id);
      assertQuotationMutable(current.status);

      const patch: Partial<
        Pick<Quotation, 'customerId' | 'quotationDate' | 'validUntil' | 'notes'>
      > = {};
      if (dto.customerId != null) {
        await this.customers.findOwned(manager, ownerId, dto.customerId);
        patch.customerId = dto.customerId;
      }
      if (dto.quotationDate != null) {
        patch.quotationDate = dto.quotationDate;
      }
      if (dto.validUntil !== undefined) patch.validUntil = dto.validUntil;
      if (dto.notes !== undefined) patch.notes = dto.notes;

      if (Object.keys(patch).length) {
        await manager.update(Quotation, { id }, patch);
      }
      return current;
    });

    await this.audit.record({
      ownerId,
      action: 'update',
      entityType: 'quotation',
      entityId: id,
      description: `Quotation '${quotation.number}' updated`,
    });
    return this.findOne(ownerId, id);
  }

  async updateStatus(
    ownerId: string,
    id: number,
    status: QuotationStatus,
  ): Promise<Quotation> {
    const previous = await this.dataSource.transaction(async (manager) => {
      const current = await this.findOwned(manager, ownerId, id);
      assertQuotationTransition(current.status, status);
      await manager.update(Quotation, { id }, { status });
      return current;
    });

    await this.audit.record({
      ownerId,
      action: 'status_change',
      entityType: 'quotation',
      entityId: id,
      description: `Quotation '${previous.number}' status changed from '${
        QUOTATION_STATUS_LABELS[previous.status]
      }' to '${QUOTATION_STATUS_LABELS[status]}'`,
    });
    return this.findOne(ownerId, id);
  }

  async addItem(
    ownerId: string,
    id: number,
    dto: DocumentLineInput,
  ): Promise<Quotation> {
    const { quotation, item } = await this.dataSource.transaction(
      async (manager) => {
        const current = await this.findOwned(manager, ownerId, id);
        assertQuotationMutable(current.status);

        const item = await manager.save(
          manager.create(QuotationItem, { ...priceLine(dto), quotationId: id }),
        );
        await this.refreshTotals(manager, id);
        return { quotation: current, item };
      },
    );

    await this.audit.record({
      ownerId,
      action: 'create',
      entityType: 'quotation_item',
      entityId: item.id,
      description: `Item '${item.description}' added to quotation '${quotation.number}'`,
    });
    return this.findOne(ownerId, id);
  }

  async removeItem(
    ownerId: string,
    id: number,
    itemId: number,
  ): Promise<Quotation> {
    const { quotation, item } = await this.dataSource.transaction(
      async (manager) => {
        const current = await this.findOwned(manager, ownerId, id);
        assertQuotationMutable(current.status);

        const item = await manager.findOne(QuotationItem, {
          where: { id: itemId, quotationId: id },
        });
        if (!item) throw new NotFoundException('Quotation item not found');

        await manager.delete(QuotationItem, { id: itemId });
        await this.refreshTotals(manager, id);
        return { quotation: current, item };
      },
    );

    await this.audit.record({
      ownerId,
      action: 'delete',
      entityType: 'quotation_item',
      entityId: item.id,
      description: `Item '${item.description}' removed from quotation '${quotation.number}'`,
    });
    return this.findOne(ownerId, id);
  }

  async remove(ownerId: string, id: number): Promise<{ deleted: true }> {
    const quotation = await this.dataSource.transaction(async (manager) => {
      const current = await this.findOwned(manager, ownerId, id);
      assertQuotationMutable(current.status);
      await manager.delete(QuotationItem, { quotationId: id });
      await manager.delete(Quotation, { id });
      return current;
    });

    await this.audit.record({
      ownerId,
      action: 'delete',
      entityType: 'quotation',
      entityId: id,
      description: `Quotation '${quotation.number}' deleted`,
    });
    return { deleted: true };
  }

  // ===== Conversión =====

  /**
   * Convierte la cotización en factura (borrador, fecha de hoy).
   * Copia líneas y totales TAL CUAL: la factura refleja lo que vio el cliente
   * aunque los precios del catálogo hayan cambiado.
   */
  async convert(ownerId: string, id: number): Promise<InvoiceWithBalance> {
    const { quotation, invoiceId, invoiceNumber } =
      await this.dataSource.transaction(async (manager) => {
        const quotation = await this.findOwned(manager, ownerId, id);
        if (quotation.status === 'converted') {
          throw new ConflictException(
            'Quotation has already been converted to an invoice',
          );
        }

        const items = await manager.find(QuotationItem, {
          where: { quotationId: id },
          order: { id: 'ASC' },
        });
        if (!items.length) {
          throw new BadRequestException(
            'An empty quotation cannot be converted to an invoice',
          );
        }

        const invoice = await this.invoices.createVerbatim(
          manager,
          ownerId,
          {
            customerId: quotation.customerId,
            invoiceDate: this.clock.today(),
            dueDate: null,
            status: 'draft',
            notes: quotation.notes,
          },
          items,
          {
            subtotal: quotation.subtotal,
            taxTotal: quotation.taxTotal,
            total: quotation.total,
          },
        );

        await manager.update(
          Quotation,
          { id },
          { status: 'converted', convertedInvoiceId: invoice.id },
        );
        return { quotation, invoiceId: invoice.id, invoiceNumber: invoice.number };
      });

    await this.audit.record({
      ownerId,
      action: 'create',
      entityType: 'invoice',
      entityId: invoiceId,
      description: `Invoice '${invoiceNumber}' created from quotation '${quotation.number}' (total ${formatMoney(quotation.total)})`,
    });
    await this.audit.record({
      ownerId,
      action: 'convert',
      entityType: 'quotation',
      entityId: quotation.id,
      description: `Quotation '${quotation.number}' converted to invoice '${invoiceNumber}'`,
    });
    return this.invoices.findOne(ownerId, invoiceId);
  }

  // ===== Helpers =====

  private refreshTotals(manager: EntityManager, quotationId: number) {
    return recomputeTotals(
      () => manager.find(QuotationItem, { where: { quotationId } }),
      (totals) => manager.update(Quotation, { id: quotationId }, totals),
    );
  }
}
