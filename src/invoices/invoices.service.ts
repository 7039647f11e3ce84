// src/invoices/invoices.service.ts
import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import Decimal from 'decimal.js';
import {
  DataSource,
  EntityManager,
  FindOptionsOrder,
  MoreThanOrEqual,
} from 'typeorm';
import { AuditService } from '../audit/audit.service';
import {
  DocumentTotals,
  aggregateTotals,
  recomputeTotals,
} from '../billing/document-aggregator';
import {
  INVOICE_STATUS_LABELS,
  InvoiceStatus,
  assertInvoiceEditable,
  canTransitionInvoice,
} from '../billing/lifecycle/invoice-status';
import {
  DocumentLineInput,
  PricedLine,
  priceLine,
} from '../billing/line-calculator';
import { NumberingService } from '../billing/numbering/numbering.service';
import { Clock } from '../common/clock';
import { monthOf, startOfMonthWindow } from '../common/dates';
import { formatMoney, round2 } from '../common/rounding';
import { CustomersService } from '../customers/customers.service';
import { Payment } from '../payments/entities/payment.entity';
import { UpdateInvoiceDto } from './dto/update-invoice.dto';
import { ListInvoicesQueryDto } from './dto/list-invoices.dto';
import { InvoiceItem } from './entities/invoice-item.entity';
import { Invoice } from './entities/invoice.entity';
import {
  InvoiceWithBalance,
  newestPaymentFirst,
  paidAmountOf,
  reconciledStatus,
  remainingAmountOf,
  withBalance,
} from './invoice-balance';
import { InvoiceExport, toInvoiceExport } from './invoice-export';

/** Cabecera de una factura nueva (API, conversión o recurrencia). */
export interface NewInvoiceHeader {
  customerId: number;
  invoiceDate: string;
  dueDate?: string | null;
  status?: InvoiceStatus;
  notes?: string | null;
}

export interface NewInvoice extends NewInvoiceHeader {
  items: readonly DocumentLineInput[];
}

export interface InvoiceStats {
  count: number;
  byStatus: Record<InvoiceStatus, number>;
  totalAmount: number;
  paidAmount: number;
  unpaidAmount: number;
}

export interface MonthlyRevenue {
  /** YYYY-MM */
  month: string;
  revenue: number;
}

/**
 * Facturas de venta.
 * Toda mutación corre en una sola transacción; el historial se escribe después del commit.
 */
@Injectable()
export class InvoicesService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly numbering: NumberingService,
    private readonly customers: CustomersService,
    private readonly audit: AuditService,
    private readonly clock: Clock,
  ) {}

  // ===== Lectura =====

  async list(ownerId: string, q: ListInvoicesQueryDto) {
    const { page, pageSize } = q;
    const direction = q.order === 'asc' ? 'ASC' : 'DESC';
    const order: FindOptionsOrder<Invoice> =
      q.sort === 'dueDate'
        ? { dueDate: { direction, nulls: 'LAST' }, id: 'DESC' }
        : { createdAt: direction, id: direction };

    const [items, total] = await this.dataSource.manager.findAndCount(Invoice, {
      where: { ownerId, customerId: q.customerId, status: q.status },
      relations: { customer: true },
      order,
      skip: (page - 1) * pageSize,
      take: pageSize,
    });
    return { items, total, page, pageSize };
  }

  async findOne(ownerId: string, id: number): Promise<InvoiceWithBalance> {
    const invoice = await this.dataSource.manager.findOne(Invoice, {
      where: { id, ownerId },
      relations: { customer: true, items: true, payments: true },
    });
    if (!invoice) throw new NotFoundException('Invoice not found');
    invoice.items?.sort((a, b) => a.id - b.id);
    invoice.payments?.sort(newestPaymentFirst);
    return withBalance(invoice);
  }

  /**
   * Factura del propietario dentro del manager dado.
   * Una factura ajena responde igual que una inexistente.
   */
  async findOwned(
    manager: EntityManager,
    ownerId: string,
    id: number,
  ): Promise<Invoice> {
    const invoice = await manager.findOne(Invoice, { where: { id, ownerId } });
    if (!invoice) throw new NotFoundException('Invoice not found');
    return invoice;
  }

  // ===== Creación =====

  async create(ownerId: string, dto: NewInvoice): Promise<InvoiceWithBalance> {
    const invoice = await this.dataSource.transaction((manager) =>
      this.createInTransaction(manager, ownerId, dto),
    );
    await this.audit.record({
      ownerId,
      action: 'create',
      entityType: 'invoice',
      entityId: invoice.id,
      description: `Invoice '${invoice.number}' created (total ${formatMoney(invoice.total)})`,
    });
    return this.findOne(ownerId, invoice.id);
  }

  /**
   * Crea cabecera + líneas + totales dentro de la transacción del llamador.
   * Usado también por la generación recurrente.
   */
  async createInTransaction(
    manager: EntityManager,
    ownerId: string,
    input: NewInvoice,
  ): Promise<Invoice> {
    const lines = input.items.map(priceLine);
    const invoice = await this.insertDocument(manager, ownerId, input, lines);
    invoice.items = await this.refreshTotals(manager, invoice);
    return invoice;
  }

  /**
   * Crea una factura copiando líneas y totales tal cual (conversión de cotizaciones).
   * No recalcula: la factura refleja exactamente lo que el cliente aceptó.
   */
  async createVerbatim(
    manager: EntityManager,
    ownerId: string,
    header: NewInvoiceHeader,
    lines: readonly PricedLine[],
    totals: DocumentTotals,
  ): Promise<Invoice> {
    const invoice = await this.insertDocument(manager, ownerId, header, lines);
    await manager.update(Invoice, { id: invoice.id }, totals);
    Object.assign(invoice, totals);
    invoice.items = await this.loadItems(manager, invoice.id);
    return invoice;
  }

  private async insertDocument(
    manager: EntityManager,
    ownerId: string,
    header: NewInvoiceHeader,
    lines: readonly PricedLine[],
  ): Promise<Invoice> {
    await this.customers.findOwned(manager, ownerId, header.customerId);
    const number = await this.numbering.next(
      manager,
      ownerId,
      'invoice',
      header.invoiceDate,
    );

    const invoice = await manager.save(
      manager.create(Invoice, {
        ownerId,
        customerId: header.customerId,
        number,
        invoiceDate: header.invoiceDate,
        dueDate: header.dueDate ?? null,
        status: header.status ?? 'draft',
        notes: header.notes ?? null,
        ...aggregateTotals(lines),
      }),
    );

    if (lines.length) {
      await manager.insert(
        InvoiceItem,
        lines.map((l) => ({
          invoiceId: invoice.id,
          productId: l.productId,
          description: l.description,
          quantity: l.quantity,
          unitPrice: l.unitPrice,
          taxRate: l.taxRate,
          lineTotal: l.lineTotal,
          taxAmount: l.taxAmount,
        })),
      );
    }
    return invoice;
  }

  // ===== Edición =====

  async update(
    ownerId: string,
    id: number,
    dto: UpdateInvoiceDto,
  ): Promise<InvoiceWithBalance> {
    const invoice = await this.dataSource.transaction(async (manager) => {
      const current = await this.findOwned(manager, ownerId, id);
      assertInvoiceEditable(current.status);

      const patch: Partial<
        Pick<Invoice, 'customerId' | 'invoiceDate' | 'dueDate' | 'notes'>
      > = {};
      if (dto.customerId != null) {
        await this.customers.findOwned(manager, ownerId, dto.customerId);
        patch.customerId = dto.customerId;
      }
      if (dto.invoiceDate != null) patch.invoiceDate = dto.invoiceDate;
      if (dto.dueDate !== undefined) patch.dueDate = dto.dueDate;
      if (dto.notes !== undefined) patch.notes = dto.notes;

      if (Object.keys(patch).length) {
        await manager.update(Invoice, { id }, patch);
      }
      return current;
    });

    await this.audit.record({
      ownerId,
      action: 'update',
      entityType: 'invoice',
      entityId: invoice.id,
      description: `Invoice '${invoice.number}' updated`,
    });
    return this.findOne(ownerId, id);
  }

  /** Cambio de estado manual (política permisiva, ver INVOICE_STATUS_TRANSITIONS). */
  async updateStatus(
    ownerId: string,
    id: number,
    status: InvoiceStatus,
  ): Promise<InvoiceWithBalance> {
    const previous = await this.dataSource.transaction(async (manager) => {
      const current = await this.findOwned(manager, ownerId, id);
      if (!canTransitionInvoice(current.status, status)) {
        throw new ConflictException(
          `Invoice cannot move from ${current.status} to ${status}`,
        );
      }
      await manager.update(Invoice, { id }, { status });
      return current;
    });

    await this.audit.record({
      ownerId,
      action: 'status_change',
      entityType: 'invoice',
      entityId: id,
      description: `Invoice '${previous.number}' status changed from '${
        INVOICE_STATUS_LABELS[previous.status]
      }' to '${INVOICE_STATUS_LABELS[status]}'`,
    });
    return this.findOne(ownerId, id);
  }

  async addItem(
    ownerId: string,
    id: number,
    dto: DocumentLineInput,
  ): Promise<InvoiceWithBalance> {
    const { invoice, item } = await this.dataSource.transaction(
      async (manager) => {
        const current = await this.findOwned(manager, ownerId, id);
        assertInvoiceEditable(current.status);

        const item = await manager.save(
          manager.create(InvoiceItem, { ...priceLine(dto), invoiceId: id }),
        );
        await this.refreshTotals(manager, current);
        return { invoice: current, item };
      },
    );

    await this.audit.record({
      ownerId,
      action: 'create',
      entityType: 'invoice_item',
      entityId: item.id,
      description: `Item '${item.description}' added to invoice '${invoice.number}'`,
    });
    return this.findOne(ownerId, id);
  }

  /**
   * Elimina una línea. Se rechaza si el nuevo total quedaría por debajo de lo ya pagado
   * (Σ pagos ≤ total debe cumplirse siempre). Si el nuevo total queda cubierto, pasa a paid.
   */
  async removeItem(
    ownerId: string,
    id: number,
    itemId: number,
  ): Promise<InvoiceWithBalance> {
    const { invoice, item, previousStatus } = await this.dataSource.transaction(
      async (manager) => {
        const current = await this.findOwned(manager, ownerId, id);
        assertInvoiceEditable(current.status);

        const item = await manager.findOne(InvoiceItem, {
          where: { id: itemId, invoiceId: id },
        });
        if (!item) throw new NotFoundException('Invoice item not found');

        await manager.delete(InvoiceItem, { id: itemId });

        const paid = paidAmountOf(
          await manager.find(Payment, { where: { invoiceId: id } }),
        );
        await this.refreshTotals(manager, current, (totals) => {
          if (new Decimal(totals.total).lessThan(paid)) {
            throw new ConflictException(
              `Removing this item would leave the invoice total (${formatMoney(
                totals.total,
              )}) below the amount already paid (${formatMoney(paid)})`,
            );
          }
        });

        const previousStatus = current.status;
        const status = reconciledStatus(current.status, current.total, paid);
        if (status !== current.status) {
          await manager.update(Invoice, { id }, { status });
          current.status = status;
        }
        return { invoice: current, item, previousStatus };
      },
    );

    await this.audit.record({
      ownerId,
      action: 'delete',
      entityType: 'invoice_item',
      entityId: item.id,
      description: `Item '${item.description}' removed from invoice '${invoice.number}'`,
    });
    if (invoice.status !== previousStatus) {
      await this.audit.record({
        ownerId,
        action: 'status_change',
        entityType: 'invoice',
        entityId: id,
        description: `Invoice '${invoice.number}' status changed from '${
          INVOICE_STATUS_LABELS[previousStatus]
        }' to '${INVOICE_STATUS_LABELS[invoice.status]}'`,
      });
    }
    return this.findOne(ownerId, id);
  }

  /** Borra la factura con sus líneas y pagos. El número no se reutiliza. */
  async remove(ownerId: string, id: number): Promise<{ deleted: true }> {
    const invoice = await this.dataSource.transaction(async (manager) => {
      const current = await this.findOwned(manager, ownerId, id);
      await manager.delete(Payment, { invoiceId: id });
      await manager.delete(InvoiceItem, { invoiceId: id });
      await manager.delete(Invoice, { id });
      return current;
    });

    await this.audit.record({
      ownerId,
      action: 'delete',
      entityType: 'invoice',
      entityId: id,
      description: `Invoice '${invoice.number}' deleted`,
    });
    return { deleted: true };
  }

  // ===== Exportación / estadísticas =====

  async exportInvoice(ownerId: string, id: number): Promise<InvoiceExport> {
    const manager = this.dataSource.manager;
    const invoice = await this.findOwned(manager, ownerId, id);
    const customer = await this.customers.findOwned(
      manager,
      ownerId,
      invoice.customerId,
    );
    return toInvoiceExport(
      invoice,
      customer,
      await this.loadItems(manager, id),
    );
  }

  /** Resumen para el tablero: conteo por estado y montos cobrados / pendientes. */
  async stats(ownerId: string): Promise<InvoiceStats> {
    const invoices = await this.dataSource.manager.find(Invoice, {
      where: { ownerId },
      relations: { payments: true },
    });

    const byStatus: Record<InvoiceStatus, number> = {
      draft: 0,
      sent: 0,
      paid: 0,
      cancelled: 0,
    };
    let totalAmount = new Decimal(0);
    let paidAmount = new Decimal(0);
    let unpaidAmount = new Decimal(0);

    for (const inv of invoices) {
      byStatus[inv.status] += 1;
      if (inv.status === 'cancelled') continue;
      const paid = paidAmountOf(inv.payments ?? []);
      totalAmount = totalAmount.plus(inv.total);
      paidAmount = paidAmount.plus(paid);
      unpaidAmount = unpaidAmount.plus(remainingAmountOf(inv.total, paid));
    }

    return {
      count: invoices.length,
      byStatus,
      totalAmount: round2(totalAmount),
      paidAmount: round2(paidAmount),
      unpaidAmount: round2(unpaidAmount),
    };
  }

  /**
   * Ingresos por mes (facturas paid, por mes de emisión) de los últimos `months`
   * meses incluido el actual. Los meses sin ingresos no aparecen.
   */
  async monthlyRevenue(ownerId: string, months = 6): Promise<MonthlyRevenue[]> {
    const from = startOfMonthWindow(this.clock.today(), months);
    const paid = await this.dataSource.manager.find(Invoice, {
      where: { ownerId, status: 'paid', invoiceDate: MoreThanOrEqual(from) },
    });

    const byMonth = new Map<string, Decimal>();
    for (const inv of paid) {
      const month = monthOf(inv.invoiceDate);
      byMonth.set(month, (byMonth.get(month) ?? new Decimal(0)).plus(inv.total));
    }

    return [...byMonth.entries()]
      .sort(([a], [b]) => (a < b ? -1 : 1))
      .map(([month, revenue]) => ({ month, revenue: round2(revenue) }));
  }

  // ===== Helpers =====

  private loadItems(manager: EntityManager, invoiceId: number) {
    return manager.find(InvoiceItem, {
      where: { invoiceId },
      order: { id: 'ASC' },
    });
  }

  /**
   * Recalcula los totales desde el conjunto COMPLETO de líneas actuales.
   * `guard` puede rechazar el resultado antes de persistirlo (aborta la transacción).
   */
  private async refreshTotals(
    manager: EntityManager,
    invoice: Invoice,
    guard?: (totals: DocumentTotals) => void,
  ): Promise<InvoiceItem[]> {
    const items = await this.loadItems(manager, invoice.id);
    const totals = await recomputeTotals(
      async () => items,
      async (t) => {
        guard?.(t);
        await manager.update(Invoice, { id: invoice.id }, t);
      },
    );
    Object.assign(invoice, totals);
    return items;
  }
}
