// src/billing/numbering/numbering.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { yearOf } from '../../common/dates';
import { DocumentKind, DocumentSequence } from './document-sequence.entity';

type SequenceScope = { ownerId: string; kind: DocumentKind; year: number };

/**
 * Numeración consecutiva por propietario.
 *  - Facturas:     INV-0001, INV-0002, ...
 *  - Cotizaciones: QUO-2026-0001 (reinicia cada año)
 * Los números no se reutilizan aunque se borren documentos.
 */
@Injectable()
export class NumberingService {
  private readonly prefixes: Record<DocumentKind, string>;

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    cfg: ConfigService,
  ) {
    this.prefixes = {
      invoice: cfg.get<string>('INVOICE_NUMBER_PREFIX') ?? 'INV',
      quotation: cfg.get<string>('QUOTATION_NUMBER_PREFIX') ?? 'QUO',
    };
  }

  /**
   * Reserva el siguiente número dentro de la transacción del llamador.
   * @param date fecha de referencia (YYYY-MM-DD) para la serie anual de cotizaciones
   */
  async next(
    manager: EntityManager,
    ownerId: string,
    kind: DocumentKind,
    date: string,
  ): Promise<string> {
    const scope = this.scopeFor(ownerId, kind, date);
    const existing = await manager.findOne(DocumentSequence, { where: scope });

    let value: number;
    if (!existing) {
      await manager.insert(DocumentSequence, { ...scope, lastValue: 1 });
      value = 1;
    } else {
      // Incremento atómico en la BD (bloquea la fila hasta el commit)
      const column = manager.connection.driver.escape('lastValue');
      await manager
        .createQueryBuilder()
        .update(DocumentSequence)
        .set({ lastValue: () => `${column} + 1` })
        .where(scope)
        .execute();
      const updated = await manager.findOneOrFail(DocumentSequence, {
        where: scope,
      });
      value = updated.lastValue;
    }

    return this.format(kind, scope.year, value);
  }

  /** Vista previa del próximo número, sin consumirlo. */
  async peek(ownerId: string, kind: DocumentKind, date: string): Promise<string> {
    const scope = this.scopeFor(ownerId, kind, date);
    const existing = await this.dataSource.manager.findOne(DocumentSequence, {
      where: scope,
    });
    return this.format(kind, scope.year, (existing?.lastValue ?? 0) + 1);
  }

  private scopeFor(
    ownerId: string,
    kind: DocumentKind,
    date: string,
  ): SequenceScope {
    return { ownerId, kind, year: kind === 'quotation' ? yearOf(date) : 0 };
  }

  private format(kind: DocumentKind, year: number, value: number): string {
    const seq = String(value).padStart(4, '0');
    const prefix = this.prefixes[kind];
    return kind === 'quotation' ? `${prefix}-${year}-${seq}` : `${prefix}-${seq}`;
  }
}
