// src/billing/document-aggregator.ts
import Decimal from 'decimal.js';
import { round2 } from '../common/rounding';
import { LineAmounts } from './line-calculator';

export interface DocumentTotals {
  subtotal: number;
  taxTotal: number;
  total: number;
}

/**
 * Totales del documento a partir de TODAS sus líneas actuales.
 * Suma los importes ya redondeados por línea; nunca redondea el agregado de IVA.
 */
export function aggregateTotals(lines: readonly LineAmounts[]): DocumentTotals {
  let subtotal = new Decimal(0);
  let taxTotal = new Decimal(0);
  for (const l of lines) {
    subtotal = subtotal.plus(l.lineTotal);
    taxTotal = taxTotal.plus(l.taxAmount);
  }
  return {
    subtotal: round2(subtotal),
    taxTotal: round2(taxTotal),
    total: round2(subtotal.plus(taxTotal)),
  };
}

/**
 * Recalcula y persiste los totales de un documento.
 * `loadItems` debe devolver el conjunto completo de líneas tal como está en la transacción actual.
 */
export async function recomputeTotals(
  loadItems: () => Promise<readonly LineAmounts[]>,
  persist: (totals: DocumentTotals) => Promise<unknown>,
): Promise<DocumentTotals> {
  const totals = aggregateTotals(await loadItems());
  await persist(totals);
  return totals;
}
