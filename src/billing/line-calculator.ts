// src/billing/line-calculator.ts
import Decimal from 'decimal.js';
import { roundMoney } from '../common/rounding';

/** Datos de precio de una línea (factura, cotización o plantilla recurrente). */
export interface LinePricing {
  quantity: number;
  unitPrice: number;
  /** Porcentaje entero 0–100 */
  taxRate: number;
}

export interface LineAmounts {
  lineTotal: number;
  taxAmount: number;
}

/**
 * Totales de una línea, redondeados POR LÍNEA (HALF_UP, 2 decimales):
 *   lineTotal = round(quantity × unitPrice)
 *   taxAmount = round(lineTotal × taxRate / 100)
 * El IVA se calcula sobre el lineTotal ya redondeado.
 * No valida: las cantidades negativas se rechazan en los DTO.
 */
export function calculateLine(line: LinePricing): LineAmounts {
  const lineTotal = roundMoney(new Decimal(line.quantity).times(line.unitPrice));
  const taxAmount = roundMoney(lineTotal.times(line.taxRate).div(100));
  return {
    lineTotal: lineTotal.toNumber(),
    taxAmount: taxAmount.toNumber(),
  };
}

/** Línea tal como llega del cliente o de una plantilla. */
export interface DocumentLineInput extends LinePricing {
  description: string;
  productId?: number | null;
}

/** Línea lista para persistir: datos de entrada + importes calculados. */
export interface PricedLine extends LinePricing, LineAmounts {
  description: string;
  productId: number | null;
}

export function priceLine(input: DocumentLineInput): PricedLine {
  return {
    productId: input.productId ?? null,
    description: input.description.trim(),
    quantity: input.quantity,
    unitPrice: input.unitPrice,
    taxRate: input.taxRate,
    ...calculateLine(input),
  };
}
