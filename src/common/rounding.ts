// src/common/rounding.ts
import Decimal from 'decimal.js';

/**
 * Redondea un valor decimal a `decimals` posiciones, HALF_UP.
 * @param n número, string o Decimal de entrada
 * @param decimals número de decimales (default: 2)
 */
export function round(n: Decimal.Value, decimals = 2): Decimal {
  const value = new Decimal(n);
  if (!value.isFinite()) return new Decimal(0);
  return value.toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP);
}

/** Redondeo monetario estándar: 2 decimales, HALF_UP. */
export function roundMoney(n: Decimal.Value): Decimal {
  return round(n, 2);
}

/** Igual que roundMoney pero devuelve number (lo que persistimos y exponemos). */
export function round2(n: Decimal.Value): number {
  return roundMoney(n).toNumber();
}

/** Suma montos ya redondeados sin pasar por aritmética flotante. */
export function sumMoney(values: Decimal.Value[]): number {
  const total = values.reduce<Decimal>(
    (acc, v) => acc.plus(v),
    new Decimal(0),
  );
  return round2(total);
}

/** Formato fijo de 2 decimales para mensajes. */
export function formatMoney(n: Decimal.Value): string {
  return roundMoney(n).toFixed(2);
}
