import { ValueTransformer } from 'typeorm';

/**
 * Postgres devuelve NUMERIC como string; lo exponemos como number con 2 decimales ya aplicados.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value?: number | null) => value,
  from: (value: string | number | null) =>
    value === null || value === undefined ? value : Number(value),
};

export const MONEY_COLUMN = {
  type: 'decimal',
  precision: 12,
  scale: 2,
  default: 0,
  transformer: decimalTransformer,
} as const;

export const QUANTITY_COLUMN = {
  type: 'decimal',
  precision: 10,
  scale: 2,
  transformer: decimalTransformer,
} as const;
