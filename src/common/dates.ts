// src/common/dates.ts
import {
  addDays,
  format,
  isValid,
  parseISO,
  startOfMonth,
  subMonths,
} from 'date-fns';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Parsea una fecha calendario YYYY-MM-DD (medianoche local). */
export function parseDate(value: string): Date {
  const d = parseISO(value);
  if (!ISO_DATE.test(value) || !isValid(d)) {
    throw new RangeError(`Fecha inválida: ${value}`);
  }
  return d;
}

export function toDateString(d: Date): string {
  return format(d, 'yyyy-MM-dd');
}

export function addDaysTo(value: string, days: number): string {
  return toDateString(addDays(parseDate(value), days));
}

export function yearOf(value: string): number {
  return parseDate(value).getFullYear();
}

/** Mes calendario YYYY-MM de una fecha YYYY-MM-DD. */
export function monthOf(value: string): string {
  return toDateString(parseDate(value)).slice(0, 7);
}

/** Primer día del mes que abre una ventana de `months` meses terminada en el mes de `value`. */
export function startOfMonthWindow(value: string, months: number): string {
  return toDateString(startOfMonth(subMonths(parseDate(value), months - 1)));
}
