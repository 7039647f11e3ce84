// src/recurring/schedule.ts
import { addMonths, addWeeks, addYears } from 'date-fns';
import { parseDate, toDateString } from '../common/dates';

export const RECURRING_FREQUENCIES = [
  'weekly',
  'monthly',
  'quarterly',
  'yearly',
] as const;
export type RecurringFrequency = (typeof RECURRING_FREQUENCIES)[number];

export const FREQUENCY_LABELS: Record<RecurringFrequency, string> = {
  weekly: 'Weekly',
  monthly: 'Monthly',
  quarterly: 'Quarterly',
  yearly: 'Yearly',
};

/**
 * Próxima fecha de ejecución (aritmética de calendario).
 * Mensual/trimestral/anual ajustan el día al último del mes destino:
 *   2026-01-31 + 1 mes → 2026-02-28;  2028-01-31 → 2028-02-29
 */
export function computeNextRun(
  date: string,
  frequency: RecurringFrequency,
): string {
  const d = parseDate(date);
  switch (frequency) {
    case 'weekly':
      return toDateString(addWeeks(d, 1));
    case 'monthly':
      return toDateString(addMonths(d, 1));
    case 'quarterly':
      return toDateString(addMonths(d, 3));
    case 'yearly':
      return toDateString(addYears(d, 1));
  }
}
