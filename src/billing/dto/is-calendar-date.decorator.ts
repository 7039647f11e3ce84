import { applyDecorators } from '@nestjs/common';
import { IsDateString, Matches } from 'class-validator';

/** Fecha calendario estricta YYYY-MM-DD (rechaza 2026-02-30 y timestamps). */
export function IsCalendarDate(): PropertyDecorator {
  return applyDecorators(
    Matches(/^\d{4}-\d{2}-\d{2}$/, {
      message: ({ property }) => `${property} must be a date in YYYY-MM-DD format`,
    }),
    IsDateString({ strict: true }),
  );
}
