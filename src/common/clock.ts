import { Injectable } from '@nestjs/common';
import { format } from 'date-fns';

/**
 * Fuente única de "hoy" para la facturación. Las pruebas la sustituyen por una fecha fija.
 */
@Injectable()
export class Clock {
  now(): Date {
    return new Date();
  }

  /** Fecha calendario local en formato YYYY-MM-DD. */
  today(): string {
    return format(this.now(), 'yyyy-MM-dd');
  }
}
