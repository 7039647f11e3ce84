import { IsOptional } from 'class-validator';
import { IsCalendarDate } from '../../billing/dto/is-calendar-date.decorator';

export class ProcessDueDto {
  /** Fecha de corte; por defecto hoy */
  @IsOptional()
  @IsCalendarDate()
  today?: string;
}
