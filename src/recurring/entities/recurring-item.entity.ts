import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { QUANTITY_COLUMN } from '../../database/decimal.transformer';
import { RecurringSchedule } from './recurring-schedule.entity';

/** Línea plantilla: sin importes, se calculan en cada generación. */
@Entity('recurring_items')
export class RecurringItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'integer' })
  scheduleId!: number;

  @ManyToOne(() => RecurringSchedule, (schedule) => schedule.items, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'scheduleId' })
  schedule?: RecurringSchedule;

  @Column({ type: 'integer', nullable: true })
  productId!: number | null;

  @Column({ type: 'varchar', length: 255 })
  description!: string;

  @Column(QUANTITY_COLUMN)
  quantity!: number;

  @Column(QUANTITY_COLUMN)
  unitPrice!: number;

  @Column({ type: 'integer', default: 0 })
  taxRate!: number;
}
