import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Customer } from '../../customers/entities/customer.entity';
import { TIMESTAMP_COLUMN } from '../../database/column-types';
import { RecurringFrequency } from '../schedule';
import { RecurringItem } from './recurring-item.entity';

@Entity('recurring_schedules')
@Index(['isActive', 'nextRunDate'])
export class RecurringSchedule {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar', length: 64 })
  ownerId!: string;

  @Column({ type: 'integer' })
  customerId!: number;

  @ManyToOne(() => Customer, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'customerId' })
  customer?: Customer;

  @Column({ type: 'varchar', length: 20 })
  frequency!: RecurringFrequency;

  @Column({ type: 'date' })
  startDate!: string;

  /** Sin fecha fin: se repite indefinidamente */
  @Column({ type: 'date', nullable: true })
  endDate!: string | null;

  /** Cursor: próxima fecha en que se debe generar factura */
  @Column({ type: 'date' })
  nextRunDate!: string;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ type: TIMESTAMP_COLUMN, nullable: true })
  lastGeneratedAt!: Date | null;

  @Column({ type: 'integer', default: 0 })
  totalGenerated!: number;

  @OneToMany(() => RecurringItem, (item) => item.schedule)
  items?: RecurringItem[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
