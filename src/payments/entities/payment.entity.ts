import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { MONEY_COLUMN } from '../../database/decimal.transformer';
import { Invoice } from '../../invoices/entities/invoice.entity';

export const PAYMENT_METHODS = [
  'bank_transfer',
  'cash',
  'credit_card',
  'check',
  'other',
] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

@Entity('payments')
export class Payment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'integer' })
  invoiceId!: number;

  @ManyToOne(() => Invoice, (invoice) => invoice.payments, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'invoiceId' })
  invoice?: Invoice;

  @Column(MONEY_COLUMN)
  amount!: number;

  @Column({ type: 'date' })
  paymentDate!: string;

  @Column({ type: 'varchar', length: 50, default: 'bank_transfer' })
  paymentMethod!: PaymentMethod;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
