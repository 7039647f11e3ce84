import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { InvoiceStatus } from '../../billing/lifecycle/invoice-status';
import { Customer } from '../../customers/entities/customer.entity';
import { MONEY_COLUMN } from '../../database/decimal.transformer';
import { Payment } from '../../payments/entities/payment.entity';
import { InvoiceItem } from './invoice-item.entity';

@Entity('invoices')
@Unique('uq_invoice_owner_number', ['ownerId', 'number'])
export class Invoice {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar', length: 64 })
  ownerId!: string;

  @Index()
  @Column({ type: 'integer' })
  customerId!: number;

  @ManyToOne(() => Customer, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'customerId' })
  customer?: Customer;

  /** Consecutivo legible (INV-0001); se asigna una sola vez */
  @Column({ type: 'varchar', length: 50 })
  number!: string;

  @Column({ type: 'date' })
  invoiceDate!: string;

  @Column({ type: 'date', nullable: true })
  dueDate!: string | null;

  @Column({ type: 'varchar', length: 20, default: 'draft' })
  status!: InvoiceStatus;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  // Totales derivados de las líneas (ver document-aggregator)
  @Column(MONEY_COLUMN)
  subtotal!: number;

  @Column(MONEY_COLUMN)
  taxTotal!: number;

  @Column(MONEY_COLUMN)
  total!: number;

  @OneToMany(() => InvoiceItem, (item) => item.invoice)
  items?: InvoiceItem[];

  @OneToMany(() => Payment, (payment) => payment.invoice)
  payments?: Payment[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
