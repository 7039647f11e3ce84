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
import { QuotationStatus } from '../../billing/lifecycle/quotation-status';
import { Customer } from '../../customers/entities/customer.entity';
import { MONEY_COLUMN } from '../../database/decimal.transformer';
import { QuotationItem } from './quotation-item.entity';

@Entity('quotations')
@Unique('uq_quotation_owner_number', ['ownerId', 'number'])
export class Quotation {
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

  /** QUO-2026-0001: serie anual por propietario */
  @Column({ type: 'varchar', length: 50 })
  number!: string;

  @Column({ type: 'date' })
  quotationDate!: string;

  @Column({ type: 'date', nullable: true })
  validUntil!: string | null;

  @Column({ type: 'varchar', length: 20, default: 'draft' })
  status!: QuotationStatus;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column(MONEY_COLUMN)
  subtotal!: number;

  @Column(MONEY_COLUMN)
  taxTotal!: number;

  @Column(MONEY_COLUMN)
  total!: number;

  /** Factura creada al convertir (enlace de auditoría, sin FK) */
  @Column({ type: 'integer', nullable: true })
  convertedInvoiceId!: number | null;

  @OneToMany(() => QuotationItem, (item) => item.quotation)
  items?: QuotationItem[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
