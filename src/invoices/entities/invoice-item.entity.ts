import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import {
  MONEY_COLUMN,
  QUANTITY_COLUMN,
} from '../../database/decimal.transformer';
import { Invoice } from './invoice.entity';

@Entity('invoice_items')
export class InvoiceItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'integer' })
  invoiceId!: number;

  @ManyToOne(() => Invoice, (invoice) => invoice.items, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'invoiceId' })
  invoice?: Invoice;

  /** Referencia informativa al catálogo; la línea guarda su propio texto y precio */
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

  @Column(MONEY_COLUMN)
  lineTotal!: number;

  @Column(MONEY_COLUMN)
  taxAmount!: number;
}
