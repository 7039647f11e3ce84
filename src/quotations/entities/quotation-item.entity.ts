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
import { Quotation } from './quotation.entity';

@Entity('quotation_items')
export class QuotationItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'integer' })
  quotationId!: number;

  @ManyToOne(() => Quotation, (quotation) => quotation.items, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'quotationId' })
  quotation?: Quotation;

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
