import {
  Column,
  Entity,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';

export type DocumentKind = 'invoice' | 'quotation';

/**
 * Contador explícito por propietario (y por año en cotizaciones).
 * year = 0 para series sin reinicio anual.
 */
@Entity('document_sequences')
@Unique('uq_document_sequence_scope', ['ownerId', 'kind', 'year'])
export class DocumentSequence {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 64 })
  ownerId!: string;

  @Column({ type: 'varchar', length: 20 })
  kind!: DocumentKind;

  @Column({ type: 'integer', default: 0 })
  year!: number;

  @Column({ type: 'integer', default: 0 })
  lastValue!: number;

  @UpdateDateColumn()
  updatedAt!: Date;
}
