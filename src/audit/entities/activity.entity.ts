import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

export type ActivityAction =
  | 'create'
  | 'update'
  | 'delete'
  | 'status_change'
  | 'convert'
  | 'generate'
  | 'payment';

export type ActivityEntityType =
  | 'customer'
  | 'invoice'
  | 'invoice_item'
  | 'payment'
  | 'quotation'
  | 'quotation_item'
  | 'recurring_schedule';

@Entity('activities')
@Index(['ownerId', 'createdAt'])
export class Activity {
  @PrimaryGeneratedColumn()
  id!: number;

  /** Actor: el propietario autenticado (o el dueño de la plantilla en el barrido automático) */
  @Column({ type: 'varchar', length: 64 })
  ownerId!: string;

  @Column({ type: 'varchar', length: 30 })
  action!: ActivityAction;

  @Column({ type: 'varchar', length: 30 })
  entityType!: ActivityEntityType;

  @Column({ type: 'integer', nullable: true })
  entityId!: number | null;

  @Column({ type: 'text' })
  description!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
