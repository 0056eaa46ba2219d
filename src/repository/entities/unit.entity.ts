import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { UnitStatus } from '../../domain/types';
import { PartEntity } from './part.entity';

@Entity({ name: 'units' })
@Index('idx_units_order_number', ['orderNumber'])
export class UnitEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 12, unique: true })
  serialNumber!: string;

  @Column({ type: 'varchar', length: 60 })
  orderNumber!: string;

  @ManyToOne(() => PartEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'partId' })
  part?: PartEntity;

  @Column({ type: 'varchar' })
  partId!: string;

  @Column({ type: 'varchar', length: 20, default: 'CREATED' })
  status!: UnitStatus;

  @Column({ type: 'varchar' })
  createdById!: string;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime' })
  updatedAt!: Date;

  @Column({ type: 'datetime', nullable: true })
  completedAt!: Date | null;
}
