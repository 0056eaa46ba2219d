import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { AlertPriority, AlertType } from '../../domain/types';
import { UnitEntity } from './unit.entity';

@Entity({ name: 'production_alerts' })
@Index('idx_alerts_open', ['isResolved', 'isActive'])
export class ProductionAlertEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text' })
  message!: string;

  @Column({ type: 'varchar', length: 20, default: 'GENERAL' })
  alertType!: AlertType;

  @Column({ type: 'varchar', length: 20, default: 'MEDIUM' })
  priority!: AlertPriority;

  @ManyToOne(() => UnitEntity, { onDelete: 'CASCADE', nullable: true })
  @JoinColumn({ name: 'unitId' })
  unit?: UnitEntity | null;

  @Column({ type: 'varchar', nullable: true })
  unitId!: string | null;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ type: 'boolean', default: false })
  isResolved!: boolean;

  @Column({ type: 'varchar' })
  createdById!: string;

  @Column({ type: 'varchar', nullable: true })
  resolvedById!: string | null;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime', nullable: true })
  resolvedAt!: Date | null;
}
