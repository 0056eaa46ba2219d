import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { DefectStatus, DefectType } from '../../domain/types';
import { UnitEntity } from './unit.entity';

@Entity({ name: 'defects' })
export class DefectEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ManyToOne(() => UnitEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'unitId' })
  unit?: UnitEntity;

  @Column({ type: 'varchar' })
  unitId!: string;

  // Operation at which the defect was found.
  @Column({ type: 'varchar' })
  operationId!: string;

  @Column({ type: 'varchar' })
  recordId!: string;

  @Column({ type: 'varchar', length: 20, default: 'OTHER' })
  defectType!: DefectType;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'varchar', length: 20, default: 'OPEN' })
  status!: DefectStatus;

  @Column({ type: 'varchar' })
  reportedById!: string;

  @Column({ type: 'varchar', nullable: true })
  assignedRepairerId!: string | null;

  @Column({ type: 'varchar', nullable: true })
  resolvedById!: string | null;

  @Column({ type: 'text', default: '' })
  repairNotes!: string;

  @Column({ type: 'varchar', nullable: true })
  returnToOperationId!: string | null;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime', nullable: true })
  assignedAt!: Date | null;

  @Column({ type: 'datetime', nullable: true })
  resolvedAt!: Date | null;
}
