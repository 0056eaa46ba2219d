import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { DefectType, RecordStatus } from '../../domain/types';
import { OperationEntity } from './operation.entity';
import { UnitEntity } from './unit.entity';

@Entity({ name: 'operation_records' })
@Index('uq_records_unit_operation_pass', ['unitId', 'operationId', 'pass'], { unique: true })
@Index('uq_records_active_claim', ['assignedActorId'], { unique: true, where: "status = 'IN_PROGRESS'" })
export class OperationRecordEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ManyToOne(() => UnitEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'unitId' })
  unit?: UnitEntity;

  @Column({ type: 'varchar' })
  unitId!: string;

  @ManyToOne(() => OperationEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'operationId' })
  operation?: OperationEntity;

  @Column({ type: 'varchar' })
  operationId!: string;

  // 0 for the record created with the unit, +1 for every return from repair.
  @Column({ type: 'integer', default: 0 })
  pass!: number;

  @Column({ type: 'varchar', length: 20, default: 'PENDING' })
  status!: RecordStatus;

  @Column({ type: 'varchar', nullable: true })
  assignedActorId!: string | null;

  @Column({ type: 'varchar', nullable: true })
  processedById!: string | null;

  @Column({ type: 'datetime', nullable: true })
  assignedAt!: Date | null;

  @Column({ type: 'datetime', nullable: true })
  startedAt!: Date | null;

  @Column({ type: 'datetime', nullable: true })
  completedAt!: Date | null;

  @Column({ type: 'boolean', default: false })
  qualityCheckPassed!: boolean;

  @Column({ type: 'text', default: '' })
  notes!: string;

  @Column({ type: 'text', default: '' })
  rejectionReason!: string;

  @Column({ type: 'varchar', length: 20, nullable: true })
  defectType!: DefectType | null;

  @Column({ type: 'datetime' })
  createdAt!: Date;
}
