import { EntityManager } from 'typeorm';
import { Actor, CLOSED_UNIT_STATUSES, DefectType, RecordStatus, UnitProgress, UnitStatus } from '../domain/types';
import { OperationEntity, OperationRecordEntity, UnitEntity } from '../repository/entities';
import { TrackingDatabase } from '../repository/database';
import { findPartByNumber, listOperations } from '../repository/catalog_repository';
import {
  findActiveClaim,
  findRecord,
  findRecordsByStatus,
  findRecordsForUnit,
} from '../repository/record_repository';
import {
  findHighestSerialInBucket,
  findUnitById,
  findUnitBySerial,
  findUnitsByIds,
  insertUnit,
  listUnits,
  orderHasUnits,
} from '../repository/unit_repository';
import {
  createUnitSchema,
  createUnitsSchema,
  listUnitsSchema,
  orderNumberSchema,
  validateInput,
} from '../middleware/validation';
import { NotAuthorizedError, NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ProcessStateMachine } from './process_state_machine';
import { bucketFor, decodeSerial, SerialAllocator } from './serial_allocator';
import { completionPercentage, currentRecords } from './status_derivation';

export interface RecordView {
  id: string;
  unitId: string;
  serialNumber: string;
  operationId: string;
  operationName: string;
  operationSequence: number;
  pass: number;
  status: RecordStatus;
  isCurrent: boolean;
  assignedActorId: string | null;
  processedById: string | null;
  assignedAt: Date | null;
  startedAt: Date | null;
  completedAt: Date | null;
  qualityCheckPassed: boolean;
  notes: string;
  rejectionReason: string;
  defectType: DefectType | null;
  createdAt: Date;
}

export interface UnitServiceOptions {
  clock?: () => Date;
  allocatorMaxAttempts?: number;
  bulkMaxQuantity?: number;
}

export class UnitService {
  private readonly clock: () => Date;
  private readonly allocatorMaxAttempts: number;
  private readonly bulkMaxQuantity: number;

  constructor(
    private readonly db: TrackingDatabase,
    private readonly machine: ProcessStateMachine,
    options: UnitServiceOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.allocatorMaxAttempts = options.allocatorMaxAttempts ?? 100;
    this.bulkMaxQuantity = options.bulkMaxQuantity ?? 100;
  }

  async createUnit(input: unknown, actor: Actor): Promise<UnitEntity> {
    this.authorizeAllocation(actor);
    const { orderNumber, partNumber } = validateInput(createUnitSchema, input);
    const [unit] = await this.db.transaction((manager) => this.allocateUnits(manager, partNumber, [orderNumber], actor));
    logger.info('Serial number generated', { serialNumber: unit.serialNumber, orderNumber, partNumber });
    return unit;
  }

  // All or nothing: one failed allocation rolls back the whole batch.
  async createUnits(input: unknown, actor: Actor): Promise<UnitEntity[]> {
    this.authorizeAllocation(actor);
    const { orderNumber, partNumber, quantity } = validateInput(createUnitsSchema(this.bulkMaxQuantity), input);
    const orderNumbers = Array.from({ length: quantity }, (_, i) => `${orderNumber}-${String(i + 1).padStart(3, '0')}`);
    const units = await this.db.transaction((manager) => this.allocateUnits(manager, partNumber, orderNumbers, actor));
    logger.info('Serial numbers generated in bulk', {
      orderNumber,
      partNumber,
      quantity,
      first: units[0]?.serialNumber,
      last: units[units.length - 1]?.serialNumber,
    });
    return units;
  }

  async getUnit(serialNumber: string): Promise<UnitEntity> {
    decodeSerial(serialNumber);
    const unit = await this.db.read((manager) => findUnitBySerial(manager, serialNumber));
    if (!unit) {
      throw new NotFoundError('Unit', serialNumber);
    }
    return unit;
  }

  async listUnits(input: unknown): Promise<UnitEntity[]> {
    const filter = validateInput(listUnitsSchema, input ?? {});
    return this.db.read((manager) => listUnits(manager, filter));
  }

  // lets callers warn before a second batch is created under the same order
  async orderHasUnits(orderNumber: unknown): Promise<boolean> {
    const order = validateInput(orderNumberSchema, orderNumber);
    return this.db.read((manager) => orderHasUnits(manager, order));
  }

  async deriveStatus(serialNumber: string): Promise<UnitStatus> {
    const unit = await this.getUnit(serialNumber);
    return this.machine.deriveStatus(unit.id);
  }

  // Every pass of every operation, ordered by line position then pass.
  async getHistory(serialNumber: string): Promise<RecordView[]> {
    const unit = await this.getUnit(serialNumber);
    return this.db.read(async (manager) => {
      const records = await findRecordsForUnit(manager, unit.id);
      const operations = await listOperations(manager);
      return this.toViews(records, [unit], operations)
        .sort((a, b) => a.operationSequence - b.operationSequence || a.pass - b.pass);
    });
  }

  async getProgress(serialNumber: string): Promise<UnitProgress> {
    const unit = await this.getUnit(serialNumber);
    return this.db.read(async (manager) => {
      const records = await findRecordsForUnit(manager, unit.id);
      const active = await listOperations(manager, true);
      const activeIds = active.map((o) => o.id);
      const approved = new Set(
        currentRecords(records)
          .filter((r) => r.status === 'APPROVED')
          .map((r) => r.operationId),
      );
      const next = active.find((o) => !approved.has(o.id));
      return {
        serialNumber: unit.serialNumber,
        status: unit.status,
        completionPercentage: completionPercentage(records, activeIds),
        currentOperationId: next ? next.id : null,
      };
    });
  }

  async describeRecord(recordId: string): Promise<RecordView> {
    return this.db.read(async (manager) => {
      const record = await findRecord(manager, recordId);
      if (!record) {
        throw new NotFoundError('OperationRecord', recordId);
      }
      const unit = await findUnitById(manager, record.unitId);
      const siblings = await findRecordsForUnit(manager, record.unitId);
      const [view] = this.toViews([record], unit ? [unit] : [], await listOperations(manager), siblings);
      return view;
    });
  }

  // Work an actor can pick up next. Operators see unclaimed pending records
  // and records reserved for them; actors who may reassign see everything
  // pending or in progress.
  async listAvailableWork(actor: Actor, limit = 10): Promise<RecordView[]> {
    const overview = actor.canTransition('REASSIGN');
    if (!overview && !actor.canTransition('START')) {
      throw new NotAuthorizedError(`${actor.role} has no operation work`, { actorId: actor.id });
    }
    return this.db.read(async (manager) => {
      const statuses: RecordStatus[] = overview ? ['PENDING', 'IN_PROGRESS'] : ['PENDING'];
      const records = (await findRecordsByStatus(manager, statuses)).filter(
        (r) => overview || r.assignedActorId === null || r.assignedActorId === actor.id,
      );
      const units = await findUnitsByIds(manager, [...new Set(records.map((r) => r.unitId))]);
      const operations = await listOperations(manager, true);
      const open = new Set(units.filter((u) => !CLOSED_UNIT_STATUSES.has(u.status)).map((u) => u.id));
      const active = new Set(operations.map((o) => o.id));
      const candidates = records.filter((r) => open.has(r.unitId) && active.has(r.operationId));
      return this.toViews(candidates, units, operations)
        .sort((a, b) => a.operationSequence - b.operationSequence || a.createdAt.getTime() - b.createdAt.getTime())
        .slice(0, limit);
    });
  }

  // Adds pending records for operations activated after the unit was created.
  async syncRecords(serialNumber: string, actor: Actor): Promise<RecordView[]> {
    if (!actor.canTransition('MANAGE_CATALOG')) {
      throw new NotAuthorizedError(`${actor.role} may not change a unit's operations`, { actorId: actor.id });
    }
    const unit = await this.getUnit(serialNumber);
    await this.machine.createRecordsForUnit(unit.id);
    return this.getHistory(serialNumber);
  }

  async getCurrentAssignment(actor: Actor): Promise<RecordView | null> {
    const claim = await this.db.read((manager) => findActiveClaim(manager, actor.id));
    return claim ? this.describeRecord(claim.id) : null;
  }

  private async allocateUnits(
    manager: EntityManager,
    partNumber: string,
    orderNumbers: string[],
    actor: Actor,
  ): Promise<UnitEntity[]> {
    const part = await findPartByNumber(manager, partNumber);
    if (!part) {
      throw new NotFoundError('Part', partNumber);
    }
    if (!part.isActive) {
      throw new ValidationError(`Part ${partNumber} is not active`, 'partNumber', partNumber);
    }

    const now = this.clock();
    const bucket = bucketFor(now);
    const allocator = new SerialAllocator(
      { findHighestInBucket: (b) => findHighestSerialInBucket(manager, b) },
      this.allocatorMaxAttempts,
    );

    const units: UnitEntity[] = [];
    for (const orderNumber of orderNumbers) {
      const unit = await allocator.allocate(bucket, (serialNumber) =>
        insertUnit(manager, { serialNumber, orderNumber, partId: part.id, createdById: actor.id, createdAt: now }),
      );
      await this.machine.fanOut(manager, unit);
      units.push(await this.machine.recomputeUnitStatus(manager, unit));
    }
    return units;
  }

  private authorizeAllocation(actor: Actor): void {
    if (!actor.canTransition('ALLOCATE')) {
      throw new NotAuthorizedError(`${actor.role} may not generate serial numbers`, { actorId: actor.id });
    }
  }

  private toViews(
    records: OperationRecordEntity[],
    units: UnitEntity[],
    operations: OperationEntity[],
    siblings: OperationRecordEntity[] = records,
  ): RecordView[] {
    const serialByUnit = new Map(units.map((u) => [u.id, u.serialNumber]));
    const operationById = new Map(operations.map((o) => [o.id, o]));
    const byUnit = new Map<string, OperationRecordEntity[]>();
    for (const record of siblings) {
      byUnit.set(record.unitId, [...(byUnit.get(record.unitId) ?? []), record]);
    }
    const current = new Set([...byUnit.values()].flatMap((list) => currentRecords(list).map((r) => r.id)));
    return records.map((record) => {
      const operation = operationById.get(record.operationId);
      return {
        id: record.id,
        unitId: record.unitId,
        serialNumber: serialByUnit.get(record.unitId) ?? '',
        operationId: record.operationId,
        operationName: operation?.name ?? '',
        operationSequence: operation?.sequence ?? 0,
        pass: record.pass,
        status: record.status,
        isCurrent: current.has(record.id),
        assignedActorId: record.assignedActorId,
        processedById: record.processedById,
        assignedAt: record.assignedAt,
        startedAt: record.startedAt,
        completedAt: record.completedAt,
        qualityCheckPassed: record.qualityCheckPassed,
        notes: record.notes,
        rejectionReason: record.rejectionReason,
        defectType: record.defectType,
        createdAt: record.createdAt,
      };
    });
  }
}
