import { EntityManager } from 'typeorm';
import {
  Actor,
  CLOSED_UNIT_STATUSES,
  DefectType,
  TransitionKind,
  TransitionNotifier,
  UnitStatus,
} from '../domain/types';
import { OperationEntity, OperationRecordEntity, UnitEntity } from '../repository/entities';
import { TrackingDatabase } from '../repository/database';
import { findOperation, listOperations } from '../repository/catalog_repository';
import {
  findActiveClaim,
  findRecord,
  findRecordsForUnit,
  insertPendingRecords,
  saveRecord,
} from '../repository/record_repository';
import { findUnitById, saveUnit } from '../repository/unit_repository';
import { hasOpenDefect, insertDefect } from '../repository/defect_repository';
import {
  ActorBusyError,
  InvalidTransitionError,
  NotAuthorizedError,
  NotFoundError,
  NotOwnerError,
  SequenceViolationError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { currentRecords, deriveUnitStatus } from './status_derivation';

// What the state machine needs from the defect side, inside its own transaction.
export interface DefectGateway {
  openDefect(
    manager: EntityManager,
    params: {
      unitId: string;
      operationId: string;
      recordId: string;
      defectType: DefectType;
      description: string;
      reportedById: string;
      createdAt: Date;
    },
  ): Promise<{ id: string }>;
  hasOpenDefect(manager: EntityManager, unitId: string): Promise<boolean>;
}

export const repositoryDefectGateway: DefectGateway = {
  openDefect: insertDefect,
  hasOpenDefect,
};

export interface ProcessStateMachineOptions {
  clock?: () => Date;
  defects?: DefectGateway;
}

interface TransitionContext {
  manager: EntityManager;
  record: OperationRecordEntity;
  unit: UnitEntity;
  operation: OperationEntity;
  now: Date;
}

export interface RejectionResult {
  record: OperationRecordEntity;
  defectId: string;
}

export class ProcessStateMachine {
  private readonly clock: () => Date;
  private readonly defects: DefectGateway;

  constructor(
    private readonly db: TrackingDatabase,
    private readonly notifier: TransitionNotifier,
    options: ProcessStateMachineOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.defects = options.defects ?? repositoryDefectGateway;
  }

  async createRecordsForUnit(unitId: string, activeOperationIds?: string[]): Promise<OperationRecordEntity[]> {
    const created = await this.db.transaction(async (manager) => {
      const unit = await this.requireUnit(manager, unitId);
      const records = await this.fanOut(manager, unit, activeOperationIds);
      await this.recomputeUnitStatus(manager, unit);
      return records;
    });
    logger.info('Operation records created', { unitId, count: created.length });
    return created;
  }

  async start(recordId: string, actor: Actor): Promise<OperationRecordEntity> {
    const { record } = await this.runTransition('START', recordId, actor, async (ctx) => {
      const { manager, record, unit, operation, now } = ctx;
      this.assertUnitOpen(unit, record);
      if (!operation.isActive) {
        throw new InvalidTransitionError(`Operation ${operation.name} is inactive`, { recordId: record.id });
      }
      if (record.status !== 'PENDING') {
        throw new InvalidTransitionError(`Cannot start a ${record.status} record`, {
          recordId: record.id,
          status: record.status,
        });
      }
      if (record.assignedActorId && record.assignedActorId !== actor.id) {
        throw new InvalidTransitionError('Record is reserved for another actor', {
          recordId: record.id,
          assignedActorId: record.assignedActorId,
        });
      }
      await this.assertSequence(manager, unit, operation);
      const claim = await findActiveClaim(manager, actor.id, record.id);
      if (claim) {
        throw new ActorBusyError(actor.id, claim.id);
      }

      record.status = 'IN_PROGRESS';
      record.assignedActorId = actor.id;
      record.assignedAt = record.assignedAt ?? now;
      record.startedAt = now;
    });
    return record;
  }

  async approve(recordId: string, actor: Actor, qualityPassed: boolean, notes?: string): Promise<OperationRecordEntity> {
    const { record } = await this.runTransition('APPROVE', recordId, actor, async (ctx) => {
      const { manager, record, unit, operation, now } = ctx;
      this.assertUnitOpen(unit, record);
      if (record.status !== 'IN_PROGRESS') {
        throw new InvalidTransitionError(`Cannot approve a ${record.status} record`, {
          recordId: record.id,
          status: record.status,
        });
      }
      this.assertHolder(record, actor);
      await this.assertSequence(manager, unit, operation);

      record.status = 'APPROVED';
      record.completedAt = now;
      record.processedById = actor.id;
      record.qualityCheckPassed = qualityPassed;
      record.assignedActorId = null;
      if (notes) record.notes = notes;
    });
    return record;
  }

  async reject(
    recordId: string,
    actor: Actor,
    params: { defectType: DefectType; reason: string },
  ): Promise<RejectionResult> {
    if (!params.reason.trim()) {
      throw new ValidationError('A rejection reason is required', 'reason', params.reason);
    }
    const { record, outcome } = await this.runTransition('REJECT', recordId, actor, async (ctx) => {
      const { manager, record, unit, now } = ctx;
      this.assertUnitOpen(unit, record);
      if (record.status !== 'PENDING' && record.status !== 'IN_PROGRESS') {
        throw new InvalidTransitionError(`Cannot reject a ${record.status} record`, {
          recordId: record.id,
          status: record.status,
        });
      }
      if (record.status === 'IN_PROGRESS') {
        this.assertHolder(record, actor);
      }

      record.status = 'REJECTED';
      record.completedAt = now;
      record.processedById = actor.id;
      record.rejectionReason = params.reason;
      record.defectType = params.defectType;
      record.assignedActorId = null;

      const defect = await this.defects.openDefect(manager, {
        unitId: unit.id,
        operationId: record.operationId,
        recordId: record.id,
        defectType: params.defectType,
        description: params.reason,
        reportedById: actor.id,
        createdAt: now,
      });
      return defect.id;
    });
    return { record, defectId: outcome };
  }

  async release(recordId: string, actor: Actor): Promise<OperationRecordEntity> {
    const { record } = await this.runTransition('RELEASE', recordId, actor, async ({ record }) => {
      if (record.status !== 'IN_PROGRESS') {
        throw new NotOwnerError(actor.id, record.id);
      }
      // a claim left on a closed unit can only be cleared this way
      this.assertHolder(record, actor);
      record.status = 'PENDING';
      record.assignedActorId = null;
      record.assignedAt = null;
      record.startedAt = null;
    });
    return record;
  }

  async reassign(recordId: string, newActor: Actor, by: Actor): Promise<OperationRecordEntity> {
    const { record } = await this.runTransition('REASSIGN', recordId, by, async (ctx) => {
      const { manager, record, unit, now } = ctx;
      if (!newActor.canTransition('START')) {
        throw new NotAuthorizedError(`${newActor.name} cannot be assigned operation work`, {
          actorId: newActor.id,
          role: newActor.role,
        });
      }
      this.assertUnitOpen(unit, record);
      if (record.status !== 'PENDING' && record.status !== 'IN_PROGRESS') {
        throw new InvalidTransitionError(`Cannot reassign a ${record.status} record`, {
          recordId: record.id,
          status: record.status,
        });
      }
      const claim = await findActiveClaim(manager, newActor.id, record.id);
      if (claim) {
        throw new ActorBusyError(newActor.id, claim.id);
      }
      record.assignedActorId = newActor.id;
      record.assignedAt = now;
    });
    return record;
  }

  // Read-only derivation for reporting; does not persist anything.
  async deriveStatus(unitId: string): Promise<UnitStatus> {
    return this.db.read(async (manager) => {
      const unit = await this.requireUnit(manager, unitId);
      return this.derive(manager, unit);
    });
  }

  // The only write path for a unit's status besides creation and scrapping.
  // Must run inside the transaction that changed the records.
  async recomputeUnitStatus(manager: EntityManager, unit: UnitEntity): Promise<UnitEntity> {
    const status = await this.derive(manager, unit);
    const now = this.clock();
    if (status === 'COMPLETED') {
      unit.completedAt = unit.status === 'COMPLETED' && unit.completedAt ? unit.completedAt : now;
    } else {
      unit.completedAt = null;
    }
    if (status !== unit.status) {
      logger.debug('Unit status changed', { serialNumber: unit.serialNumber, from: unit.status, to: status });
    }
    unit.status = status;
    unit.updatedAt = now;
    return saveUnit(manager, unit);
  }

  // Pending pass-0 records for active operations the unit has no record for yet.
  async fanOut(manager: EntityManager, unit: UnitEntity, operationIds?: string[]): Promise<OperationRecordEntity[]> {
    const active = await listOperations(manager, true);
    let targets = active;
    if (operationIds) {
      const activeIds = new Set(active.map((o) => o.id));
      const unknown = operationIds.filter((id) => !activeIds.has(id));
      if (unknown.length > 0) {
        throw new ValidationError(`Operations ${unknown.join(', ')} are not active`, 'activeOperationIds', unknown);
      }
      const wanted = new Set(operationIds);
      targets = active.filter((o) => wanted.has(o.id));
    }
    const existing = new Set((await findRecordsForUnit(manager, unit.id)).map((r) => r.operationId));
    return insertPendingRecords(manager, {
      unitId: unit.id,
      entries: targets.filter((o) => !existing.has(o.id)).map((o) => ({ operationId: o.id, pass: 0 })),
      createdAt: this.clock(),
    });
  }

  // Sends a repaired unit back to `returnTo`: every active operation from
  // there up to `foundAt` whose current record is finished gets a new
  // pending pass. Earlier passes are kept as they are.
  async returnFromRepair(
    manager: EntityManager,
    unit: UnitEntity,
    returnTo: OperationEntity,
    foundAt: OperationEntity,
    note: string,
  ): Promise<OperationRecordEntity[]> {
    const active = await listOperations(manager, true);
    const current = new Map(currentRecords(await findRecordsForUnit(manager, unit.id)).map((r) => [r.operationId, r]));
    const entries = active
      .filter((o) => o.sequence >= returnTo.sequence && o.sequence <= foundAt.sequence)
      .flatMap((o) => {
        const record = current.get(o.id);
        if (record && (record.status === 'PENDING' || record.status === 'IN_PROGRESS')) return [];
        return [{ operationId: o.id, pass: record ? record.pass + 1 : 0 }];
      });
    const created = await insertPendingRecords(manager, {
      unitId: unit.id,
      entries,
      createdAt: this.clock(),
      notes: note,
    });
    await this.recomputeUnitStatus(manager, unit);
    return created;
  }

  async markScrapped(manager: EntityManager, unit: UnitEntity): Promise<UnitEntity> {
    unit.status = 'SCRAPPED';
    unit.completedAt = null;
    unit.updatedAt = this.clock();
    return saveUnit(manager, unit);
  }

  private async runTransition<R>(
    kind: TransitionKind,
    recordId: string,
    actor: Actor,
    apply: (ctx: TransitionContext) => Promise<R>,
  ): Promise<{ record: OperationRecordEntity; outcome: R }> {
    this.authorize(actor, kind);
    const result = await this.db.transaction(async (manager) => {
      const ctx = await this.loadContext(manager, recordId);
      const outcome = await apply(ctx);
      const record = await saveRecord(manager, ctx.record);
      const unit = await this.recomputeUnitStatus(manager, ctx.unit);
      return { record, unit, operation: ctx.operation, outcome, now: ctx.now };
    });

    logger.info(`Operation ${kind.toLowerCase()} applied`, {
      serialNumber: result.unit.serialNumber,
      operation: result.operation.name,
      recordStatus: result.record.status,
      unitStatus: result.unit.status,
      actorId: actor.id,
    });
    this.notifier.publish({
      unitId: result.unit.id,
      serialNumber: result.unit.serialNumber,
      recordId: result.record.id,
      operationId: result.operation.id,
      operationName: result.operation.name,
      status: result.record.status,
      actorId: actor.id,
      occurredAt: result.now,
    });
    return { record: result.record, outcome: result.outcome };
  }

  private async loadContext(manager: EntityManager, recordId: string): Promise<TransitionContext> {
    const record = await findRecord(manager, recordId);
    if (!record) {
      throw new NotFoundError('OperationRecord', recordId);
    }
    const unit = await this.requireUnit(manager, record.unitId);
    const operation = await findOperation(manager, record.operationId);
    if (!operation) {
      throw new NotFoundError('Operation', record.operationId);
    }
    const siblings = await findRecordsForUnit(manager, unit.id);
    if (siblings.some((r) => r.operationId === record.operationId && r.pass > record.pass)) {
      throw new InvalidTransitionError('Record has been superseded by a later pass', { recordId, pass: record.pass });
    }
    return { manager, record, unit, operation, now: this.clock() };
  }

  private async requireUnit(manager: EntityManager, unitId: string): Promise<UnitEntity> {
    const unit = await findUnitById(manager, unitId);
    if (!unit) {
      throw new NotFoundError('Unit', unitId);
    }
    return unit;
  }

  private async derive(manager: EntityManager, unit: UnitEntity): Promise<UnitStatus> {
    const records = await findRecordsForUnit(manager, unit.id);
    const active = await listOperations(manager, true);
    return deriveUnitStatus({
      currentStatus: unit.status,
      records,
      activeOperationIds: active.map((o) => o.id),
      hasOpenDefect: await this.defects.hasOpenDefect(manager, unit.id),
    });
  }

  private async assertSequence(manager: EntityManager, unit: UnitEntity, operation: OperationEntity): Promise<void> {
    const active = await listOperations(manager, true);
    const current = new Map(currentRecords(await findRecordsForUnit(manager, unit.id)).map((r) => [r.operationId, r]));
    const blocking = active
      .filter((o) => o.sequence < operation.sequence && current.get(o.id)?.status !== 'APPROVED')
      .map((o) => o.sequence);
    if (blocking.length > 0) {
      throw new SequenceViolationError(operation.sequence, blocking);
    }
  }

  private assertUnitOpen(unit: UnitEntity, record: OperationRecordEntity): void {
    if (CLOSED_UNIT_STATUSES.has(unit.status)) {
      throw new InvalidTransitionError(`Unit ${unit.serialNumber} is ${unit.status}`, {
        recordId: record.id,
        unitStatus: unit.status,
      });
    }
  }

  private assertHolder(record: OperationRecordEntity, actor: Actor): void {
    // supervisors may close out work claimed by someone else
    if (record.assignedActorId !== actor.id && !actor.canTransition('REASSIGN')) {
      throw new NotOwnerError(actor.id, record.id);
    }
  }

  private authorize(actor: Actor, kind: TransitionKind): void {
    if (!actor.canTransition(kind)) {
      throw new NotAuthorizedError(`${actor.role} may not ${kind.toLowerCase()}`, { actorId: actor.id, kind });
    }
  }
}
