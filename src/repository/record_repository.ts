import { EntityManager, In, Not } from 'typeorm';
import { RecordStatus } from '../domain/types';
import { OperationRecordEntity } from './entities';

export async function findRecord(manager: EntityManager, id: string): Promise<OperationRecordEntity | null> {
  return manager.findOneBy(OperationRecordEntity, { id });
}

export async function findRecordsForUnit(manager: EntityManager, unitId: string): Promise<OperationRecordEntity[]> {
  return manager.find(OperationRecordEntity, {
    where: { unitId },
    order: { pass: 'ASC', createdAt: 'ASC' },
  });
}

// The record the actor currently works on, other than `excludeRecordId`.
export async function findActiveClaim(
  manager: EntityManager,
  actorId: string,
  excludeRecordId?: string,
): Promise<OperationRecordEntity | null> {
  return manager.findOneBy(OperationRecordEntity, {
    assignedActorId: actorId,
    status: 'IN_PROGRESS',
    ...(excludeRecordId ? { id: Not(excludeRecordId) } : {}),
  });
}

export async function insertPendingRecords(
  manager: EntityManager,
  params: { unitId: string; entries: Array<{ operationId: string; pass: number }>; createdAt: Date; notes?: string },
): Promise<OperationRecordEntity[]> {
  if (params.entries.length === 0) return [];
  const records = params.entries.map((entry) =>
    manager.create(OperationRecordEntity, {
      unitId: params.unitId,
      operationId: entry.operationId,
      pass: entry.pass,
      status: 'PENDING',
      assignedActorId: null,
      processedById: null,
      assignedAt: null,
      startedAt: null,
      completedAt: null,
      qualityCheckPassed: false,
      notes: params.notes ?? '',
      rejectionReason: '',
      defectType: null,
      createdAt: params.createdAt,
    }),
  );
  return manager.save(records);
}

export async function saveRecord(manager: EntityManager, record: OperationRecordEntity): Promise<OperationRecordEntity> {
  return manager.save(record);
}

export async function findRecordsByStatus(
  manager: EntityManager,
  statuses: RecordStatus[],
): Promise<OperationRecordEntity[]> {
  return manager.find(OperationRecordEntity, {
    where: { status: In(statuses) },
    order: { createdAt: 'ASC' },
  });
}

export async function findCompletedRecords(manager: EntityManager): Promise<OperationRecordEntity[]> {
  return manager.find(OperationRecordEntity, {
    where: { status: In<RecordStatus>(['APPROVED', 'REJECTED']) },
  });
}

export async function listAllRecords(manager: EntityManager): Promise<OperationRecordEntity[]> {
  return manager.find(OperationRecordEntity);
}
