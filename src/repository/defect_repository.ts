import { EntityManager, FindOptionsWhere, In } from 'typeorm';
import { DefectStatus, DefectType, OPEN_DEFECT_STATUSES } from '../domain/types';
import { DefectEntity } from './entities';

export async function insertDefect(
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
): Promise<DefectEntity> {
  const defect = manager.create(DefectEntity, {
    ...params,
    status: 'OPEN',
    assignedRepairerId: null,
    resolvedById: null,
    repairNotes: '',
    returnToOperationId: null,
    assignedAt: null,
    resolvedAt: null,
  });
  return manager.save(defect);
}

export async function findDefect(manager: EntityManager, id: string): Promise<DefectEntity | null> {
  return manager.findOneBy(DefectEntity, { id });
}

export async function hasOpenDefect(manager: EntityManager, unitId: string): Promise<boolean> {
  const count = await manager.countBy(DefectEntity, { unitId, status: In([...OPEN_DEFECT_STATUSES]) });
  return count > 0;
}

export async function listDefects(
  manager: EntityManager,
  filter: { status?: DefectStatus; repairerId?: string; unitId?: string } = {},
): Promise<DefectEntity[]> {
  const where: FindOptionsWhere<DefectEntity> = {};
  if (filter.status) where.status = filter.status;
  if (filter.repairerId) where.assignedRepairerId = filter.repairerId;
  if (filter.unitId) where.unitId = filter.unitId;
  return manager.find(DefectEntity, { where, order: { createdAt: 'DESC' } });
}

export async function saveDefect(manager: EntityManager, defect: DefectEntity): Promise<DefectEntity> {
  return manager.save(defect);
}
