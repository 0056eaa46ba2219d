import { EntityManager, FindOptionsWhere } from 'typeorm';
import { UnitStatus } from '../domain/types';
import { DuplicateSerialError, isUniqueViolation } from '../utils/errors';
import { UnitEntity } from './entities';

// Greatest serial number of the bucket; codes are fixed width so text order is allocation order.
export async function findHighestSerialInBucket(manager: EntityManager, bucket: string): Promise<string | null> {
  const unit = await manager
    .createQueryBuilder(UnitEntity, 'u')
    .where('u.serialNumber LIKE :pattern', { pattern: `${bucket}___-___M` })
    .orderBy('u.serialNumber', 'DESC')
    .getOne();
  return unit?.serialNumber ?? null;
}

export async function insertUnit(
  manager: EntityManager,
  params: { serialNumber: string; orderNumber: string; partId: string; createdById: string; createdAt: Date },
): Promise<UnitEntity> {
  const unit = manager.create(UnitEntity, {
    serialNumber: params.serialNumber,
    orderNumber: params.orderNumber,
    partId: params.partId,
    createdById: params.createdById,
    status: 'CREATED',
    createdAt: params.createdAt,
    updatedAt: params.createdAt,
    completedAt: null,
  });
  try {
    return await manager.save(unit);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DuplicateSerialError(params.serialNumber);
    }
    throw error;
  }
}

export async function findUnitById(manager: EntityManager, id: string): Promise<UnitEntity | null> {
  return manager.findOneBy(UnitEntity, { id });
}

export async function findUnitBySerial(manager: EntityManager, serialNumber: string): Promise<UnitEntity | null> {
  return manager.findOneBy(UnitEntity, { serialNumber });
}

export async function findUnitsByIds(manager: EntityManager, ids: string[]): Promise<UnitEntity[]> {
  if (ids.length === 0) return [];
  return manager
    .createQueryBuilder(UnitEntity, 'u')
    .where('u.id IN (:...ids)', { ids })
    .getMany();
}

export async function orderHasUnits(manager: EntityManager, orderNumber: string): Promise<boolean> {
  return manager.existsBy(UnitEntity, { orderNumber });
}

export async function listUnits(
  manager: EntityManager,
  filter: { status?: UnitStatus; orderNumber?: string; limit: number },
): Promise<UnitEntity[]> {
  const where: FindOptionsWhere<UnitEntity> = {};
  if (filter.status) where.status = filter.status;
  if (filter.orderNumber) where.orderNumber = filter.orderNumber;
  return manager.find(UnitEntity, {
    where,
    order: { createdAt: 'DESC', serialNumber: 'DESC' },
    take: filter.limit,
  });
}

export async function listAllUnits(manager: EntityManager): Promise<UnitEntity[]> {
  return manager.find(UnitEntity);
}

export async function saveUnit(manager: EntityManager, unit: UnitEntity): Promise<UnitEntity> {
  return manager.save(unit);
}
