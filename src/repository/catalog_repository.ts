import { EntityManager } from 'typeorm';
import { OperationEntity, PartEntity } from './entities';

export interface PartInput {
  partNumber: string;
  sku: string;
  description?: string;
  revision?: string;
  isActive?: boolean;
}

export interface OperationInput {
  name: string;
  sequence: number;
  description?: string;
  estimatedMinutes?: number;
  isActive?: boolean;
}

export async function upsertCatalog(
  manager: EntityManager,
  params: { parts: PartInput[]; operations: OperationInput[] },
): Promise<{ parts: PartEntity[]; operations: OperationEntity[] }> {
  // idempotent upserts by part number / sequence
  const parts: PartEntity[] = [];
  for (const input of params.parts) {
    const existing = await manager.findOneBy(PartEntity, { partNumber: input.partNumber });
    const part = existing ?? manager.create(PartEntity, { partNumber: input.partNumber });
    part.sku = input.sku;
    part.description = input.description ?? part.description ?? '';
    part.revision = input.revision ?? part.revision ?? 'A';
    part.isActive = input.isActive ?? part.isActive ?? true;
    parts.push(await manager.save(part));
  }

  const operations: OperationEntity[] = [];
  for (const input of params.operations) {
    const existing = await manager.findOneBy(OperationEntity, { sequence: input.sequence });
    const operation = existing ?? manager.create(OperationEntity, { sequence: input.sequence });
    operation.name = input.name;
    operation.description = input.description ?? operation.description ?? '';
    operation.estimatedMinutes = input.estimatedMinutes ?? operation.estimatedMinutes ?? 30;
    operation.isActive = input.isActive ?? operation.isActive ?? true;
    operations.push(await manager.save(operation));
  }

  return { parts, operations };
}

export async function listParts(manager: EntityManager, activeOnly = false): Promise<PartEntity[]> {
  return manager.find(PartEntity, {
    where: activeOnly ? { isActive: true } : {},
    order: { partNumber: 'ASC' },
  });
}

export async function findPartByNumber(manager: EntityManager, partNumber: string): Promise<PartEntity | null> {
  return manager.findOneBy(PartEntity, { partNumber });
}

export async function listOperations(manager: EntityManager, activeOnly = false): Promise<OperationEntity[]> {
  return manager.find(OperationEntity, {
    where: activeOnly ? { isActive: true } : {},
    order: { sequence: 'ASC' },
  });
}

export async function findOperation(manager: EntityManager, id: string): Promise<OperationEntity | null> {
  return manager.findOneBy(OperationEntity, { id });
}
