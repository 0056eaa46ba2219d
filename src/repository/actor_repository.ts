import { EntityManager } from 'typeorm';
import { Role } from '../domain/types';
import { ActorEntity } from './entities';

export async function upsertActor(
  manager: EntityManager,
  params: { employeeId: string; name: string; role: Role; department?: string },
): Promise<ActorEntity> {
  const existing = await manager.findOneBy(ActorEntity, { employeeId: params.employeeId });
  const actor = existing ?? manager.create(ActorEntity, { employeeId: params.employeeId });
  actor.name = params.name;
  actor.role = params.role;
  actor.department = params.department ?? actor.department ?? '';
  actor.isActive = true;
  return manager.save(actor);
}

export async function findActor(manager: EntityManager, id: string): Promise<ActorEntity | null> {
  return manager.findOneBy(ActorEntity, { id });
}

export async function findActorByEmployeeId(manager: EntityManager, employeeId: string): Promise<ActorEntity | null> {
  return manager.findOneBy(ActorEntity, { employeeId });
}

export async function countActors(manager: EntityManager): Promise<number> {
  return manager.count(ActorEntity);
}

export async function listActors(manager: EntityManager): Promise<ActorEntity[]> {
  return manager.find(ActorEntity, { order: { employeeId: 'ASC' } });
}
