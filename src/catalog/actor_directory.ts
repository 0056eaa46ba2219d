import { Actor } from '../domain/types';
import { createActor } from '../domain/actor';
import { ActorEntity } from '../repository/entities';
import { TrackingDatabase } from '../repository/database';
import {
  countActors,
  findActor,
  findActorByEmployeeId,
  listActors,
  upsertActor,
} from '../repository/actor_repository';
import { registerActorSchema, validateInput } from '../middleware/validation';
import { NotAuthorizedError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export function toActor(entity: ActorEntity): Actor {
  return createActor({ id: entity.id, name: entity.name, role: entity.role });
}

export class ActorDirectory {
  constructor(private readonly db: TrackingDatabase) {}

  async register(input: unknown, by: Actor): Promise<ActorEntity> {
    this.authorize(by);
    const params = validateInput(registerActorSchema, input);
    const actor = await this.db.transaction((manager) => upsertActor(manager, params));
    logger.info('Actor registered', { employeeId: actor.employeeId, role: actor.role });
    return actor;
  }

  async deactivate(employeeId: string, by: Actor): Promise<ActorEntity> {
    this.authorize(by);
    const actor = await this.db.transaction(async (manager) => {
      const actor = await findActorByEmployeeId(manager, employeeId);
      if (!actor) {
        throw new NotFoundError('Actor', employeeId);
      }
      actor.isActive = false;
      return manager.save(actor);
    });
    logger.info('Actor deactivated', { employeeId });
    return actor;
  }

  // Unknown and inactive actors resolve to null.
  async resolve(actorId: string): Promise<Actor | null> {
    const entity = await this.db.read((manager) => findActor(manager, actorId));
    return entity && entity.isActive ? toActor(entity) : null;
  }

  async list(): Promise<ActorEntity[]> {
    return this.db.read((manager) => listActors(manager));
  }

  // Seeds an ADMIN when the directory is empty, so the first catalog can be loaded.
  async bootstrapAdmin(employeeId: string | undefined): Promise<ActorEntity | null> {
    if (!employeeId) return null;
    const admin = await this.db.transaction(async (manager) => {
      if ((await countActors(manager)) > 0) return null;
      return upsertActor(manager, { employeeId, name: 'Administrator', role: 'ADMIN' });
    });
    if (admin) {
      logger.info('Bootstrap administrator created', { employeeId, actorId: admin.id });
    }
    return admin;
  }

  private authorize(by: Actor): void {
    if (!by.canTransition('MANAGE_ACTORS')) {
      throw new NotAuthorizedError(`${by.role} may not manage actors`, { actorId: by.id });
    }
  }
}
