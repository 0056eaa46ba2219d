import { Actor } from '../domain/types';
import { OperationEntity, PartEntity } from '../repository/entities';
import { TrackingDatabase } from '../repository/database';
import { listOperations, listParts, upsertCatalog } from '../repository/catalog_repository';
import { catalogSchema, validateInput } from '../middleware/validation';
import { NotAuthorizedError } from '../utils/errors';
import { logger } from '../utils/logger';

export class CatalogService {
  constructor(private readonly db: TrackingDatabase) {}

  // Idempotent: parts are matched by part number, operations by sequence.
  async upsert(input: unknown, actor: Actor): Promise<{ parts: PartEntity[]; operations: OperationEntity[] }> {
    if (!actor.canTransition('MANAGE_CATALOG')) {
      throw new NotAuthorizedError(`${actor.role} may not change the catalog`, { actorId: actor.id });
    }
    const catalog = validateInput(catalogSchema, input);
    const result = await this.db.transaction((manager) => upsertCatalog(manager, catalog));
    logger.info('Catalog updated', { parts: result.parts.length, operations: result.operations.length });
    return result;
  }

  async listParts(activeOnly = false): Promise<PartEntity[]> {
    return this.db.read((manager) => listParts(manager, activeOnly));
  }

  async listOperations(activeOnly = false): Promise<OperationEntity[]> {
    return this.db.read((manager) => listOperations(manager, activeOnly));
  }
}
