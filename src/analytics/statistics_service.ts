import { Actor, OperatorThroughput, ProductionSummary } from '../domain/types';
import { TrackingDatabase } from '../repository/database';
import { listOperations } from '../repository/catalog_repository';
import { listDefects } from '../repository/defect_repository';
import { findCompletedRecords, listAllRecords } from '../repository/record_repository';
import { countOpenAlerts } from '../repository/alert_repository';
import { listAllUnits } from '../repository/unit_repository';
import { NotAuthorizedError } from '../utils/errors';
import { operatorThroughput, summarize } from './production_stats';

export class StatisticsService {
  private readonly clock: () => Date;

  constructor(
    private readonly db: TrackingDatabase,
    options: { clock?: () => Date } = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async productionSummary(actor: Actor): Promise<ProductionSummary> {
    this.authorize(actor);
    return this.db.read(async (manager) =>
      summarize({
        units: await listAllUnits(manager),
        defects: await listDefects(manager),
        operations: await listOperations(manager),
        records: await listAllRecords(manager),
        activeAlerts: await countOpenAlerts(manager),
        now: this.clock(),
      }),
    );
  }

  async operatorThroughput(actor: Actor): Promise<OperatorThroughput[]> {
    this.authorize(actor);
    return this.db.read(async (manager) => operatorThroughput(await findCompletedRecords(manager)));
  }

  private authorize(actor: Actor): void {
    if (!actor.canTransition('VIEW_STATISTICS')) {
      throw new NotAuthorizedError(`${actor.role} may not view production statistics`, { actorId: actor.id });
    }
  }
}
