import { AppConfig } from '../config/environment';
import { Actor, TransitionEvent, TransitionNotifier } from '../domain/types';
import { TrackingDatabase } from '../repository/database';
import { ProcessStateMachine } from '../tracking/process_state_machine';
import { UnitService } from '../tracking/unit_service';
import { DefectService } from '../defects/defect_service';
import { CatalogService } from '../catalog/catalog_service';
import { ActorDirectory } from '../catalog/actor_directory';
import { StatisticsService } from '../analytics/statistics_service';
import { AlertService } from '../analytics/alert_service';

export interface NotificationFeed extends TransitionNotifier {
  recentTransitions(limit?: number): TransitionEvent[];
}

export interface TrackingServices {
  machine: ProcessStateMachine;
  units: UnitService;
  defects: DefectService;
  catalog: CatalogService;
  actors: ActorDirectory;
  statistics: StatisticsService;
  alerts: AlertService;
  notifier: NotificationFeed;
}

export interface GraphQLContext {
  services: TrackingServices;
  actor: Actor | null;
}

export function createServices(
  db: TrackingDatabase,
  notifier: NotificationFeed,
  options: { tracking: AppConfig['tracking']; clock?: () => Date },
): TrackingServices {
  const { clock } = options;
  const machine = new ProcessStateMachine(db, notifier, { clock });
  return {
    machine,
    units: new UnitService(db, machine, {
      clock,
      allocatorMaxAttempts: options.tracking.allocatorMaxAttempts,
      bulkMaxQuantity: options.tracking.bulkMaxQuantity,
    }),
    defects: new DefectService(db, machine, notifier, { clock }),
    catalog: new CatalogService(db),
    actors: new ActorDirectory(db),
    statistics: new StatisticsService(db, { clock }),
    alerts: new AlertService(db, { clock }),
    notifier,
  };
}

// the caller is identified by the x-actor-id header; the id is trusted as given
export async function buildContext(
  services: TrackingServices,
  actorHeader: string | string[] | undefined,
): Promise<GraphQLContext> {
  const actorId = Array.isArray(actorHeader) ? actorHeader[0] : actorHeader;
  const actor = actorId ? await services.actors.resolve(actorId) : null;
  return { services, actor };
}
