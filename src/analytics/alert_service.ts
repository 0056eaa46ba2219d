import { Actor, ALERT_PRIORITIES } from '../domain/types';
import { ProductionAlertEntity } from '../repository/entities';
import { TrackingDatabase } from '../repository/database';
import { findAlert, insertAlert, listAlerts, saveAlert } from '../repository/alert_repository';
import { findUnitBySerial } from '../repository/unit_repository';
import { listAlertsSchema, raiseAlertSchema, validateInput } from '../middleware/validation';
import { InvalidTransitionError, NotAuthorizedError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { decodeSerial } from '../tracking/serial_allocator';

// most urgent first, newest first within a priority
function byUrgency(a: ProductionAlertEntity, b: ProductionAlertEntity): number {
  return (
    ALERT_PRIORITIES.indexOf(b.priority) - ALERT_PRIORITIES.indexOf(a.priority) ||
    b.createdAt.getTime() - a.createdAt.getTime()
  );
}

export class AlertService {
  private readonly clock: () => Date;

  constructor(
    private readonly db: TrackingDatabase,
    options: { clock?: () => Date } = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  // any registered actor may raise an alert
  async raise(input: unknown, actor: Actor): Promise<ProductionAlertEntity> {
    const { serialNumber, ...alert } = validateInput(raiseAlertSchema, input);
    if (serialNumber !== undefined) decodeSerial(serialNumber);

    const created = await this.db.transaction(async (manager) => {
      let unitId: string | null = null;
      if (serialNumber !== undefined) {
        const unit = await findUnitBySerial(manager, serialNumber);
        if (!unit) {
          throw new NotFoundError('Unit', serialNumber);
        }
        unitId = unit.id;
      }
      return insertAlert(manager, { ...alert, unitId, createdById: actor.id, createdAt: this.clock() });
    });

    logger.warn(`Production alert raised: ${created.title}`, {
      alertId: created.id,
      alertType: created.alertType,
      priority: created.priority,
      serialNumber,
      actorId: actor.id,
    });
    return created;
  }

  async list(input: unknown = {}): Promise<ProductionAlertEntity[]> {
    const { openOnly, serialNumber, limit } = validateInput(listAlertsSchema, input);
    if (serialNumber !== undefined) decodeSerial(serialNumber);

    const alerts = await this.db.read<ProductionAlertEntity[]>(async (manager) => {
      let unitId: string | undefined;
      if (serialNumber !== undefined) {
        const unit = await findUnitBySerial(manager, serialNumber);
        if (!unit) return [];
        unitId = unit.id;
      }
      return listAlerts(manager, { openOnly, unitId });
    });
    return alerts.sort(byUrgency).slice(0, limit);
  }

  async resolve(alertId: string, actor: Actor): Promise<ProductionAlertEntity> {
    if (!actor.canTransition('REASSIGN')) {
      throw new NotAuthorizedError(`${actor.role} may not resolve production alerts`, { actorId: actor.id });
    }
    const resolved = await this.db.transaction(async (manager) => {
      const alert = await findAlert(manager, alertId);
      if (!alert) {
        throw new NotFoundError('ProductionAlert', alertId);
      }
      if (alert.isResolved) {
        throw new InvalidTransitionError('Alert is already resolved', { alertId, resolvedById: alert.resolvedById });
      }
      alert.isResolved = true;
      alert.isActive = false;
      alert.resolvedById = actor.id;
      alert.resolvedAt = this.clock();
      return saveAlert(manager, alert);
    });
    logger.info('Production alert resolved', { alertId, actorId: actor.id });
    return resolved;
  }
}
