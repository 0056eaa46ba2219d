import { Actor, DefectStatus, TransitionNotifier } from '../domain/types';
import { DefectEntity } from '../repository/entities';
import { TrackingDatabase } from '../repository/database';
import { findOperation } from '../repository/catalog_repository';
import { findDefect, hasOpenDefect, listDefects, saveDefect } from '../repository/defect_repository';
import { findUnitById } from '../repository/unit_repository';
import { resolveDefectSchema, validateInput } from '../middleware/validation';
import {
  InvalidTransitionError,
  NotAuthorizedError,
  NotFoundError,
  NotOwnerError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { ProcessStateMachine } from '../tracking/process_state_machine';

export interface DefectServiceOptions {
  clock?: () => Date;
}

export class DefectService {
  private readonly clock: () => Date;

  constructor(
    private readonly db: TrackingDatabase,
    private readonly machine: ProcessStateMachine,
    private readonly notifier: TransitionNotifier,
    options: DefectServiceOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async hasOpenDefect(unitId: string): Promise<boolean> {
    return this.db.read((manager) => hasOpenDefect(manager, unitId));
  }

  async listDefects(filter: { status?: DefectStatus; repairerId?: string; unitId?: string } = {}): Promise<DefectEntity[]> {
    return this.db.read((manager) => listDefects(manager, filter));
  }

  async getDefect(defectId: string): Promise<DefectEntity> {
    const defect = await this.db.read((manager) => findDefect(manager, defectId));
    if (!defect) {
      throw new NotFoundError('Defect', defectId);
    }
    return defect;
  }

  // A repairer claims an open, unassigned defect.
  async assignRepairer(defectId: string, actor: Actor): Promise<DefectEntity> {
    this.authorize(actor);
    const defect = await this.db.transaction(async (manager) => {
      const defect = await findDefect(manager, defectId);
      if (!defect) {
        throw new NotFoundError('Defect', defectId);
      }
      if (defect.status !== 'OPEN' || defect.assignedRepairerId !== null) {
        throw new InvalidTransitionError(`Defect is ${defect.status} and cannot be claimed`, {
          defectId,
          status: defect.status,
          assignedRepairerId: defect.assignedRepairerId,
        });
      }
      defect.status = 'IN_REPAIR';
      defect.assignedRepairerId = actor.id;
      defect.assignedAt = this.clock();
      return saveDefect(manager, defect);
    });
    logger.info('Defect assigned to repairer', { defectId, repairerId: actor.id });
    return defect;
  }

  // Closes a defect. A repaired unit goes back into the line at the chosen
  // operation; a scrapped unit is terminal.
  async resolve(input: unknown, actor: Actor): Promise<DefectEntity> {
    this.authorize(actor);
    const command = validateInput(resolveDefectSchema, input);

    const result = await this.db.transaction(async (manager) => {
      const defect = await findDefect(manager, command.defectId);
      if (!defect) {
        throw new NotFoundError('Defect', command.defectId);
      }
      if (defect.status !== 'IN_REPAIR') {
        throw new InvalidTransitionError(`Defect is ${defect.status}; claim it before resolving`, {
          defectId: defect.id,
          status: defect.status,
        });
      }
      if (defect.assignedRepairerId !== actor.id) {
        throw new NotOwnerError(actor.id, defect.id);
      }
      const unit = await findUnitById(manager, defect.unitId);
      if (!unit) {
        throw new NotFoundError('Unit', defect.unitId);
      }
      const now = this.clock();
      defect.status = command.resolution;
      defect.repairNotes = command.repairNotes;
      defect.resolvedById = actor.id;
      defect.resolvedAt = now;

      let returnOperationName: string | null = null;
      if (command.resolution === 'REPAIRED') {
        const returnTo = await findOperation(manager, command.returnToOperationId);
        const foundAt = await findOperation(manager, defect.operationId);
        if (!returnTo || !returnTo.isActive) {
          throw new ValidationError('Return operation must be an active operation', 'returnToOperationId', command.returnToOperationId);
        }
        if (!foundAt) {
          throw new NotFoundError('Operation', defect.operationId);
        }
        if (returnTo.sequence > foundAt.sequence) {
          throw new ValidationError(
            `Cannot return past operation ${foundAt.sequence} where the defect was found`,
            'returnToOperationId',
            command.returnToOperationId,
          );
        }
        defect.returnToOperationId = returnTo.id;
        // the defect must be closed before the unit status is recomputed
        await saveDefect(manager, defect);
        await this.machine.returnFromRepair(manager, unit, returnTo, foundAt, `Returned after repair: ${defect.description}`);
        returnOperationName = returnTo.name;
      } else {
        await saveDefect(manager, defect);
        await this.machine.markScrapped(manager, unit);
      }
      return { defect, unit, returnOperationName, now };
    });

    logger.info('Defect resolved', {
      defectId: result.defect.id,
      resolution: result.defect.status,
      serialNumber: result.unit.serialNumber,
      returnTo: result.returnOperationName,
    });
    this.notifier.publish({
      unitId: result.unit.id,
      serialNumber: result.unit.serialNumber,
      recordId: result.defect.recordId,
      operationId: result.defect.returnToOperationId ?? result.defect.operationId,
      operationName: result.returnOperationName ?? '',
      status: result.unit.status,
      actorId: actor.id,
      occurredAt: result.now,
    });
    return result.defect;
  }

  private authorize(actor: Actor): void {
    if (!actor.canTransition('REPAIR')) {
      throw new NotAuthorizedError(`${actor.role} may not work on defects`, { actorId: actor.id });
    }
  }
}
