import { ActorEntity } from './actor.entity';
import { ProductionAlertEntity } from './alert.entity';
import { DefectEntity } from './defect.entity';
import { OperationRecordEntity } from './operation-record.entity';
import { OperationEntity } from './operation.entity';
import { PartEntity } from './part.entity';
import { UnitEntity } from './unit.entity';

export {
  ActorEntity,
  DefectEntity,
  OperationEntity,
  OperationRecordEntity,
  PartEntity,
  ProductionAlertEntity,
  UnitEntity,
};

export const TRACKING_ENTITIES = [
  PartEntity,
  OperationEntity,
  ActorEntity,
  UnitEntity,
  OperationRecordEntity,
  DefectEntity,
  ProductionAlertEntity,
];
