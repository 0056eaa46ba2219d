import { EntityManager, FindOptionsWhere } from 'typeorm';
import { AlertPriority, AlertType } from '../domain/types';
import { ProductionAlertEntity } from './entities';

export async function insertAlert(
  manager: EntityManager,
  params: {
    title: string;
    message: string;
    alertType: AlertType;
    priority: AlertPriority;
    unitId: string | null;
    createdById: string;
    createdAt: Date;
  },
): Promise<ProductionAlertEntity> {
  const alert = manager.create(ProductionAlertEntity, {
    ...params,
    isActive: true,
    isResolved: false,
    resolvedById: null,
    resolvedAt: null,
  });
  return manager.save(alert);
}

export async function findAlert(manager: EntityManager, id: string): Promise<ProductionAlertEntity | null> {
  return manager.findOneBy(ProductionAlertEntity, { id });
}

export async function listAlerts(
  manager: EntityManager,
  filter: { openOnly: boolean; unitId?: string },
): Promise<ProductionAlertEntity[]> {
  const where: FindOptionsWhere<ProductionAlertEntity> = {};
  if (filter.openOnly) {
    where.isActive = true;
    where.isResolved = false;
  }
  if (filter.unitId) where.unitId = filter.unitId;
  return manager.find(ProductionAlertEntity, { where, order: { createdAt: 'DESC' } });
}

export async function countOpenAlerts(manager: EntityManager): Promise<number> {
  return manager.countBy(ProductionAlertEntity, { isActive: true, isResolved: false });
}

export async function saveAlert(manager: EntityManager, alert: ProductionAlertEntity): Promise<ProductionAlertEntity> {
  return manager.save(alert);
}
