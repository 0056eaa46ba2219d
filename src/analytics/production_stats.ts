import {
  differenceInMilliseconds,
  eachDayOfInterval,
  format,
  getHours,
  getMinutes,
  isSameDay,
  startOfDay,
  subDays,
} from 'date-fns';
import {
  DailyProduction,
  DefectStatus,
  Identifier,
  OperationProgress,
  OperatorThroughput,
  ProductionSummary,
  RecordSnapshot,
  RecordStatus,
  UnitStatus,
} from '../domain/types';
import { currentRecords } from '../tracking/status_derivation';

// first shift runs 06:00 until 15:30 local time
const FIRST_SHIFT_START = 6 * 60;
const FIRST_SHIFT_END = 15 * 60 + 30;
const TOP_DEFECT_OPERATIONS = 5;
export const PRODUCTION_TREND_DAYS = 30;

export interface UnitSample {
  id: Identifier;
  status: UnitStatus;
  createdAt: Date;
  completedAt: Date | null;
}

export interface DefectSample {
  unitId: Identifier;
  operationId: Identifier;
  status: DefectStatus;
  createdAt: Date;
}

export interface RecordSample extends RecordSnapshot {
  unitId: Identifier;
}

export interface OperationSample {
  id: Identifier;
  name: string;
  sequence: number;
}

export interface ProcessedRecordSample {
  processedById: Identifier | null;
  status: RecordStatus;
}

export function shiftForDate(date: Date): 1 | 2 {
  const minutes = getHours(date) * 60 + getMinutes(date);
  return minutes >= FIRST_SHIFT_START && minutes < FIRST_SHIFT_END ? 1 : 2;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : roundTo((part / whole) * 100, 1);
}

// current pass of every unit; APPROVED counts as completed, PENDING and IN_PROGRESS as pending
export function operationProgress(operations: OperationSample[], records: RecordSample[]): OperationProgress[] {
  const byUnit = new Map<Identifier, RecordSample[]>();
  for (const record of records) {
    const list = byUnit.get(record.unitId) ?? [];
    list.push(record);
    byUnit.set(record.unitId, list);
  }
  const counts = new Map<Identifier, { completed: number; pending: number }>();
  for (const unitRecords of byUnit.values()) {
    for (const record of currentRecords(unitRecords)) {
      const entry = counts.get(record.operationId) ?? { completed: 0, pending: 0 };
      if (record.status === 'APPROVED') entry.completed++;
      else if (record.status === 'PENDING' || record.status === 'IN_PROGRESS') entry.pending++;
      counts.set(record.operationId, entry);
    }
  }
  return [...operations]
    .sort((a, b) => a.sequence - b.sequence)
    .map((o) => ({
      operationId: o.id,
      operationName: o.name,
      sequence: o.sequence,
      completed: counts.get(o.id)?.completed ?? 0,
      pending: counts.get(o.id)?.pending ?? 0,
    }));
}

// units created per local day over the trailing window, oldest first, days without units included
export function dailyProduction(units: UnitSample[], now: Date, days = PRODUCTION_TREND_DAYS): DailyProduction[] {
  const perDay = new Map<string, number>();
  for (const unit of units) {
    const key = format(unit.createdAt, 'yyyy-MM-dd');
    perDay.set(key, (perDay.get(key) ?? 0) + 1);
  }
  return eachDayOfInterval({ start: startOfDay(subDays(now, days)), end: now }).map((day) => {
    const date = format(day, 'yyyy-MM-dd');
    return { date, count: perDay.get(date) ?? 0 };
  });
}

export function summarize(params: {
  units: UnitSample[];
  defects: DefectSample[];
  operations: OperationSample[];
  records: RecordSample[];
  activeAlerts: number;
  now: Date;
}): ProductionSummary {
  const { units, defects, operations, records, activeAlerts, now } = params;

  const unitsByStatus: Record<UnitStatus, number> = {
    CREATED: 0,
    IN_PROCESS: 0,
    COMPLETED: 0,
    REJECTED: 0,
    DEFECTIVE: 0,
    SCRAPPED: 0,
  };
  for (const unit of units) unitsByStatus[unit.status]++;

  const withDefects = new Set(defects.map((d) => d.unitId));
  const clean = units.filter((u) => !withDefects.has(u.id)).length;

  const cycleTimes = units.flatMap((u) =>
    u.status === 'COMPLETED' && u.completedAt ? [differenceInMilliseconds(u.completedAt, u.createdAt)] : [],
  );
  const averageCycleMs = cycleTimes.length === 0 ? 0 : cycleTimes.reduce((a, b) => a + b, 0) / cycleTimes.length;

  const defectsByStatus: Record<DefectStatus, number> = { OPEN: 0, IN_REPAIR: 0, REPAIRED: 0, SCRAPPED: 0 };
  const perOperation = new Map<Identifier, number>();
  for (const defect of defects) {
    defectsByStatus[defect.status]++;
    perOperation.set(defect.operationId, (perOperation.get(defect.operationId) ?? 0) + 1);
  }
  const names = new Map(operations.map((o) => [o.id, o.name]));
  const defectsByOperation = [...perOperation.entries()]
    .map(([operationId, count]) => ({ operationId, operationName: names.get(operationId) ?? '', count }))
    .sort((a, b) => b.count - a.count || a.operationName.localeCompare(b.operationName))
    .slice(0, TOP_DEFECT_OPERATIONS);

  const today = defects.filter((d) => isSameDay(d.createdAt, now));
  const firstShift = today.filter((d) => shiftForDate(d.createdAt) === 1).length;

  return {
    totalUnits: units.length,
    unitsByStatus,
    completionRate: percentage(unitsByStatus.COMPLETED, units.length),
    firstPassYield: percentage(clean, units.length),
    averageCycleTimeHours: roundTo(averageCycleMs / 3_600_000, 1),
    defectsByStatus,
    defectsByOperation,
    currentShift: shiftForDate(now),
    todayDefectsByShift: { first: firstShift, second: today.length - firstShift },
    operationProgress: operationProgress(operations, records),
    dailyProduction: dailyProduction(units, now),
    activeAlerts,
  };
}

// approved and rejected records per actor, busiest first
export function operatorThroughput(records: ProcessedRecordSample[]): OperatorThroughput[] {
  const byActor = new Map<Identifier, OperatorThroughput>();
  for (const record of records) {
    if (!record.processedById) continue;
    if (record.status !== 'APPROVED' && record.status !== 'REJECTED') continue;
    const entry = byActor.get(record.processedById) ?? { actorId: record.processedById, approved: 0, rejected: 0 };
    if (record.status === 'APPROVED') entry.approved++;
    else entry.rejected++;
    byActor.set(record.processedById, entry);
  }
  return [...byActor.values()].sort((a, b) => b.approved - a.approved || a.actorId.localeCompare(b.actorId));
}
