import { Identifier, RecordSnapshot, UnitStatus } from '../domain/types';

export interface DerivationInput {
  currentStatus: UnitStatus;
  records: RecordSnapshot[];
  activeOperationIds: Identifier[];
  hasOpenDefect: boolean;
}

export interface StatusCounts {
  total: number;
  approved: number;
  rejected: number;
}

// Latest pass per operation. Earlier passes are history and never count.
export function currentRecords<T extends RecordSnapshot>(records: T[]): T[] {
  const latest = new Map<Identifier, T>();
  for (const record of records) {
    const seen = latest.get(record.operationId);
    if (!seen || record.pass > seen.pass) {
      latest.set(record.operationId, record);
    }
  }
  return Array.from(latest.values());
}

export function countStatuses(records: RecordSnapshot[], activeOperationIds: Identifier[]): StatusCounts {
  const active = new Set(activeOperationIds);
  const relevant = currentRecords(records).filter((r) => active.has(r.operationId));
  return {
    total: active.size,
    approved: relevant.filter((r) => r.status === 'APPROVED').length,
    rejected: relevant.filter((r) => r.status === 'REJECTED').length,
  };
}

export function deriveUnitStatus(input: DerivationInput): UnitStatus {
  if (input.currentStatus === 'SCRAPPED') {
    return 'SCRAPPED';
  }
  const { total, approved, rejected } = countStatuses(input.records, input.activeOperationIds);
  if (rejected > 0) {
    return input.hasOpenDefect ? 'DEFECTIVE' : 'REJECTED';
  }
  if (total > 0 && approved === total) {
    return 'COMPLETED';
  }
  if (approved > 0) {
    return 'IN_PROCESS';
  }
  return 'CREATED';
}

export function completionPercentage(records: RecordSnapshot[], activeOperationIds: Identifier[]): number {
  const { total, approved } = countStatuses(records, activeOperationIds);
  if (total === 0) return 0;
  return Math.round((approved / total) * 100 * 100) / 100;
}
