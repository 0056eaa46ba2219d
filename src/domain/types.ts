export type Identifier = string;

export const UNIT_STATUSES = ['CREATED', 'IN_PROCESS', 'COMPLETED', 'REJECTED', 'DEFECTIVE', 'SCRAPPED'] as const;
export type UnitStatus = (typeof UNIT_STATUSES)[number];

export const RECORD_STATUSES = ['PENDING', 'IN_PROGRESS', 'APPROVED', 'REJECTED'] as const;
export type RecordStatus = (typeof RECORD_STATUSES)[number];

export const DEFECT_STATUSES = ['OPEN', 'IN_REPAIR', 'REPAIRED', 'SCRAPPED'] as const;
export type DefectStatus = (typeof DEFECT_STATUSES)[number];

export const DEFECT_TYPES = ['DIMENSIONAL', 'VISUAL', 'FUNCTIONAL', 'MATERIAL', 'ASSEMBLY', 'OTHER'] as const;
export type DefectType = (typeof DEFECT_TYPES)[number];

export const ALERT_TYPES = ['DELAY', 'QUALITY', 'MAINTENANCE', 'INVENTORY', 'GENERAL'] as const;
export type AlertType = (typeof ALERT_TYPES)[number];

// ascending urgency; listings sort on the index
export const ALERT_PRIORITIES = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
export type AlertPriority = (typeof ALERT_PRIORITIES)[number];

export const ROLES = ['OPERATOR', 'SUPERVISOR', 'QUALITY', 'ADMIN', 'REPAIRER'] as const;
export type Role = (typeof ROLES)[number];

export type TransitionKind =
  | 'START'
  | 'APPROVE'
  | 'REJECT'
  | 'RELEASE'
  | 'REASSIGN'
  | 'ALLOCATE'
  | 'REPAIR'
  | 'VIEW_STATISTICS'
  | 'MANAGE_CATALOG'
  | 'MANAGE_ACTORS';

export interface Actor {
  id: Identifier;
  name: string;
  role: Role;
  canTransition(kind: TransitionKind): boolean;
}

// Units in these states accept no further operation work.
export const CLOSED_UNIT_STATUSES: ReadonlySet<UnitStatus> = new Set(['COMPLETED', 'REJECTED', 'DEFECTIVE', 'SCRAPPED']);

export const OPEN_DEFECT_STATUSES: readonly DefectStatus[] = ['OPEN', 'IN_REPAIR'];

export interface DecodedSerial {
  bucket: string;
  yearLetter: string;
  monthLetter: string;
  year: number;
  month: number; // 1-12
  first: number;
  second: number;
}

export interface RecordSnapshot {
  operationId: Identifier;
  pass: number;
  status: RecordStatus;
}

export interface TransitionEvent {
  unitId: Identifier;
  serialNumber: string;
  recordId: Identifier;
  operationId: Identifier;
  operationName: string;
  status: RecordStatus | UnitStatus;
  actorId: Identifier;
  occurredAt: Date;
}

export interface UnitProgress {
  serialNumber: string;
  status: UnitStatus;
  completionPercentage: number;
  currentOperationId: Identifier | null;
}

export interface ProductionSummary {
  totalUnits: number;
  unitsByStatus: Record<UnitStatus, number>;
  completionRate: number;
  firstPassYield: number;
  averageCycleTimeHours: number;
  defectsByStatus: Record<DefectStatus, number>;
  defectsByOperation: Array<{ operationId: Identifier; operationName: string; count: number }>;
  currentShift: 1 | 2;
  todayDefectsByShift: { first: number; second: number };
  operationProgress: OperationProgress[];
  dailyProduction: DailyProduction[];
  activeAlerts: number;
}

export interface OperationProgress {
  operationId: Identifier;
  operationName: string;
  sequence: number;
  completed: number;
  pending: number;
}

export interface DailyProduction {
  date: string; // yyyy-MM-dd, local time
  count: number;
}

export interface OperatorThroughput {
  actorId: Identifier;
  approved: number;
  rejected: number;
}

// Fire-and-forget sink for transition events; must not throw.
export interface TransitionNotifier {
  publish(event: TransitionEvent): void;
}
