import { makeExecutableSchema } from '@graphql-tools/schema';
import { GraphQLError, GraphQLScalarType, Kind } from 'graphql';
import { Actor, DefectStatus, ProductionSummary, TransitionKind } from '../domain/types';
import { UnitEntity } from '../repository/entities';
import { decodeSerial } from '../tracking/serial_allocator';
import { rejectSchema, validateInput } from '../middleware/validation';
import { NotAuthorizedError, NotFoundError, TrackingError } from '../utils/errors';
import { logger } from '../utils/logger';
import { GraphQLContext } from './context';

const typeDefs = /* GraphQL */ `
  scalar DateTime

  enum UnitStatus { CREATED IN_PROCESS COMPLETED REJECTED DEFECTIVE SCRAPPED }
  enum RecordStatus { PENDING IN_PROGRESS APPROVED REJECTED }
  enum DefectStatus { OPEN IN_REPAIR REPAIRED SCRAPPED }
  enum DefectType { DIMENSIONAL VISUAL FUNCTIONAL MATERIAL ASSEMBLY OTHER }
  enum Role { OPERATOR SUPERVISOR QUALITY ADMIN REPAIRER }
  enum Resolution { REPAIRED SCRAPPED }
  enum AlertType { DELAY QUALITY MAINTENANCE INVENTORY GENERAL }
  enum AlertPriority { LOW MEDIUM HIGH CRITICAL }

  type Part {
    id: ID!
    partNumber: String!
    sku: String!
    description: String!
    revision: String!
    isActive: Boolean!
  }

  type Operation {
    id: ID!
    name: String!
    description: String!
    sequence: Int!
    estimatedMinutes: Int!
    isActive: Boolean!
  }

  type Catalog {
    parts: [Part!]!
    operations: [Operation!]!
  }

  type Actor {
    id: ID!
    employeeId: String!
    name: String!
    role: Role!
    department: String!
    isActive: Boolean!
  }

  type DecodedSerial {
    bucket: String!
    yearLetter: String!
    monthLetter: String!
    year: Int!
    month: Int!
    first: Int!
    second: Int!
  }

  type Unit {
    id: ID!
    serialNumber: String!
    orderNumber: String!
    partId: ID!
    status: UnitStatus!
    createdById: ID!
    createdAt: DateTime!
    updatedAt: DateTime!
    completedAt: DateTime
    decoded: DecodedSerial!
  }

  type OperationRecord {
    id: ID!
    unitId: ID!
    serialNumber: String!
    operationId: ID!
    operationName: String!
    operationSequence: Int!
    pass: Int!
    status: RecordStatus!
    isCurrent: Boolean!
    assignedActorId: ID
    processedById: ID
    assignedAt: DateTime
    startedAt: DateTime
    completedAt: DateTime
    qualityCheckPassed: Boolean!
    notes: String!
    rejectionReason: String!
    defectType: DefectType
    createdAt: DateTime!
  }

  type Rejection {
    record: OperationRecord!
    defectId: ID!
  }

  type UnitProgress {
    serialNumber: String!
    status: UnitStatus!
    completionPercentage: Float!
    currentOperationId: ID
  }

  type Defect {
    id: ID!
    unitId: ID!
    operationId: ID!
    recordId: ID!
    defectType: DefectType!
    description: String!
    status: DefectStatus!
    reportedById: ID!
    assignedRepairerId: ID
    resolvedById: ID
    repairNotes: String!
    returnToOperationId: ID
    createdAt: DateTime!
    assignedAt: DateTime
    resolvedAt: DateTime
  }

  type ProductionAlert {
    id: ID!
    title: String!
    message: String!
    alertType: AlertType!
    priority: AlertPriority!
    unitId: ID
    isActive: Boolean!
    isResolved: Boolean!
    createdById: ID!
    resolvedById: ID
    createdAt: DateTime!
    resolvedAt: DateTime
  }

  type StatusCount {
    status: String!
    count: Int!
  }

  type OperationDefects {
    operationId: ID!
    operationName: String!
    count: Int!
  }

  type ShiftDefects {
    first: Int!
    second: Int!
  }

  type OperationProgress {
    operationId: ID!
    operationName: String!
    sequence: Int!
    completed: Int!
    pending: Int!
  }

  type DailyProduction {
    date: String!
    count: Int!
  }

  type ProductionSummary {
    totalUnits: Int!
    unitsByStatus: [StatusCount!]!
    completionRate: Float!
    firstPassYield: Float!
    averageCycleTimeHours: Float!
    defectsByStatus: [StatusCount!]!
    defectsByOperation: [OperationDefects!]!
    currentShift: Int!
    todayDefectsByShift: ShiftDefects!
    operationProgress: [OperationProgress!]!
    dailyProduction: [DailyProduction!]!
    activeAlerts: Int!
  }

  type OperatorThroughput {
    actorId: ID!
    approved: Int!
    rejected: Int!
  }

  type TransitionEvent {
    unitId: ID!
    serialNumber: String!
    recordId: ID!
    operationId: ID!
    operationName: String!
    status: String!
    actorId: ID!
    occurredAt: DateTime!
  }

  input UnitFilter {
    status: UnitStatus
    orderNumber: String
    limit: Int
  }

  type Query {
    unit(serialNumber: String!): Unit!
    units(filter: UnitFilter): [Unit!]!
    unitHistory(serialNumber: String!): [OperationRecord!]!
    unitProgress(serialNumber: String!): UnitProgress!
    unitStatus(serialNumber: String!): UnitStatus!
    decodeSerial(serialNumber: String!): DecodedSerial!
    orderHasUnits(orderNumber: String!): Boolean!
    availableWork(limit: Int): [OperationRecord!]!
    currentAssignment: OperationRecord
    defects(status: DefectStatus, repairerId: ID): [Defect!]!
    parts(activeOnly: Boolean): [Part!]!
    operations(activeOnly: Boolean): [Operation!]!
    actors: [Actor!]!
    productionSummary: ProductionSummary!
    operatorThroughput: [OperatorThroughput!]!
    recentTransitions(limit: Int): [TransitionEvent!]!
    alerts(openOnly: Boolean, serialNumber: String, limit: Int): [ProductionAlert!]!
  }

  input PartInput {
    partNumber: String!
    sku: String!
    description: String
    revision: String
    isActive: Boolean
  }

  input OperationInput {
    name: String!
    sequence: Int!
    description: String
    estimatedMinutes: Int
    isActive: Boolean
  }

  input CatalogInput {
    parts: [PartInput!]
    operations: [OperationInput!]
  }

  input RegisterActorInput {
    employeeId: String!
    name: String!
    role: Role!
    department: String
  }

  input CreateUnitInput {
    orderNumber: String!
    partNumber: String!
  }

  input CreateUnitsInput {
    orderNumber: String!
    partNumber: String!
    quantity: Int!
  }

  input RejectInput {
    defectType: DefectType
    reason: String!
  }

  input ResolveDefectInput {
    defectId: ID!
    resolution: Resolution!
    repairNotes: String
    returnToOperationId: ID
  }

  input RaiseAlertInput {
    title: String!
    message: String!
    alertType: AlertType
    priority: AlertPriority
    serialNumber: String
  }

  type Mutation {
    upsertCatalog(input: CatalogInput!): Catalog!
    registerActor(input: RegisterActorInput!): Actor!
    deactivateActor(employeeId: String!): Actor!
    createUnit(input: CreateUnitInput!): Unit!
    createUnits(input: CreateUnitsInput!): [Unit!]!
    startOperation(recordId: ID!): OperationRecord!
    approveOperation(recordId: ID!, qualityPassed: Boolean!, notes: String): OperationRecord!
    rejectOperation(recordId: ID!, input: RejectInput!): Rejection!
    releaseOperation(recordId: ID!): OperationRecord!
    reassignOperation(recordId: ID!, actorId: ID!): OperationRecord!
    syncUnitRecords(serialNumber: String!): [OperationRecord!]!
    assignDefect(defectId: ID!): Defect!
    resolveDefect(input: ResolveDefectInput!): Defect!
    raiseAlert(input: RaiseAlertInput!): ProductionAlert!
    resolveAlert(alertId: ID!): ProductionAlert!
  }
`;

function toDate(value: unknown): Date {
  const date = value instanceof Date ? value : typeof value === 'string' || typeof value === 'number' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new GraphQLError(`DateTime cannot represent ${String(value)}`);
  }
  return date;
}

const DateTime = new GraphQLScalarType<Date, string>({
  name: 'DateTime',
  serialize: (value) => toDate(value).toISOString(),
  parseValue: (value) => toDate(value),
  parseLiteral: (ast) => {
    if (ast.kind !== Kind.STRING) {
      throw new GraphQLError('DateTime must be an ISO-8601 string');
    }
    return toDate(ast.value);
  },
});

type Resolver<TArgs, TResult> = (parent: unknown, args: TArgs, ctx: GraphQLContext) => Promise<TResult>;

function toGraphQLError(error: unknown): GraphQLError {
  if (error instanceof GraphQLError) {
    return error;
  }
  if (error instanceof TrackingError) {
    return new GraphQLError(error.message, { extensions: { code: error.code, details: error.details } });
  }
  logger.error('Unexpected resolver failure', {
    error: error instanceof Error ? error.message : 'Unknown error',
    stack: error instanceof Error ? error.stack : undefined,
  });
  return new GraphQLError('Internal server error', { extensions: { code: 'INTERNAL_SERVER_ERROR' } });
}

// typed tracking errors keep their code; anything else is reported as internal
function guard<TArgs, TResult>(resolve: Resolver<TArgs, TResult>): Resolver<TArgs, TResult> {
  return async (parent, args, ctx) => {
    try {
      return await resolve(parent, args, ctx);
    } catch (error) {
      throw toGraphQLError(error);
    }
  };
}

function requireActor(ctx: GraphQLContext, kind?: TransitionKind): Actor {
  if (!ctx.actor) {
    throw new NotAuthorizedError('An active actor is required; set the x-actor-id header');
  }
  if (kind && !ctx.actor.canTransition(kind)) {
    throw new NotAuthorizedError(`${ctx.actor.role} may not ${kind.toLowerCase()}`, { actorId: ctx.actor.id, kind });
  }
  return ctx.actor;
}

function countsOf(counts: Record<string, number>): Array<{ status: string; count: number }> {
  return Object.entries(counts).map(([status, count]) => ({ status, count }));
}

const resolvers = {
  DateTime,
  Unit: {
    decoded: (unit: UnitEntity) => decodeSerial(unit.serialNumber),
  },
  ProductionSummary: {
    unitsByStatus: (summary: ProductionSummary) => countsOf(summary.unitsByStatus),
    defectsByStatus: (summary: ProductionSummary) => countsOf(summary.defectsByStatus),
  },
  Query: {
    unit: guard((_, args: { serialNumber: string }, { services }) => services.units.getUnit(args.serialNumber)),
    units: guard((_, args: { filter?: unknown }, { services }) => services.units.listUnits(args.filter ?? {})),
    unitHistory: guard((_, args: { serialNumber: string }, { services }) =>
      services.units.getHistory(args.serialNumber),
    ),
    unitProgress: guard((_, args: { serialNumber: string }, { services }) =>
      services.units.getProgress(args.serialNumber),
    ),
    unitStatus: guard((_, args: { serialNumber: string }, { services }) =>
      services.units.deriveStatus(args.serialNumber),
    ),
    decodeSerial: guard(async (_, args: { serialNumber: string }) => decodeSerial(args.serialNumber)),
    orderHasUnits: guard((_, args: { orderNumber: string }, { services }) =>
      services.units.orderHasUnits(args.orderNumber),
    ),
    availableWork: guard((_, args: { limit?: number | null }, ctx) =>
      ctx.services.units.listAvailableWork(requireActor(ctx), args.limit ?? 10),
    ),
    currentAssignment: guard((_, __: Record<string, never>, ctx) =>
      ctx.services.units.getCurrentAssignment(requireActor(ctx)),
    ),
    defects: guard((_, args: { status?: DefectStatus | null; repairerId?: string | null }, { services }) =>
      services.defects.listDefects({ status: args.status ?? undefined, repairerId: args.repairerId ?? undefined }),
    ),
    parts: guard((_, args: { activeOnly?: boolean | null }, { services }) =>
      services.catalog.listParts(args.activeOnly ?? false),
    ),
    operations: guard((_, args: { activeOnly?: boolean | null }, { services }) =>
      services.catalog.listOperations(args.activeOnly ?? false),
    ),
    actors: guard(async (_, __: Record<string, never>, ctx) => {
      requireActor(ctx, 'MANAGE_ACTORS');
      return ctx.services.actors.list();
    }),
    productionSummary: guard((_, __: Record<string, never>, ctx) =>
      ctx.services.statistics.productionSummary(requireActor(ctx)),
    ),
    operatorThroughput: guard((_, __: Record<string, never>, ctx) =>
      ctx.services.statistics.operatorThroughput(requireActor(ctx)),
    ),
    recentTransitions: guard(async (_, args: { limit?: number | null }, { services }) =>
      services.notifier.recentTransitions(args.limit ?? 20),
    ),
    alerts: guard(
      (_, args: { openOnly?: boolean | null; serialNumber?: string | null; limit?: number | null }, { services }) =>
        services.alerts.list({
          openOnly: args.openOnly ?? undefined,
          serialNumber: args.serialNumber ?? undefined,
          limit: args.limit ?? undefined,
        }),
    ),
  },
  Mutation: {
    upsertCatalog: guard((_, args: { input: unknown }, ctx) =>
      ctx.services.catalog.upsert(args.input, requireActor(ctx)),
    ),
    registerActor: guard((_, args: { input: unknown }, ctx) =>
      ctx.services.actors.register(args.input, requireActor(ctx)),
    ),
    deactivateActor: guard((_, args: { employeeId: string }, ctx) =>
      ctx.services.actors.deactivate(args.employeeId, requireActor(ctx)),
    ),
    createUnit: guard((_, args: { input: unknown }, ctx) =>
      ctx.services.units.createUnit(args.input, requireActor(ctx)),
    ),
    createUnits: guard((_, args: { input: unknown }, ctx) =>
      ctx.services.units.createUnits(args.input, requireActor(ctx)),
    ),
    startOperation: guard(async (_, args: { recordId: string }, ctx) => {
      const record = await ctx.services.machine.start(args.recordId, requireActor(ctx));
      return ctx.services.units.describeRecord(record.id);
    }),
    approveOperation: guard(
      async (_, args: { recordId: string; qualityPassed: boolean; notes?: string | null }, ctx) => {
        const actor = requireActor(ctx);
        const record = await ctx.services.machine.approve(args.recordId, actor, args.qualityPassed, args.notes ?? undefined);
        return ctx.services.units.describeRecord(record.id);
      },
    ),
    rejectOperation: guard(async (_, args: { recordId: string; input: unknown }, ctx) => {
      const actor = requireActor(ctx);
      const params = validateInput(rejectSchema, args.input);
      const { record, defectId } = await ctx.services.machine.reject(args.recordId, actor, params);
      return { record: await ctx.services.units.describeRecord(record.id), defectId };
    }),
    releaseOperation: guard(async (_, args: { recordId: string }, ctx) => {
      const record = await ctx.services.machine.release(args.recordId, requireActor(ctx));
      return ctx.services.units.describeRecord(record.id);
    }),
    reassignOperation: guard(async (_, args: { recordId: string; actorId: string }, ctx) => {
      const by = requireActor(ctx);
      const newActor = await ctx.services.actors.resolve(args.actorId);
      if (!newActor) {
        throw new NotFoundError('Actor', args.actorId);
      }
      const record = await ctx.services.machine.reassign(args.recordId, newActor, by);
      return ctx.services.units.describeRecord(record.id);
    }),
    syncUnitRecords: guard((_, args: { serialNumber: string }, ctx) =>
      ctx.services.units.syncRecords(args.serialNumber, requireActor(ctx)),
    ),
    assignDefect: guard((_, args: { defectId: string }, ctx) =>
      ctx.services.defects.assignRepairer(args.defectId, requireActor(ctx)),
    ),
    resolveDefect: guard((_, args: { input: unknown }, ctx) =>
      ctx.services.defects.resolve(args.input, requireActor(ctx)),
    ),
    raiseAlert: guard((_, args: { input: unknown }, ctx) => ctx.services.alerts.raise(args.input, requireActor(ctx))),
    resolveAlert: guard((_, args: { alertId: string }, ctx) =>
      ctx.services.alerts.resolve(args.alertId, requireActor(ctx)),
    ),
  },
};

export function buildSchema() {
  return makeExecutableSchema<GraphQLContext>({ typeDefs, resolvers });
}
