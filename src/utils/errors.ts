import { QueryFailedError } from 'typeorm';

export type TrackingErrorCode =
  | 'INVALID_TRANSITION'
  | 'SEQUENCE_VIOLATION'
  | 'ACTOR_BUSY'
  | 'NOT_OWNER'
  | 'ALLOCATION_EXHAUSTED'
  | 'INVALID_FORMAT'
  | 'NOT_AUTHORIZED'
  | 'NOT_FOUND'
  | 'VALIDATION_FAILED';

// Base class for every failure a caller can act on. The request layer turns
// these into structured responses; anything else is an internal error.
export class TrackingError extends Error {
  constructor(message: string, public code: TrackingErrorCode, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'TrackingError';
  }
}

export class InvalidTransitionError extends TrackingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_TRANSITION', details);
    this.name = 'InvalidTransitionError';
  }
}

export class SequenceViolationError extends TrackingError {
  constructor(public operationSequence: number, public blockingSequences: number[]) {
    super(
      `Operation ${operationSequence} cannot proceed before operations ${blockingSequences.join(', ')} are approved`,
      'SEQUENCE_VIOLATION',
      { operationSequence, blockingSequences },
    );
    this.name = 'SequenceViolationError';
  }
}

export class ActorBusyError extends TrackingError {
  constructor(public actorId: string, public activeRecordId: string) {
    super(`Actor ${actorId} already holds operation record ${activeRecordId}`, 'ACTOR_BUSY', {
      actorId,
      activeRecordId,
    });
    this.name = 'ActorBusyError';
  }
}

export class NotOwnerError extends TrackingError {
  constructor(public actorId: string, public recordId: string) {
    super(`Actor ${actorId} does not hold ${recordId}`, 'NOT_OWNER', { actorId, recordId });
    this.name = 'NotOwnerError';
  }
}

export class AllocationExhaustedError extends TrackingError {
  constructor(public bucket: string, reason: string) {
    super(`Serial numbers for bucket ${bucket} exhausted: ${reason}`, 'ALLOCATION_EXHAUSTED', { bucket });
    this.name = 'AllocationExhaustedError';
  }
}

export class InvalidFormatError extends TrackingError {
  constructor(public value: string) {
    super(`'${value}' is not a valid serial number`, 'INVALID_FORMAT', { value });
    this.name = 'InvalidFormatError';
  }
}

export class NotAuthorizedError extends TrackingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_AUTHORIZED', details);
    this.name = 'NotAuthorizedError';
  }
}

export class NotFoundError extends TrackingError {
  constructor(public entity: string, public key: string) {
    super(`${entity} ${key} not found`, 'NOT_FOUND', { entity, key });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends TrackingError {
  constructor(message: string, public field: string, public value?: unknown) {
    super(message, 'VALIDATION_FAILED', { field });
    this.name = 'ValidationError';
  }
}

export class DatabaseError extends Error {
  constructor(message: string, public operation: string, public originalError?: Error) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class JobQueueError extends Error {
  constructor(message: string, public jobId?: string, public originalError?: Error) {
    super(message);
    this.name = 'JobQueueError';
  }
}

// Raised by unit inserts when the serial number is already taken.
export class DuplicateSerialError extends Error {
  constructor(public serialNumber: string) {
    super(`Serial number ${serialNumber} already exists`);
    this.name = 'DuplicateSerialError';
  }
}

const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY', '23505']);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    return typeof driverError.code === 'string' && UNIQUE_VIOLATION_CODES.has(driverError.code);
  }
  return false;
}
