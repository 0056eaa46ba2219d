import { z } from 'zod';
import { ALERT_PRIORITIES, ALERT_TYPES, DEFECT_TYPES, ROLES, UNIT_STATUSES } from '../domain/types';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export function validateInput<Output, Input = Output>(schema: z.ZodType<Output, z.ZodTypeDef, Input>, input: unknown): Output {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const fieldErrors = error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));

      logger.warn('Input validation failed', {
        errors: fieldErrors,
        input: typeof input === 'object' ? JSON.stringify(input) : input,
      });

      throw new ValidationError(
        `Validation failed: ${fieldErrors.map((e) => `${e.field}: ${e.message}`).join(', ')}`,
        fieldErrors[0]?.field || 'unknown',
      );
    }
    throw error;
  }
}

export const orderNumberSchema = z
  .string()
  .trim()
  .min(1, 'Order number is required')
  .max(50, 'Order number cannot exceed 50 characters')
  .regex(/^[A-Za-z0-9_-]+$/, 'Order number may only contain letters, digits, hyphens and underscores');

export const catalogSchema = z.object({
  parts: z
    .array(
      z.object({
        partNumber: z.string().trim().min(1, 'Part number is required').max(50),
        sku: z.string().trim().min(1, 'SKU is required').max(50),
        description: z.string().optional(),
        revision: z.string().trim().min(1).max(10).optional(),
        isActive: z.boolean().optional(),
      }),
    )
    .default([]),
  operations: z
    .array(
      z.object({
        name: z.string().trim().min(1, 'Operation name is required').max(100),
        sequence: z.number().int().positive('Sequence must be positive'),
        description: z.string().optional(),
        estimatedMinutes: z.number().int().positive().optional(),
        isActive: z.boolean().optional(),
      }),
    )
    .default([])
    .refine((ops) => new Set(ops.map((o) => o.sequence)).size === ops.length, 'Operation sequences must be unique'),
});

export const createUnitSchema = z.object({
  orderNumber: orderNumberSchema,
  partNumber: z.string().trim().min(1, 'Part number is required'),
});

export function createUnitsSchema(maxQuantity: number) {
  return createUnitSchema.extend({
    // bulk order numbers get a -NNN suffix
    orderNumber: orderNumberSchema.max(46, 'Order number cannot exceed 46 characters for bulk creation'),
    quantity: z
      .number()
      .int()
      .min(1, 'Quantity must be at least 1')
      .max(maxQuantity, `Quantity cannot exceed ${maxQuantity}`),
  });
}

export const rejectSchema = z.object({
  defectType: z.enum(DEFECT_TYPES).default('OTHER'),
  reason: z.string().trim().min(1, 'Rejection reason is required'),
});

export const resolveDefectSchema = z.discriminatedUnion('resolution', [
  z.object({
    defectId: z.string().min(1),
    resolution: z.literal('REPAIRED'),
    repairNotes: z.string().default(''),
    returnToOperationId: z.string().min(1, 'A return operation is required for repaired units'),
  }),
  z.object({
    defectId: z.string().min(1),
    resolution: z.literal('SCRAPPED'),
    repairNotes: z.string().default(''),
  }),
]);

export const registerActorSchema = z.object({
  employeeId: z.string().trim().min(1, 'Employee id is required').max(20),
  name: z.string().trim().min(1, 'Name is required').max(150),
  role: z.enum(ROLES),
  department: z.string().max(100).optional(),
});

export const listUnitsSchema = z.object({
  status: z.enum(UNIT_STATUSES).optional(),
  orderNumber: z.string().optional(),
  limit: z.number().int().min(1).max(500).default(50),
});

export const raiseAlertSchema = z.object({
  title: z.string().trim().min(1, 'Alert title is required').max(200),
  message: z.string().trim().min(1, 'Alert message is required'),
  alertType: z.enum(ALERT_TYPES).default('GENERAL'),
  priority: z.enum(ALERT_PRIORITIES).default('MEDIUM'),
  serialNumber: z.string().trim().min(1).optional(),
});

export const listAlertsSchema = z.object({
  openOnly: z.boolean().default(true),
  serialNumber: z.string().trim().min(1).optional(),
  limit: z.number().int().min(1).max(100).default(10),
});
