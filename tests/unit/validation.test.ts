import {
  catalogSchema,
  createUnitSchema,
  createUnitsSchema,
  rejectSchema,
  resolveDefectSchema,
  validateInput,
} from '../../src/middleware/validation';
import { ValidationError } from '../../src/utils/errors';

describe('validateInput', () => {
  test('trims order numbers', () => {
    expect(validateInput(createUnitSchema, { orderNumber: '  ORD-1 ', partNumber: 'P-100' })).toEqual({
      orderNumber: 'ORD-1',
      partNumber: 'P-100',
    });
  });

  test('rejects order numbers with spaces', () => {
    expect(() => validateInput(createUnitSchema, { orderNumber: 'ORD 1', partNumber: 'P-100' })).toThrow(
      ValidationError,
    );
  });

  test('reports the first failing field', () => {
    try {
      validateInput(createUnitsSchema(100), { orderNumber: 'ORD-1', partNumber: 'P-100', quantity: 0 });
      throw new Error('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: 'VALIDATION_FAILED', field: 'quantity' });
    }
  });

  test('bounds bulk quantity by the configured maximum', () => {
    const schema = createUnitsSchema(100);
    expect(validateInput(schema, { orderNumber: 'ORD-1', partNumber: 'P-100', quantity: 100 }).quantity).toBe(100);
    expect(() => validateInput(schema, { orderNumber: 'ORD-1', partNumber: 'P-100', quantity: 101 })).toThrow(
      ValidationError,
    );
  });

  test('leaves room for the bulk suffix in order numbers', () => {
    const schema = createUnitsSchema(100);
    expect(() => validateInput(schema, { orderNumber: 'A'.repeat(47), partNumber: 'P-100', quantity: 1 })).toThrow(
      ValidationError,
    );
    expect(validateInput(schema, { orderNumber: 'A'.repeat(46), partNumber: 'P-100', quantity: 1 }).orderNumber).toHaveLength(
      46,
    );
  });

  test('defaults the defect type of a rejection', () => {
    expect(validateInput(rejectSchema, { reason: 'Burr on edge' })).toEqual({ defectType: 'OTHER', reason: 'Burr on edge' });
  });

  test('requires a return operation for repaired units only', () => {
    expect(() => validateInput(resolveDefectSchema, { defectId: 'd1', resolution: 'REPAIRED' })).toThrow(ValidationError);
    expect(validateInput(resolveDefectSchema, { defectId: 'd1', resolution: 'SCRAPPED' })).toEqual({
      defectId: 'd1',
      resolution: 'SCRAPPED',
      repairNotes: '',
    });
  });

  test('rejects duplicate operation sequences in a catalog', () => {
    expect(() =>
      validateInput(catalogSchema, {
        operations: [
          { name: 'Cutting', sequence: 10 },
          { name: 'Welding', sequence: 10 },
        ],
      }),
    ).toThrow(ValidationError);
  });
});
