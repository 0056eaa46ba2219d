import { ActorDirectory } from '../../src/catalog/actor_directory';
import { TrackingDatabase } from '../../src/repository/database';
import { createTestDatabase, createTestLine, TestLine } from '../helpers/test_database';

describe('catalog', () => {
  let line: TestLine;

  beforeEach(async () => {
    line = await createTestLine();
  });

  afterEach(async () => {
    await line.db.disconnect();
  });

  test('upserts operations by sequence', async () => {
    await line.services.catalog.upsert(
      { operations: [{ name: 'Laser cutting', sequence: 10, estimatedMinutes: 12, isActive: false }] },
      line.admin,
    );

    const operations = await line.services.catalog.listOperations();
    expect(operations.map((o) => [o.sequence, o.name, o.isActive])).toEqual([
      [10, 'Laser cutting', false],
      [20, 'Welding', true],
      [30, 'Inspection', true],
    ]);
    await expect(line.services.catalog.listOperations(true)).resolves.toHaveLength(2);
  });

  test('only administrators change the catalog', async () => {
    await expect(
      line.services.catalog.upsert({ parts: [{ partNumber: 'P-300', sku: 'SKU-300' }] }, line.supervisor),
    ).rejects.toMatchObject({ code: 'NOT_AUTHORIZED' });
    await expect(line.services.catalog.listParts()).resolves.toHaveLength(1);
  });

  test('registers and resolves actors', async () => {
    await expect(
      line.services.actors.register({ employeeId: 'E100', name: 'Quinn Quality', role: 'QUALITY' }, line.operator),
    ).rejects.toMatchObject({ code: 'NOT_AUTHORIZED' });

    const registered = await line.services.actors.register(
      { employeeId: 'E100', name: 'Quinn Quality', role: 'QUALITY', department: 'QA' },
      line.admin,
    );
    const actor = await line.services.actors.resolve(registered.id);

    expect(actor).toMatchObject({ id: registered.id, name: 'Quinn Quality', role: 'QUALITY' });
    expect(actor?.canTransition('VIEW_STATISTICS')).toBe(true);
    await expect(line.services.actors.resolve('unknown')).resolves.toBeNull();
  });

  test('does not bootstrap an administrator into a populated directory', async () => {
    await expect(line.services.actors.bootstrapAdmin('E900')).resolves.toBeNull();
  });
});

describe('bootstrap administrator', () => {
  let db: TrackingDatabase;

  beforeEach(async () => {
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await db.disconnect();
  });

  test('creates an ADMIN when the directory is empty', async () => {
    const directory = new ActorDirectory(db);

    await expect(directory.bootstrapAdmin(undefined)).resolves.toBeNull();
    const admin = await directory.bootstrapAdmin('E900');

    expect(admin).toMatchObject({ employeeId: 'E900', role: 'ADMIN', isActive: true });
    await expect(directory.list()).resolves.toHaveLength(1);
  });
});
