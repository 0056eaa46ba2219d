import { UnitEntity } from '../../src/repository/entities';
import { RecordView } from '../../src/tracking/unit_service';
import { createTestLine, TestLine } from '../helpers/test_database';

describe('defect workflow', () => {
  let line: TestLine;
  let unit: UnitEntity;
  let records: RecordView[];
  let defectId: string;

  beforeEach(async () => {
    line = await createTestLine();
    const { machine, units } = line.services;
    unit = await units.createUnit({ orderNumber: 'ORD-9', partNumber: 'P-100' }, line.operator);
    records = await units.getHistory(unit.serialNumber);

    await machine.start(records[0].id, line.operator);
    await machine.approve(records[0].id, line.operator, true);
    await machine.start(records[1].id, line.operator);
    const rejection = await machine.reject(records[1].id, line.operator, {
      defectType: 'VISUAL',
      reason: 'Scratch on housing',
    });
    defectId = rejection.defectId;
  });

  afterEach(async () => {
    await line.db.disconnect();
  });

  const statusOf = async () => (await line.services.units.getUnit(unit.serialNumber)).status;

  test('a rejection opens a defect and marks the unit DEFECTIVE', async () => {
    expect(await statusOf()).toBe('DEFECTIVE');
    const defects = await line.services.defects.listDefects({ unitId: unit.id });

    expect(defects).toHaveLength(1);
    expect(defects[0]).toMatchObject({
      id: defectId,
      status: 'OPEN',
      operationId: records[1].operationId,
      recordId: records[1].id,
      defectType: 'VISUAL',
      description: 'Scratch on housing',
      reportedById: line.operator.id,
    });
    await expect(line.services.defects.hasOpenDefect(unit.id)).resolves.toBe(true);
  });

  test('a defective unit accepts no further operation work', async () => {
    await expect(line.services.machine.start(records[2].id, line.operator)).rejects.toMatchObject({
      code: 'INVALID_TRANSITION',
    });
  });

  test('only repairers claim defects, and only once', async () => {
    await expect(line.services.defects.assignRepairer(defectId, line.operator)).rejects.toMatchObject({
      code: 'NOT_AUTHORIZED',
    });

    const claimed = await line.services.defects.assignRepairer(defectId, line.repairer);
    expect(claimed.status).toBe('IN_REPAIR');
    expect(claimed.assignedRepairerId).toBe(line.repairer.id);

    await expect(line.services.defects.assignRepairer(defectId, line.admin)).rejects.toMatchObject({
      code: 'INVALID_TRANSITION',
    });
  });

  test('an unclaimed defect cannot be resolved', async () => {
    await expect(
      line.services.defects.resolve({ defectId, resolution: 'SCRAPPED' }, line.repairer),
    ).rejects.toMatchObject({ code: 'INVALID_TRANSITION' });
  });

  test('only the assigned repairer resolves a defect', async () => {
    await line.services.defects.assignRepairer(defectId, line.repairer);

    await expect(
      line.services.defects.resolve({ defectId, resolution: 'SCRAPPED' }, line.admin),
    ).rejects.toMatchObject({ code: 'NOT_OWNER' });
  });

  test('a repair cannot return the unit past the failing operation', async () => {
    await line.services.defects.assignRepairer(defectId, line.repairer);

    await expect(
      line.services.defects.resolve(
        { defectId, resolution: 'REPAIRED', returnToOperationId: records[2].operationId },
        line.repairer,
      ),
    ).rejects.toMatchObject({ code: 'VALIDATION_FAILED' });
    expect(await statusOf()).toBe('DEFECTIVE');
  });

  test('repair-return adds a new pass and keeps the rejected record', async () => {
    await line.services.defects.assignRepairer(defectId, line.repairer);
    const resolved = await line.services.defects.resolve(
      { defectId, resolution: 'REPAIRED', returnToOperationId: records[1].operationId, repairNotes: 'Polished' },
      line.repairer,
    );

    expect(resolved).toMatchObject({
      status: 'REPAIRED',
      repairNotes: 'Polished',
      resolvedById: line.repairer.id,
      returnToOperationId: records[1].operationId,
    });
    expect(await statusOf()).toBe('IN_PROCESS');

    const history = await line.services.units.getHistory(unit.serialNumber);
    expect(history.map((r) => [r.operationSequence, r.pass, r.status, r.isCurrent])).toEqual([
      [10, 0, 'APPROVED', true],
      [20, 0, 'REJECTED', false],
      [20, 1, 'PENDING', true],
      [30, 0, 'PENDING', true],
    ]);
    const original = history[1];
    expect(original.id).toBe(records[1].id);
    expect(original.rejectionReason).toBe('Scratch on housing');
    expect(original.processedById).toBe(line.operator.id);

    await expect(line.services.machine.start(original.id, line.operator)).rejects.toMatchObject({
      code: 'INVALID_TRANSITION',
    });

    const rework = history[2];
    await line.services.machine.start(rework.id, line.operator);
    await line.services.machine.approve(rework.id, line.operator, true);
    await line.services.machine.start(history[3].id, line.operator);
    await line.services.machine.approve(history[3].id, line.operator, true);
    expect(await statusOf()).toBe('COMPLETED');
  });

  test('returning to an earlier operation reworks every operation up to the failure', async () => {
    await line.services.defects.assignRepairer(defectId, line.repairer);
    await line.services.defects.resolve(
      { defectId, resolution: 'REPAIRED', returnToOperationId: records[0].operationId },
      line.repairer,
    );

    const history = await line.services.units.getHistory(unit.serialNumber);
    expect(history.filter((r) => r.isCurrent).map((r) => [r.operationSequence, r.pass, r.status])).toEqual([
      [10, 1, 'PENDING'],
      [20, 1, 'PENDING'],
      [30, 0, 'PENDING'],
    ]);
    expect(await statusOf()).toBe('CREATED');
  });

  test('scrapping is terminal', async () => {
    await line.services.defects.assignRepairer(defectId, line.repairer);
    await line.services.defects.resolve({ defectId, resolution: 'SCRAPPED', repairNotes: 'Cracked' }, line.repairer);

    expect(await statusOf()).toBe('SCRAPPED');
    await expect(line.services.machine.deriveStatus(unit.id)).resolves.toBe('SCRAPPED');
    await expect(line.services.defects.hasOpenDefect(unit.id)).resolves.toBe(false);
    await expect(line.services.machine.start(records[2].id, line.operator)).rejects.toMatchObject({
      code: 'INVALID_TRANSITION',
    });
    expect(line.notifier.events[line.notifier.events.length - 1]).toMatchObject({
      unitId: unit.id,
      status: 'SCRAPPED',
      actorId: line.repairer.id,
    });
  });

  test('pending records can be rejected directly', async () => {
    const other = await line.services.units.createUnit({ orderNumber: 'ORD-10', partNumber: 'P-100' }, line.operator);
    const [first] = await line.services.units.getHistory(other.serialNumber);

    const { record } = await line.services.machine.reject(first.id, line.secondOperator, {
      defectType: 'MATERIAL',
      reason: 'Wrong alloy',
    });

    expect(record.status).toBe('REJECTED');
    expect(record.defectType).toBe('MATERIAL');
    expect((await line.services.units.getUnit(other.serialNumber)).status).toBe('DEFECTIVE');
  });
});
