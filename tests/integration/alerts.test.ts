import { createTestLine, FIXED_NOW, TestLine } from '../helpers/test_database';

describe('production alerts', () => {
  let line: TestLine;

  beforeEach(async () => {
    line = await createTestLine();
  });

  afterEach(async () => {
    await line.db.disconnect();
  });

  test('raises an alert against a unit', async () => {
    const unit = await line.services.units.createUnit({ orderNumber: 'ORD-1', partNumber: 'P-100' }, line.operator);

    const alert = await line.services.alerts.raise(
      {
        title: 'Coolant low',
        message: 'Cutting station coolant below minimum',
        alertType: 'MAINTENANCE',
        serialNumber: unit.serialNumber,
      },
      line.operator,
    );

    expect(alert).toMatchObject({
      title: 'Coolant low',
      alertType: 'MAINTENANCE',
      priority: 'MEDIUM',
      unitId: unit.id,
      isActive: true,
      isResolved: false,
      createdById: line.operator.id,
      resolvedById: null,
    });
    await expect(line.services.alerts.list({ serialNumber: unit.serialNumber })).resolves.toHaveLength(1);
  });

  test('refuses alerts for unknown units', async () => {
    await expect(
      line.services.alerts.raise({ title: 'Late', message: 'Behind plan', serialNumber: 'LB001-001M' }, line.operator),
    ).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(
      line.services.alerts.raise({ title: '', message: 'Behind plan' }, line.operator),
    ).rejects.toMatchObject({ code: 'VALIDATION_FAILED' });
  });

  test('lists open alerts most urgent first', async () => {
    const { alerts } = line.services;
    await alerts.raise({ title: 'Low', message: 'm', priority: 'LOW' }, line.operator);
    await alerts.raise({ title: 'Critical', message: 'm', priority: 'CRITICAL', alertType: 'QUALITY' }, line.operator);
    await alerts.raise({ title: 'High', message: 'm', priority: 'HIGH', alertType: 'DELAY' }, line.operator);

    expect((await alerts.list()).map((a) => a.title)).toEqual(['Critical', 'High', 'Low']);
    expect((await alerts.list({ limit: 2 })).map((a) => a.title)).toEqual(['Critical', 'High']);
  });

  test('supervisors resolve alerts once', async () => {
    const { alerts } = line.services;
    const alert = await alerts.raise({ title: 'Scrap rate', message: 'm', priority: 'HIGH' }, line.operator);

    await expect(alerts.resolve(alert.id, line.operator)).rejects.toMatchObject({ code: 'NOT_AUTHORIZED' });
    const resolved = await alerts.resolve(alert.id, line.supervisor);
    expect(resolved).toMatchObject({
      isResolved: true,
      isActive: false,
      resolvedById: line.supervisor.id,
      resolvedAt: FIXED_NOW,
    });
    await expect(alerts.resolve(alert.id, line.supervisor)).rejects.toMatchObject({ code: 'INVALID_TRANSITION' });
    await expect(alerts.resolve('missing', line.supervisor)).rejects.toMatchObject({ code: 'NOT_FOUND' });

    await expect(alerts.list()).resolves.toEqual([]);
    await expect(alerts.list({ openOnly: false })).resolves.toHaveLength(1);
  });

  test('open alerts are counted in the production summary', async () => {
    const { alerts, statistics } = line.services;
    const first = await alerts.raise({ title: 'One', message: 'm' }, line.operator);
    await alerts.raise({ title: 'Two', message: 'm' }, line.operator);
    await alerts.resolve(first.id, line.supervisor);

    const summary = await statistics.productionSummary(line.supervisor);
    expect(summary.activeAlerts).toBe(1);
  });
});

describe('production summary', () => {
  let line: TestLine;

  beforeEach(async () => {
    line = await createTestLine();
  });

  afterEach(async () => {
    await line.db.disconnect();
  });

  test('reports per-operation progress and the daily trend', async () => {
    const { units, machine, statistics } = line.services;
    const [first] = await units.createUnits({ orderNumber: 'ORD-2', partNumber: 'P-100', quantity: 2 }, line.operator);
    const [cutting] = await units.getHistory(first.serialNumber);
    await machine.start(cutting.id, line.operator);
    await machine.approve(cutting.id, line.operator, true);

    const summary = await statistics.productionSummary(line.supervisor);

    expect(summary.operationProgress.map((o) => [o.operationName, o.completed, o.pending])).toEqual([
      ['Cutting', 1, 1],
      ['Welding', 0, 2],
      ['Inspection', 0, 2],
    ]);
    expect(summary.dailyProduction).toHaveLength(31);
    expect(summary.dailyProduction[30]).toEqual({ date: '2026-02-10', count: 2 });
    expect(summary.dailyProduction[29]).toEqual({ date: '2026-02-09', count: 0 });
  });
});
