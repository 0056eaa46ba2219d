import {
  dailyProduction,
  operationProgress,
  operatorThroughput,
  RecordSample,
  shiftForDate,
  summarize,
  UnitSample,
} from '../../src/analytics/production_stats';

const at = (day: number, hours: number, minutes = 0) => new Date(2026, 1, day, hours, minutes);

describe('shiftForDate', () => {
  test.each<[Date, 1 | 2]>([
    [at(10, 6, 0), 1],
    [at(10, 15, 29), 1],
    [at(10, 15, 30), 2],
    [at(10, 5, 59), 2],
    [at(10, 22, 0), 2],
  ])('%s falls in shift %i', (date, shift) => {
    expect(shiftForDate(date)).toBe(shift);
  });
});

describe('summarize', () => {
  const units: UnitSample[] = [
    { id: 'u1', status: 'COMPLETED', createdAt: at(10, 6), completedAt: at(10, 8) },
    { id: 'u2', status: 'COMPLETED', createdAt: at(10, 7), completedAt: at(10, 10) },
    { id: 'u3', status: 'DEFECTIVE', createdAt: at(10, 7), completedAt: null },
    { id: 'u4', status: 'CREATED', createdAt: at(10, 8), completedAt: null },
  ];
  const operations = [
    { id: 'op-weld', name: 'Welding', sequence: 20 },
    { id: 'op-cut', name: 'Cutting', sequence: 10 },
  ];
  const records: RecordSample[] = [
    { unitId: 'u1', operationId: 'op-cut', pass: 0, status: 'APPROVED' },
    { unitId: 'u1', operationId: 'op-weld', pass: 0, status: 'APPROVED' },
    { unitId: 'u3', operationId: 'op-cut', pass: 0, status: 'APPROVED' },
    { unitId: 'u3', operationId: 'op-weld', pass: 0, status: 'REJECTED' },
    { unitId: 'u4', operationId: 'op-cut', pass: 0, status: 'IN_PROGRESS' },
    { unitId: 'u4', operationId: 'op-weld', pass: 0, status: 'PENDING' },
  ];

  test('reports yield, cycle time and defect breakdowns', () => {
    const summary = summarize({
      units,
      operations,
      defects: [
        { unitId: 'u3', operationId: 'op-weld', status: 'OPEN', createdAt: at(10, 9) },
        { unitId: 'u3', operationId: 'op-weld', status: 'REPAIRED', createdAt: at(10, 16) },
        { unitId: 'u2', operationId: 'op-cut', status: 'REPAIRED', createdAt: at(9, 10) },
      ],
      records,
      activeAlerts: 2,
      now: at(10, 20),
    });

    expect(summary).toEqual({
      totalUnits: 4,
      unitsByStatus: { CREATED: 1, IN_PROCESS: 0, COMPLETED: 2, REJECTED: 0, DEFECTIVE: 1, SCRAPPED: 0 },
      completionRate: 50,
      firstPassYield: 50,
      averageCycleTimeHours: 2.5,
      defectsByStatus: { OPEN: 1, IN_REPAIR: 0, REPAIRED: 2, SCRAPPED: 0 },
      defectsByOperation: [
        { operationId: 'op-weld', operationName: 'Welding', count: 2 },
        { operationId: 'op-cut', operationName: 'Cutting', count: 1 },
      ],
      currentShift: 2,
      todayDefectsByShift: { first: 1, second: 1 },
      operationProgress: [
        { operationId: 'op-cut', operationName: 'Cutting', sequence: 10, completed: 2, pending: 1 },
        { operationId: 'op-weld', operationName: 'Welding', sequence: 20, completed: 1, pending: 1 },
      ],
      dailyProduction: expect.any(Array),
      activeAlerts: 2,
    });
    expect(summary.dailyProduction.at(-1)).toEqual({ date: '2026-02-10', count: 4 });
  });

  test('returns zeros for an empty line', () => {
    const summary = summarize({ units: [], defects: [], operations: [], records: [], activeAlerts: 0, now: at(10, 7) });
    expect(summary.totalUnits).toBe(0);
    expect(summary.completionRate).toBe(0);
    expect(summary.firstPassYield).toBe(0);
    expect(summary.averageCycleTimeHours).toBe(0);
    expect(summary.defectsByOperation).toEqual([]);
    expect(summary.currentShift).toBe(1);
    expect(summary.operationProgress).toEqual([]);
    expect(summary.activeAlerts).toBe(0);
    expect(summary.dailyProduction.every((day) => day.count === 0)).toBe(true);
  });

  test('keeps only the five operations with most defects', () => {
    const defects = Array.from({ length: 7 }, (_, i) => ({
      unitId: 'u3',
      operationId: `op-${i}`,
      status: 'OPEN' as const,
      createdAt: at(9, 9),
    }));
    const summary = summarize({ units, defects, operations: [], records: [], activeAlerts: 0, now: at(10, 9) });
    expect(summary.defectsByOperation).toHaveLength(5);
    expect(summary.todayDefectsByShift).toEqual({ first: 0, second: 0 });
  });
});

describe('operationProgress', () => {
  test('counts only the latest pass of each unit', () => {
    const progress = operationProgress(
      [{ id: 'op-cut', name: 'Cutting', sequence: 10 }],
      [
        { unitId: 'u1', operationId: 'op-cut', pass: 0, status: 'REJECTED' },
        { unitId: 'u1', operationId: 'op-cut', pass: 1, status: 'PENDING' },
        { unitId: 'u2', operationId: 'op-cut', pass: 0, status: 'APPROVED' },
      ],
    );
    expect(progress).toEqual([
      { operationId: 'op-cut', operationName: 'Cutting', sequence: 10, completed: 1, pending: 1 },
    ]);
  });
});

describe('dailyProduction', () => {
  test('covers the trailing thirty days and fills empty days with zero', () => {
    const trend = dailyProduction(
      [
        { id: 'u1', status: 'CREATED', createdAt: at(10, 6), completedAt: null },
        { id: 'u2', status: 'CREATED', createdAt: at(10, 23, 59), completedAt: null },
        { id: 'u3', status: 'CREATED', createdAt: at(8, 12), completedAt: null },
        { id: 'u4', status: 'CREATED', createdAt: new Date(2025, 11, 1), completedAt: null },
      ],
      at(10, 12),
    );

    expect(trend).toHaveLength(31);
    expect(trend[0]).toEqual({ date: '2026-01-11', count: 0 });
    expect(trend.slice(-3)).toEqual([
      { date: '2026-02-08', count: 1 },
      { date: '2026-02-09', count: 0 },
      { date: '2026-02-10', count: 2 },
    ]);
  });
});

describe('operatorThroughput', () => {
  test('counts approvals and rejections per actor, busiest first', () => {
    expect(
      operatorThroughput([
        { processedById: 'alice', status: 'APPROVED' },
        { processedById: 'alice', status: 'REJECTED' },
        { processedById: 'bob', status: 'APPROVED' },
        { processedById: 'bob', status: 'APPROVED' },
        { processedById: null, status: 'PENDING' },
      ]),
    ).toEqual([
      { actorId: 'bob', approved: 2, rejected: 0 },
      { actorId: 'alice', approved: 1, rejected: 1 },
    ]);
  });
});
