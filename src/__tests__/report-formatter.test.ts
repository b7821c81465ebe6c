import { describe, it } from 'node:test';
import assert from 'node:assert';
import { formatConsoleReport, formatJsonReport, rankHealthyDevices } from '../report-formatter';
import { FaultReason, TriageSummary } from '../telemetry/types';

const SUMMARY: TriageSummary = {
  totalDevices: 5,
  healthyCount: 3,
  faultyCount: 2,
  faultyDevices: new Map<string, FaultReason>([['F1', 'battery'], ['F2', 'unknown']]),
  healthyDevices: new Map<string, number>([['H1', 1], ['H2', 4], ['H3', 1]]),
};

const EMPTY: TriageSummary = {
  totalDevices: 0,
  healthyCount: 0,
  faultyCount: 0,
  faultyDevices: new Map<string, FaultReason>(),
  healthyDevices: new Map<string, number>(),
};

describe('rankHealthyDevices', () => {
  it('should sort by descending count and keep first-seen order on ties', () => {
    assert.deepStrictEqual(rankHealthyDevices(SUMMARY), [
      { sensorId: 'H2', count: 4 },
      { sensorId: 'H1', count: 1 },
      { sensorId: 'H3', count: 1 },
    ]);
  });
});

describe('formatConsoleReport', () => {
  it('should list counts, faults and ranked healthy sensors', () => {
    assert.strictEqual(formatConsoleReport(SUMMARY), [
      '========================================',
      '  SENSOR TRIAGE REPORT',
      '========================================',
      '',
      '  All big messages: 5',
      '  Successful big messages: 3',
      '  Failed big messages: 2',
      '',
      '  Failed sensors:',
      '    F1: Battery device error',
      '    F2: Unknown device error',
      '',
      '  Success messages count:',
      '    H2: 4',
      '    H1: 1',
      '    H3: 1',
      '',
      '========================================',
    ].join('\n'));
  });

  it('should omit empty sections', () => {
    assert.strictEqual(formatConsoleReport(EMPTY), [
      '========================================',
      '  SENSOR TRIAGE REPORT',
      '========================================',
      '',
      '  All big messages: 0',
      '  Successful big messages: 0',
      '  Failed big messages: 0',
      '',
      '========================================',
    ].join('\n'));
  });

  it('should append stats and timing when given', () => {
    const report = formatConsoleReport(EMPTY, {
      stats: { linesRead: 10, linesRejected: 3, recordsIgnored: 2 },
      durationMs: 12.6,
    });
    const lines = report.split('\n');
    assert.strictEqual(lines[lines.length - 3], '  Lines: 10 read, 3 rejected, 2 ignored');
    assert.strictEqual(lines[lines.length - 2], '  Completed in 13ms');
  });
});

describe('formatJsonReport', () => {
  it('should render faulty sensors as an object and healthy ones ranked', () => {
    const stats = { linesRead: 7, linesRejected: 1, recordsIgnored: 0 };
    const parsed: unknown = JSON.parse(formatJsonReport({ summary: SUMMARY, stats }, 4.2));

    assert.deepStrictEqual(parsed, {
      totalDevices: 5,
      healthyCount: 3,
      faultyCount: 2,
      faultyDevices: {
        F1: { reason: 'battery', message: 'Battery device error' },
        F2: { reason: 'unknown', message: 'Unknown device error' },
      },
      healthyDevices: [
        { sensorId: 'H2', count: 4 },
        { sensorId: 'H1', count: 1 },
        { sensorId: 'H3', count: 1 },
      ],
      stats: { linesRead: 7, linesRejected: 1, recordsIgnored: 0 },
      durationMs: 4,
    });
  });

  it('should leave out durationMs without timing', () => {
    const stats = { linesRead: 0, linesRejected: 0, recordsIgnored: 0 };
    const parsed: unknown = JSON.parse(formatJsonReport({ summary: EMPTY, stats }));
    assert.deepStrictEqual(parsed, {
      totalDevices: 0,
      healthyCount: 0,
      faultyCount: 0,
      faultyDevices: {},
      healthyDevices: [],
      stats,
    });
  });
});
