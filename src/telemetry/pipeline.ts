/**
 * Triage Pipeline
 *
 * raw lines -> parseLogLine -> DeviceAggregator -> TriageSummary
 *
 * Rejected lines and records with an unrecognized state are dropped and
 * only show up in the ingest counters.
 */

import { getLogger } from '../logger';
import { LogEncoding } from '../config-schema';
import { DeviceAggregator } from './device-aggregator';
import { parseLogLine } from './line-parser';
import { readLogLines } from './line-source';
import { IngestStats, TriageResult } from './types';

class TriageRun {
  private aggregator = new DeviceAggregator();
  private log = getLogger('Triage');
  readonly stats: IngestStats = { linesRead: 0, linesRejected: 0, recordsIgnored: 0 };

  accept(line: string): void {
    this.stats.linesRead++;
    const record = parseLogLine(line);
    if (!record) {
      this.stats.linesRejected++;
      this.log.trace({ line: this.stats.linesRead }, 'Line rejected');
      return;
    }
    if (!this.aggregator.ingest(record)) {
      this.stats.recordsIgnored++;
      this.log.debug(
        { line: this.stats.linesRead, sensorId: record.sensorId, state: record.state },
        'Unrecognized state ignored',
      );
    }
  }

  finish(): TriageResult {
    const summary = this.aggregator.summarize();
    this.log.info(
      {
        ...this.stats,
        devices: summary.totalDevices,
        healthy: summary.healthyCount,
        faulty: summary.faultyCount,
      },
      'Triage complete',
    );
    return { summary, stats: { ...this.stats } };
  }
}

/** Run the pipeline over an in-memory line sequence */
export function triageSync(lines: Iterable<string>): TriageResult {
  const run = new TriageRun();
  for (const line of lines) {
    run.accept(line);
  }
  return run.finish();
}

/** Run the pipeline over a sync or async line stream */
export async function triage(lines: Iterable<string> | AsyncIterable<string>): Promise<TriageResult> {
  const run = new TriageRun();
  for await (const line of lines) {
    run.accept(line);
  }
  return run.finish();
}

export async function triageFile(filePath: string, encoding?: LogEncoding): Promise<TriageResult> {
  getLogger('Triage').debug({ filePath }, 'Reading log file');
  return triage(readLogLines(filePath, encoding));
}
