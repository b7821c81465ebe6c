/**
 * Report Formatter
 *
 * Renders a TriageSummary for the console or as JSON. Healthy sensors are
 * listed busiest first; sensors with equal counts keep first-seen order.
 */

import { describeFault } from './telemetry';
import type { FaultReason, IngestStats, TriageResult, TriageSummary } from './telemetry';

export interface ReportOptions {
  stats?: IngestStats;
  durationMs?: number;
}

export interface HealthyEntry {
  sensorId: string;
  count: number;
}

/** Healthy sensors by descending ok count, stable on ties */
export function rankHealthyDevices(summary: TriageSummary): HealthyEntry[] {
  return Array.from(summary.healthyDevices, ([sensorId, count]) => ({ sensorId, count }))
    .sort((a, b) => b.count - a.count);
}

/** Format a triage summary for console output */
export function formatConsoleReport(summary: TriageSummary, options: ReportOptions = {}): string {
  const lines: string[] = [];
  const divider = '========================================';

  lines.push(divider);
  lines.push('  SENSOR TRIAGE REPORT');
  lines.push(divider);
  lines.push('');
  lines.push(`  All big messages: ${summary.totalDevices}`);
  lines.push(`  Successful big messages: ${summary.healthyCount}`);
  lines.push(`  Failed big messages: ${summary.faultyCount}`);
  lines.push('');

  if (summary.faultyCount > 0) {
    lines.push('  Failed sensors:');
    for (const [sensorId, reason] of summary.faultyDevices) {
      lines.push(`    ${sensorId}: ${describeFault(reason)}`);
    }
    lines.push('');
  }

  if (summary.healthyCount > 0) {
    lines.push('  Success messages count:');
    for (const { sensorId, count } of rankHealthyDevices(summary)) {
      lines.push(`    ${sensorId}: ${count}`);
    }
    lines.push('');
  }

  if (options.stats) {
    const { linesRead, linesRejected, recordsIgnored } = options.stats;
    lines.push(`  Lines: ${linesRead} read, ${linesRejected} rejected, ${recordsIgnored} ignored`);
  }
  if (options.durationMs !== undefined) {
    lines.push(`  Completed in ${Math.round(options.durationMs)}ms`);
  }
  lines.push(divider);

  return lines.join('\n');
}

export interface JsonReport {
  totalDevices: number;
  healthyCount: number;
  faultyCount: number;
  faultyDevices: Record<string, { reason: FaultReason; message: string }>;
  healthyDevices: HealthyEntry[];
  stats: IngestStats;
  durationMs?: number;
}

export function buildJsonReport(result: TriageResult, durationMs?: number): JsonReport {
  const { summary, stats } = result;
  const faultyDevices: JsonReport['faultyDevices'] = {};
  for (const [sensorId, reason] of summary.faultyDevices) {
    faultyDevices[sensorId] = { reason, message: describeFault(reason) };
  }

  return {
    totalDevices: summary.totalDevices,
    healthyCount: summary.healthyCount,
    faultyCount: summary.faultyCount,
    faultyDevices,
    healthyDevices: rankHealthyDevices(summary),
    stats: { ...stats },
    ...(durationMs !== undefined ? { durationMs: Math.round(durationMs) } : {}),
  };
}

export function formatJsonReport(result: TriageResult, durationMs?: number): string {
  return JSON.stringify(buildJsonReport(result, durationMs), null, 2);
}
