/**
 * Telemetry Types
 *
 * Records extracted from the sensor log, per-device classification
 * state and the summary produced at end of stream.
 */

/** One accepted `BIG` line from the log */
export interface SensorRecord {
  readonly sensorId: string;  // trimmed, upper-cased, non-empty
  readonly sp1: string;       // status pack 1 (field 6), last char is a checksum
  readonly sp2: string;       // status pack 2 (field 15), may carry a leading '-'
  readonly state: string;     // second-to-last field
}

/** State values the aggregator acts on */
export const SENSOR_STATE = {
  ok: '02',
  failed: 'DD',
} as const;

/** Dominant fault reported for a failed device */
export type FaultReason = 'battery' | 'temperature' | 'threshold' | 'unknown';

/** Classification of a sensor that has been seen at least once */
export type DeviceState =
  | { kind: 'healthy'; count: number }
  | { kind: 'faulty'; reason: FaultReason };

/** End-of-stream result of one aggregation run */
export interface TriageSummary {
  readonly totalDevices: number;
  readonly healthyCount: number;
  readonly faultyCount: number;
  /** Ordered by each sensor's first failed record */
  readonly faultyDevices: ReadonlyMap<string, FaultReason>;
  /** Ordered by first appearance; value is the number of ok records */
  readonly healthyDevices: ReadonlyMap<string, number>;
}

/** Line-level counters collected by the pipeline */
export interface IngestStats {
  linesRead: number;
  linesRejected: number;
  recordsIgnored: number;  // parsed, but the state was neither ok nor failed
}

export interface TriageResult {
  summary: TriageSummary;
  stats: IngestStats;
}
