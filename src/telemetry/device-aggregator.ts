/**
 * Device Aggregator
 *
 * Single-pass fold over sensor records. Each sensor moves through
 *
 *   (unseen) -> healthy(count) -> faulty(reason)
 *   (unseen) -> faulty(reason)
 *
 * Faulty is terminal: the reason comes from the first failed record and
 * later ok records for that sensor are dropped. A sensor that failed after
 * reporting ok loses its healthy count.
 */

import { decodeFault } from './fault-decoder';
import { DeviceState, FaultReason, SENSOR_STATE, SensorRecord, TriageSummary } from './types';

export class DeviceAggregator {
  private devices: Map<string, DeviceState> = new Map();

  /**
   * Fold one record into the device map.
   * Returns false when the record's state is neither ok nor failed.
   */
  ingest(record: SensorRecord): boolean {
    const current = this.devices.get(record.sensorId);

    switch (record.state) {
      case SENSOR_STATE.failed:
        if (current?.kind !== 'faulty') {
          // Re-insert so faulty sensors iterate in order of first failure
          this.devices.delete(record.sensorId);
          this.devices.set(record.sensorId, {
            kind: 'faulty',
            reason: decodeFault(record.sp1, record.sp2),
          });
        }
        return true;

      case SENSOR_STATE.ok:
        if (current === undefined) {
          this.devices.set(record.sensorId, { kind: 'healthy', count: 1 });
        } else if (current.kind === 'healthy') {
          current.count++;
        }
        return true;

      default:
        return false;
    }
  }

  /** Current state of one sensor, undefined if never seen */
  stateOf(sensorId: string): DeviceState | undefined {
    const state = this.devices.get(sensorId.toUpperCase());
    return state ? { ...state } : undefined;
  }

  get size(): number {
    return this.devices.size;
  }

  summarize(): TriageSummary {
    const faultyDevices = new Map<string, FaultReason>();
    const healthyDevices = new Map<string, number>();

    for (const [sensorId, state] of this.devices) {
      if (state.kind === 'faulty') {
        faultyDevices.set(sensorId, state.reason);
      } else {
        healthyDevices.set(sensorId, state.count);
      }
    }

    return {
      totalDevices: faultyDevices.size + healthyDevices.size,
      healthyCount: healthyDevices.size,
      faultyCount: faultyDevices.size,
      faultyDevices,
      healthyDevices,
    };
  }

  reset(): void {
    this.devices.clear();
  }
}

/** Fold a record sequence with a fresh aggregator */
export function foldRecords(records: Iterable<SensorRecord>): TriageSummary {
  const aggregator = new DeviceAggregator();
  for (const record of records) {
    aggregator.ingest(record);
  }
  return aggregator.summarize();
}
