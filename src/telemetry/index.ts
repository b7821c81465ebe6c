export type {
  SensorRecord,
  FaultReason,
  DeviceState,
  TriageSummary,
  IngestStats,
  TriageResult,
} from './types';
export { SENSOR_STATE } from './types';
export { parseLogLine, PAYLOAD_MARKER, HANDLER_TAG, MIN_FIELD_COUNT } from './line-parser';
export { decodeFault, describeFault, packStatus, FAULT_MESSAGES } from './fault-decoder';
export { DeviceAggregator, foldRecords } from './device-aggregator';
export { readLogLines } from './line-source';
export { triage, triageSync, triageFile } from './pipeline';
