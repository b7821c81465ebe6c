/**
 * Log Line Parser
 *
 * Extracts a SensorRecord from one raw log line. The payload follows the
 * first "> " marker, optionally wrapped in quotes, and is a list of
 * semicolon-separated fields:
 *
 *   ... > 'BIG;<seq>;<sensor>;...;<sp1 @6>;...;<sp2 @15>;...;<state>;<tail>'
 *
 * Anything that does not fit yields null.
 */

import { SensorRecord } from './types';

export const PAYLOAD_MARKER = '> ';
export const HANDLER_TAG = 'BIG';
export const MIN_FIELD_COUNT = 18;

const FIELD = {
  handler: 0,
  sensorId: 2,
  sp1: 6,
  sp2: 15,
} as const;

const QUOTES = new Set(["'", '"']);

/** Trim whitespace, then drop at most one quote character from each end */
function unquote(text: string): string {
  let result = text.trim();
  if (result.length > 0 && QUOTES.has(result[0])) result = result.slice(1);
  if (result.length > 0 && QUOTES.has(result[result.length - 1])) result = result.slice(0, -1);
  return result;
}

/**
 * Parse a single log line.
 * Returns null for lines without the marker, with too few fields,
 * for another handler, or without a sensor id.
 */
export function parseLogLine(line: string): SensorRecord | null {
  const markerAt = line.indexOf(PAYLOAD_MARKER);
  if (markerAt === -1) return null;

  const fields = unquote(line.slice(markerAt + PAYLOAD_MARKER.length)).split(';');
  if (fields.length < MIN_FIELD_COUNT) return null;
  if (fields[FIELD.handler].trim() !== HANDLER_TAG) return null;

  const sensorId = fields[FIELD.sensorId].trim().toUpperCase();
  if (sensorId === '') return null;

  return {
    sensorId,
    sp1: fields[FIELD.sp1].trim(),
    sp2: fields[FIELD.sp2].trim(),
    state: fields[fields.length - 2].trim(),
  };
}
