/**
 * Fault Decoder
 *
 * Names the dominant fault of a failed sensor from its two status packs.
 *
 * The packs are folded into six decimal digits, read as three byte-sized
 * flag groups. Bit 3 (0x08, index 4 of the 8-bit string) of each group is
 * that group's fault flag. Groups are checked in priority order and only
 * the first set flag is reported.
 */

import { FaultReason } from './types';

const PACKED_WIDTH = 6;
const FAULT_FLAG = 1 << 3;

/** Priority order: group 1 outranks group 2 outranks group 3 */
const FLAG_GROUPS: ReadonlyArray<FaultReason> = ['battery', 'temperature', 'threshold'];

export const FAULT_MESSAGES: Record<FaultReason, string> = {
  battery: 'Battery device error',
  temperature: 'Temperature device error',
  threshold: 'Threshold central error',
  unknown: 'Unknown device error',
};

export function describeFault(reason: FaultReason): string {
  return FAULT_MESSAGES[reason];
}

/**
 * Fold the packs into the six-digit field: sp1 loses its trailing
 * checksum character, sp2 its leading minus signs.
 */
export function packStatus(sp1: string, sp2: string): string {
  const combined = sp1.slice(0, -1) + sp2.replace(/^-+/, '');
  return combined.padStart(PACKED_WIDTH, '0').slice(0, PACKED_WIDTH);
}

/** Parse a two-digit group; null for anything else */
function parseGroup(pair: string): number | null {
  return /^\d{2}$/.test(pair) ? parseInt(pair, 10) : null;
}

export function decodeFault(sp1: string, sp2: string): FaultReason {
  if (sp1 === '' || sp2 === '') return 'unknown';

  const packed = packStatus(sp1, sp2);
  const groups: number[] = [];
  for (let i = 0; i < PACKED_WIDTH; i += 2) {
    const value = parseGroup(packed.slice(i, i + 2));
    // Malformed packs decode as unknown rather than failing the run
    if (value === null) return 'unknown';
    groups.push(value);
  }

  const hit = FLAG_GROUPS.findIndex((_, i) => (groups[i] & FAULT_FLAG) !== 0);
  return hit === -1 ? 'unknown' : FLAG_GROUPS[hit];
}
