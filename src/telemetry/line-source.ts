/**
 * Log Line Source
 *
 * Streams lines from a log file. The existence check happens up front so
 * a bad path surfaces before any line reaches the parser.
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { LogEncoding } from '../config-schema';

export function readLogLines(filePath: string, encoding: LogEncoding = 'utf-8'): AsyncIterable<string> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`[Source] Log file not found: ${filePath}`);
  }
  if (!fs.statSync(filePath).isFile()) {
    throw new Error(`[Source] Not a regular file: ${filePath}`);
  }

  // readline strips both \n and \r\n line endings
  return readline.createInterface({
    input: fs.createReadStream(filePath, { encoding }),
    crlfDelay: Infinity,
  });
}
