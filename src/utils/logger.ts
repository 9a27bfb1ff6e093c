/**
 * Stderr logger. Stdout is reserved for the MCP transport.
 */

import * as fs from 'fs';

const debugEnabled = !!process.env['MTK_RESET_DEBUG'];
let logFile = process.env['MTK_RESET_LOG_FILE'];

/**
 * Mirror log lines to a file, or stop mirroring with undefined
 */
export function setLogFile(file: string | undefined): void {
  logFile = file;
}

function write(line: string): void {
  process.stderr.write(line + '\n');
  if (!logFile) return;

  try {
    fs.appendFileSync(logFile, `${new Date().toISOString()} ${line}\n`);
  } catch (err) {
    const failed = logFile;
    logFile = undefined;
    const reason = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[WARNING] Log file disabled, cannot write ${failed}: ${reason}\n`);
  }
}

export function debug(message: string, data?: unknown): void {
  if (!debugEnabled) return;
  write(`[DEBUG] ${message}${data !== undefined ? ' ' + JSON.stringify(data) : ''}`);
}

export function info(message: string): void {
  write(`[INFO] ${message}`);
}

export function step(message: string): void {
  write(`[STEP] ${message}`);
}

export function success(message: string): void {
  write(`[SUCCESS] ${message}`);
}

export function warn(message: string): void {
  write(`[WARNING] ${message}`);
}

export function error(message: string): void {
  write(`[ERROR] ${message}`);
}
