/**
 * Safety validation utility for destructive operations
 */

import { CONFIG, ERROR_MESSAGES } from '../config.js';
import { MtkResetError, MtkResetErrorCode } from './errors.js';

const ERASABLE_PARTITIONS: readonly string[] = CONFIG.ERASABLE_PARTITIONS;
const DESTRUCTIVE_OPERATIONS: readonly string[] = CONFIG.DESTRUCTIVE_OPERATIONS;

function invalid(message: string): MtkResetError {
  return new MtkResetError(MtkResetErrorCode.INVALID_CONFIRMATION, message);
}

export class SafetyValidator {
  /**
   * Validate confirmation token for destructive operations
   */
  static validateConfirmationToken(
    operation: string,
    providedToken: string | undefined,
    now: number = Date.now()
  ): void {
    if (!providedToken) {
      throw invalid(ERROR_MESSAGES.INVALID_CONFIRMATION(operation));
    }

    // Expected format: CONFIRM_<OPERATION>_<timestamp>
    const expectedPrefix = `CONFIRM_${operation.toUpperCase()}_`;

    if (!providedToken.startsWith(expectedPrefix)) {
      throw invalid(
        ERROR_MESSAGES.INVALID_CONFIRMATION(operation) +
        `\n\nExpected format: ${expectedPrefix}<timestamp>\nExample: ${expectedPrefix}${now}`
      );
    }

    const timestampStr = providedToken.slice(expectedPrefix.length);
    const timestamp = /^\d+$/.test(timestampStr) ? parseInt(timestampStr, 10) : NaN;

    if (isNaN(timestamp)) {
      throw invalid(`Invalid confirmation token timestamp: ${timestampStr}`);
    }

    const age = now - timestamp;

    if (age < 0) {
      throw invalid('Confirmation token timestamp is in the future. Check system clock.');
    }

    if (age > CONFIG.TOKEN_EXPIRY) {
      throw invalid(
        `Confirmation token expired (${Math.round(age / 1000)}s old, max ${CONFIG.TOKEN_EXPIRY / 1000}s). Generate a new token: ${expectedPrefix}${now}`
      );
    }
  }

  /**
   * Generate confirmation token for destructive operation
   */
  static generateConfirmationToken(operation: string, now: number = Date.now()): string {
    return `CONFIRM_${operation.toUpperCase()}_${now}`;
  }

  /**
   * Check if operation is destructive
   */
  static isDestructive(operation: string): boolean {
    return DESTRUCTIVE_OPERATIONS.includes(operation);
  }

  static isErasablePartition(partition: string): boolean {
    return ERASABLE_PARTITIONS.includes(partition.trim().toLowerCase());
  }

  /**
   * Validate a partition name against the partitions a reset may erase
   */
  static validatePartitionName(partition: string): string {
    const lowerPartition = partition.trim().toLowerCase();
    if (!this.isErasablePartition(partition)) {
      throw new Error(
        `Invalid partition name: ${partition}. ` +
        `Erasable partitions: ${ERASABLE_PARTITIONS.join(', ')}`
      );
    }

    return lowerPartition;
  }
}
