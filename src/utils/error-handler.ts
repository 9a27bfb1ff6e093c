/**
 * Error handling utility with actionable error messages
 */

import { ZodError } from 'zod';
import { MANUAL_DEPENDENCIES, TROUBLESHOOTING, WINDOWS_PREREQUISITES } from '../guidance.js';
import { MtkResetError, MtkResetErrorCode } from './errors.js';
import { ResponseFormatter } from './formatter.js';

export class ErrorHandler {
  /**
   * Handle and format errors with suggestions
   */
  static handle(error: unknown): string {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return ResponseFormatter.error(`Invalid arguments: ${issues}`, 'Check the tool input schema');
    }

    if (error instanceof MtkResetError) {
      return this.handleMtkResetError(error);
    }

    if (error instanceof Error) {
      return this.handleError(error);
    }

    return ResponseFormatter.error(
      'An unknown error occurred',
      'Check logs for details'
    );
  }

  private static handleMtkResetError(error: MtkResetError): string {
    switch (error.code) {
      case MtkResetErrorCode.UNSUPPORTED_OS:
        return ResponseFormatter.error(
          error.message,
          `Install dependencies manually: ${MANUAL_DEPENDENCIES.join(', ')}`
        );

      case MtkResetErrorCode.NO_INTERNET:
        return ResponseFormatter.error(
          error.message,
          'Connect to the internet and try again, or use the MTK Live DVD which needs no setup'
        );

      case MtkResetErrorCode.SUDO_REQUIRED:
        return ResponseFormatter.error(
          error.message,
          'Package installation and udev setup need root. Cache sudo credentials with "sudo -v" before starting the server'
        );

      case MtkResetErrorCode.COMMAND_NOT_FOUND:
      case MtkResetErrorCode.COMMAND_FAILED:
      case MtkResetErrorCode.SETUP_FAILED:
      case MtkResetErrorCode.VERIFY_FAILED:
        return ResponseFormatter.error(
          error.message,
          TROUBLESHOOTING.setup.join('. ') +
          (process.platform === 'win32' ? `. Windows prerequisites: ${WINDOWS_PREREQUISITES.join(', ')}` : '')
        );

      case MtkResetErrorCode.ERASE_FAILED:
        return ResponseFormatter.error(
          error.message,
          TROUBLESHOOTING.device.join('. ') +
          (process.platform === 'win32' ? '. ' + TROUBLESHOOTING.windows.join('. ') : '') +
          '. See get_troubleshooting() for more help'
        );

      case MtkResetErrorCode.INVALID_CONFIRMATION:
        return ResponseFormatter.error(
          error.message,
          'For destructive operations, you must provide a valid confirmation token to prevent accidental data loss'
        );

      case MtkResetErrorCode.TIMEOUT:
        return ResponseFormatter.error(
          error.message,
          'The operation took too long. Check the device connection, or raise ERASE_TIMEOUT / INSTALL_TIMEOUT'
        );
    }
  }

  /**
   * Handle Error objects
   */
  private static handleError(error: Error): string {
    const message = error.message;

    if (message.includes('partition')) {
      return ResponseFormatter.error(
        message,
        'Use the default userdata partition for a factory reset'
      );
    }

    if (message.toLowerCase().includes('permission denied') || message.includes('EACCES')) {
      return ResponseFormatter.error(
        message,
        'Check file permissions of the install directory, or set MTK_RESET_HOME to a writable location'
      );
    }

    // Generic error
    return ResponseFormatter.error(message);
  }

  /**
   * Wrap async function with error handling
   */
  static async wrap<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new Error(this.handle(error));
    }
  }
}
