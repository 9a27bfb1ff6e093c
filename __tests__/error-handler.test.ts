/**
 * Tests for ErrorHandler
 */

import { z } from 'zod';
import { ERROR_MESSAGES } from '../src/config.js';
import { ErrorHandler } from '../src/utils/error-handler.js';
import { MtkResetError, MtkResetErrorCode } from '../src/utils/errors.js';

describe('ErrorHandler', () => {
  describe('handle', () => {
    it('should suggest the Live DVD when offline', () => {
      const message = ErrorHandler.handle(
        new MtkResetError(MtkResetErrorCode.NO_INTERNET, ERROR_MESSAGES.NO_INTERNET)
      );

      expect(message).toBe(
        '❌ **Error**: No internet connection detected. Internet is required for automatic setup.\n\n' +
        '💡 **Suggestion**: Connect to the internet and try again, or use the MTK Live DVD which needs no setup'
      );
    });

    it('should list manual dependencies for unsupported hosts', () => {
      const message = ErrorHandler.handle(
        new MtkResetError(MtkResetErrorCode.UNSUPPORTED_OS, ERROR_MESSAGES.UNSUPPORTED_OS('gentoo'))
      );

      expect(message).toContain('💡 **Suggestion**: Install dependencies manually: Python 3.8+, pip, git, libusb, fuse');
    });

    it('should give device troubleshooting when the erase fails', () => {
      const message = ErrorHandler.handle(
        new MtkResetError(MtkResetErrorCode.ERASE_FAILED, ERROR_MESSAGES.ERASE_FAILED('userdata'))
      );

      expect(message.startsWith('❌ **Error**: Failed to erase userdata partition\n\n')).toBe(true);
      expect(message).toContain('Try a different USB cable or port');
      expect(message).toContain('See get_troubleshooting() for more help');
    });

    it('should list zod issues per field', () => {
      const parsed = z.object({ confirm_token: z.string() }).safeParse({});
      expect(parsed.success).toBe(false);
      if (parsed.success) return;

      expect(ErrorHandler.handle(parsed.error)).toBe(
        '❌ **Error**: Invalid arguments: confirm_token: Required\n\n💡 **Suggestion**: Check the tool input schema'
      );
    });

    it('should format plain errors without a suggestion', () => {
      expect(ErrorHandler.handle(new Error('boom'))).toBe('❌ **Error**: boom\n\n');
    });

    it('should handle non-Error values', () => {
      expect(ErrorHandler.handle('nope')).toBe(
        '❌ **Error**: An unknown error occurred\n\n💡 **Suggestion**: Check logs for details'
      );
    });
  });

  describe('wrap', () => {
    it('should pass results through', async () => {
      await expect(ErrorHandler.wrap(async () => 42)).resolves.toBe(42);
    });

    it('should rethrow with the formatted message', async () => {
      await expect(ErrorHandler.wrap(async () => {
        throw new Error('boom');
      })).rejects.toThrow('❌ **Error**: boom');
    });
  });
});
