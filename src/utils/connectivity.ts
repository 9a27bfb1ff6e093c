/**
 * Internet connectivity check before automatic setup
 */

import * as https from 'https';
import { CONFIG, ERROR_MESSAGES } from '../config.js';
import { MtkResetError, MtkResetErrorCode } from './errors.js';
import * as logger from './logger.js';

export class ConnectivityChecker {
  /**
   * Resolve when the URL answers at all, with any status
   */
  static async check(
    url: string = CONFIG.CONNECTIVITY_URL,
    timeout: number = CONFIG.CONNECTIVITY_TIMEOUT
  ): Promise<void> {
    logger.step('Checking internet connectivity...');

    try {
      const status = await this.probe(url, timeout);
      logger.debug(`connectivity probe answered HTTP ${status}`);
    } catch (error) {
      logger.error(ERROR_MESSAGES.NO_INTERNET);
      throw new MtkResetError(MtkResetErrorCode.NO_INTERNET, ERROR_MESSAGES.NO_INTERNET, {
        url,
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    logger.success('Internet connection verified');
  }

  /**
   * HEAD request resolving with the status code
   */
  static probe(url: string, timeout: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const request = https.request(url, { method: 'HEAD' }, (response) => {
        response.resume();
        resolve(response.statusCode ?? 0);
      });

      request.on('error', reject);
      request.setTimeout(timeout, () => {
        request.destroy(new Error(`Connection timed out after ${timeout}ms`));
      });
      request.end();
    });
  }
}
