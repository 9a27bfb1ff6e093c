/**
 * Partition erase through the mtk command line, and the full reset sequence
 */

import { CONFIG, ERROR_MESSAGES } from '../config.js';
import type { EraseResult, HostInfo, SetupReport } from '../types.js';
import { ConnectivityChecker } from './connectivity.js';
import { MtkResetError, MtkResetErrorCode } from './errors.js';
import { CommandExecutor } from './executor.js';
import { HostDetector } from './host-detector.js';
import * as logger from './logger.js';
import { MtkClientManager, formatCommand } from './mtkclient-manager.js';
import { SafetyValidator } from './validator.js';

export interface FactoryResetOptions {
  partition?: string;
  skipSetup?: boolean;
  skipSystemDeps?: boolean;
}

export interface FactoryResetResult {
  host: HostInfo;
  setup?: SetupReport;
  erase: EraseResult;
}

function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  return seconds >= 60 ? `${Math.floor(seconds / 60)}m ${seconds % 60}s` : `${seconds}s`;
}

export class ResetRunner {
  constructor(
    private readonly manager: MtkClientManager,
    private readonly detectHost: () => HostInfo = () => HostDetector.detect()
  ) {}

  /**
   * Run `mtk e <partition>`; the tool itself waits for the device to connect
   */
  async erase(requested: string = CONFIG.DEFAULT_PARTITION): Promise<EraseResult> {
    const partition = SafetyValidator.validatePartitionName(requested);
    const cmd = await this.manager.resolve();

    logger.step('Starting factory reset process...');
    logger.info('Waiting for device connection...');
    logger.warn('PLUG IN YOUR DEVICE NOW! The tool prints dots while it waits.');

    const args = [...cmd.args, 'e', partition];
    const printable = [cmd.command, ...args].join(' ');
    logger.info(`Executing: ${printable}`);

    const started = Date.now();
    const result = await CommandExecutor.execute(cmd.command, args, {
      cwd: this.manager.workingDir(),
      env: this.manager.runtimeEnv(),
      timeout: CONFIG.ERASE_TIMEOUT,
      stream: true
    });

    if (!result.success) {
      logger.error(`Failed to erase ${partition} partition`);
      throw new MtkResetError(MtkResetErrorCode.ERASE_FAILED, ERROR_MESSAGES.ERASE_FAILED(partition), {
        command: printable,
        exitCode: result.exitCode,
        stderr: result.stderr
      });
    }

    logger.success(`${partition} partition erased successfully!`);

    return {
      partition,
      command: printable,
      duration: formatDuration(Date.now() - started),
      output: result.stdout
    };
  }

  /**
   * Detect, check connectivity, set up, then erase
   */
  async factoryReset(options: FactoryResetOptions = {}): Promise<FactoryResetResult> {
    const host = this.detectHost();
    if (host.isLiveDvd) {
      logger.success('MTK Live DVD environment detected');
    }
    logger.info(`Detected OS: ${host.os}`);

    let setup: SetupReport | undefined;
    if (options.skipSetup) {
      logger.info(`Skipping setup, using ${this.describeCommand()}`);
    } else {
      if (!host.isLiveDvd) {
        await ConnectivityChecker.check();
      }
      setup = await this.manager.autoSetup(host, { skipSystemDeps: options.skipSystemDeps });
    }

    const erase = await this.erase(options.partition);
    return { host, setup, erase };
  }

  private describeCommand(): string {
    const cmd = this.manager.getCommand();
    return cmd ? formatCommand(cmd) : 'the first working mtk command';
  }
}
