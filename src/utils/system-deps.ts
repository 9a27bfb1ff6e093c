/**
 * OS package installation ahead of the mtkclient setup
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { CONFIG, ERROR_MESSAGES } from '../config.js';
import { MANUAL_DEPENDENCIES, WINDOWS_PREREQUISITES } from '../guidance.js';
import type { CommandSpec, DependencyReport, HostInfo, PackageFamily } from '../types.js';
import { downloadFile } from './download.js';
import { MtkResetError, MtkResetErrorCode } from './errors.js';
import { CommandExecutor, formatSpec } from './executor.js';
import * as logger from './logger.js';

const PACKAGES: Record<'apt' | 'pacman' | 'dnf' | 'brew', string[]> = {
  apt: ['python3', 'python3-pip', 'python3-venv', 'git', 'libusb-1.0-0', 'libfuse2', 'curl', 'wget', 'build-essential'],
  pacman: ['python', 'python-pip', 'python-pipenv', 'git', 'libusb', 'fuse2', 'curl', 'wget', 'base-devel'],
  dnf: ['python3', 'python3-pip', 'git', 'libusb1', 'fuse', 'curl', 'wget', 'gcc', 'gcc-c++', 'make'],
  brew: ['macfuse', 'openssl', 'python@3.9', 'git']
};

export class SystemDeps {
  /**
   * Package-manager commands for a package family, in order
   */
  static plan(family: PackageFamily): CommandSpec[] {
    switch (family) {
      case 'apt':
        return [
          { command: 'apt', args: ['update'], elevated: true },
          { command: 'apt', args: ['install', '-y', ...PACKAGES.apt], elevated: true }
        ];
      case 'pacman':
        return [{ command: 'pacman', args: ['-S', '--noconfirm', ...PACKAGES.pacman], elevated: true }];
      case 'dnf':
        return [{ command: 'dnf', args: ['install', '-y', ...PACKAGES.dnf], elevated: true }];
      case 'brew':
        return [{ command: 'brew', args: ['install', ...PACKAGES.brew] }];
      default:
        return [];
    }
  }

  /**
   * Install system dependencies for the detected host
   */
  static async install(host: HostInfo): Promise<DependencyReport> {
    logger.step('Installing system dependencies...');

    if (host.family === 'unsupported') {
      logger.error(`Unsupported operating system: ${host.os}`);
      throw new MtkResetError(MtkResetErrorCode.UNSUPPORTED_OS, ERROR_MESSAGES.UNSUPPORTED_OS(host.os), {
        manualDependencies: MANUAL_DEPENDENCIES
      });
    }

    if (host.family === 'manual') {
      logger.warn('Windows detected. The prerequisites must be installed manually.');
      return {
        os: host.os,
        family: host.family,
        commands: [],
        manualSteps: WINDOWS_PREREQUISITES
      };
    }

    if (host.family === 'brew' && !CommandExecutor.commandExists('brew')) {
      await this.installHomebrew();
    }

    const specs = this.plan(host.family);
    logger.info(`Installing dependencies for ${host.os} with ${host.family}...`);

    for (const spec of specs) {
      await CommandExecutor.runOrThrow(spec, host.isRoot, {
        timeout: CONFIG.INSTALL_TIMEOUT,
        stream: true
      });
    }

    logger.success('System dependencies installed');

    return {
      os: host.os,
      family: host.family,
      commands: specs.map(formatSpec)
    };
  }

  /**
   * Download the Homebrew installer and run it non-interactively
   */
  private static async installHomebrew(): Promise<void> {
    logger.info('Installing Homebrew...');

    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mtk-reset-brew-'));
    const script = path.join(tmpDir, 'install.sh');

    try {
      await downloadFile(CONFIG.HOMEBREW_INSTALLER, script);
      await CommandExecutor.executeOrThrow('/bin/bash', [script], {
        timeout: CONFIG.INSTALL_TIMEOUT,
        env: { ...process.env, NONINTERACTIVE: '1' },
        stream: true
      });
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  }
}
