/**
 * MTKClient Manager - Fetch, install, permission setup and verification of mtkclient
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CONFIG, ERROR_MESSAGES } from '../config.js';
import type { HostInfo, MtkCommand, SetupMethod, SetupReport, SetupStatus } from '../types.js';
import { downloadFile, extractZip } from './download.js';
import { MtkResetError, MtkResetErrorCode } from './errors.js';
import { CommandExecutor } from './executor.js';
import { HostDetector } from './host-detector.js';
import * as logger from './logger.js';
import { SystemDeps } from './system-deps.js';

export interface MtkClientPaths {
  installDir: string;
  mtkclientDir: string;
  venvDir: string;
  liveDvdDir: string;
  python: string;
}

export interface AutoSetupOptions {
  skipSystemDeps?: boolean;
}

export function formatCommand(cmd: MtkCommand): string {
  return [cmd.command, ...cmd.args].join(' ');
}

export class MtkClientManager {
  private current: MtkCommand | null = null;
  private verified = false;

  constructor(private readonly paths: MtkClientPaths) {}

  /**
   * The command set by the last setup or verification, if any
   */
  getCommand(): MtkCommand | null {
    return this.current;
  }

  setCommand(cmd: MtkCommand): void {
    this.current = cmd;
    this.verified = false;
  }

  hasCheckout(): boolean {
    return fsSync.existsSync(this.paths.mtkclientDir);
  }

  hasVenv(): boolean {
    return fsSync.existsSync(path.join(this.venvBinDir(), 'activate'));
  }

  venvBinDir(): string {
    return path.join(this.paths.venvDir, process.platform === 'win32' ? 'Scripts' : 'bin');
  }

  venvPython(): string {
    return path.join(this.venvBinDir(), process.platform === 'win32' ? 'python.exe' : 'python');
  }

  /**
   * Directory the mtk command runs in
   */
  workingDir(): string {
    return this.hasCheckout() ? this.paths.mtkclientDir : this.paths.installDir;
  }

  /**
   * Process environment with the virtual environment activated, when one exists
   */
  runtimeEnv(): NodeJS.ProcessEnv {
    if (!this.hasVenv()) {
      return process.env;
    }

    return {
      ...process.env,
      VIRTUAL_ENV: this.paths.venvDir,
      PATH: [this.venvBinDir(), process.env.PATH].filter(Boolean).join(path.delimiter)
    };
  }

  /**
   * Clone the repository, or update an existing checkout
   */
  async fetch(): Promise<string> {
    logger.step('Downloading MTKClient...');

    const hasGit = CommandExecutor.commandExists('git');

    if (this.hasCheckout()) {
      if (!hasGit) {
        logger.warn('git is not available; keeping the existing MTKClient checkout');
        return `Kept existing checkout at ${this.paths.mtkclientDir}`;
      }

      logger.info('MTKClient directory exists, updating...');
      const options = { cwd: this.paths.mtkclientDir, timeout: CONFIG.INSTALL_TIMEOUT, stream: true };
      const main = await CommandExecutor.execute('git', ['pull', 'origin', 'main'], options);
      if (!main.success) {
        await CommandExecutor.executeOrThrow('git', ['pull', 'origin', 'master'], options);
      }
      return `Updated MTKClient at ${this.paths.mtkclientDir}`;
    }

    await fs.mkdir(path.dirname(this.paths.mtkclientDir), { recursive: true });

    if (!hasGit) {
      await this.fetchArchive();
      return `Downloaded MTKClient source archive to ${this.paths.mtkclientDir}`;
    }

    logger.info('Cloning MTKClient repository...');
    await CommandExecutor.executeOrThrow('git', ['clone', CONFIG.MTKCLIENT_REPO, this.paths.mtkclientDir], {
      timeout: CONFIG.INSTALL_TIMEOUT,
      stream: true
    });
    return `Cloned ${CONFIG.MTKCLIENT_REPO} to ${this.paths.mtkclientDir}`;
  }

  /**
   * Download the GitHub source archive when git is not installed
   */
  private async fetchArchive(): Promise<void> {
    logger.warn('git not found, downloading the MTKClient source archive instead');

    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mtkclient-'));
    const zipPath = path.join(tmpDir, 'mtkclient.zip');
    const extractDir = path.join(tmpDir, 'src');

    try {
      await downloadFile(CONFIG.MTKCLIENT_ARCHIVE, zipPath);
      await extractZip(zipPath, extractDir);

      // GitHub archives hold a single top-level directory, e.g. mtkclient-main
      const entries = await fs.readdir(extractDir, { withFileTypes: true });
      const top = entries.find(entry => entry.isDirectory());
      if (!top) {
        throw new MtkResetError(MtkResetErrorCode.SETUP_FAILED, 'MTKClient archive is empty');
      }

      await fs.cp(path.join(extractDir, top.name), this.paths.mtkclientDir, { recursive: true });
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  }

  /**
   * Install mtkclient into a Python virtual environment
   */
  async setupVenv(): Promise<MtkCommand> {
    logger.step('Setting up Python virtual environment...');

    const options = { timeout: CONFIG.INSTALL_TIMEOUT, stream: true };

    if (!fsSync.existsSync(this.paths.venvDir)) {
      await CommandExecutor.executeOrThrow(this.paths.python, ['-m', 'venv', this.paths.venvDir], options);
    }

    const python = this.venvPython();
    await CommandExecutor.executeOrThrow(python, ['-m', 'pip', 'install', '--upgrade', 'pip'], options);

    const inCheckout = { ...options, cwd: this.paths.mtkclientDir };
    await CommandExecutor.executeOrThrow(python, ['-m', 'pip', 'install', '-r', 'requirements.txt'], inCheckout);
    await CommandExecutor.executeOrThrow(python, ['-m', 'pip', 'install', '.'], inCheckout);

    const cmd = { command: python, args: ['-m', 'mtkclient.mtk'] };
    this.setCommand(cmd);
    return cmd;
  }

  /**
   * Install mtkclient into the user site without a virtual environment
   */
  async setupDirect(): Promise<MtkCommand> {
    logger.step('Setting up MTKClient...');

    const options = { cwd: this.paths.mtkclientDir, timeout: CONFIG.INSTALL_TIMEOUT, stream: true };

    const pips: Array<{ pip: string; python: string }> = [
      { pip: 'pip3', python: 'python3' },
      { pip: 'pip', python: 'python' }
    ];

    let cmd: MtkCommand = {
      command: this.paths.python,
      args: [path.join(this.paths.mtkclientDir, 'mtk.py')]
    };

    const available = pips.find(p => CommandExecutor.commandExists(p.pip));
    if (available) {
      await CommandExecutor.executeOrThrow(available.pip, ['install', '--user', '-r', 'requirements.txt'], options);
      await CommandExecutor.executeOrThrow(available.pip, ['install', '--user', '.'], options);
      cmd = { command: available.python, args: ['-m', 'mtkclient.mtk'] };
    } else {
      logger.warn('pip not found, falling back to running mtk.py directly');
    }

    this.setCommand(cmd);
    return cmd;
  }

  /**
   * Group membership, udev rules and driver blacklist for USB access (Linux)
   */
  async setupPermissions(host: HostInfo): Promise<string[]> {
    if (!HostDetector.needsPermissions(host)) {
      return [];
    }

    logger.step('Setting up user permissions...');
    const steps: string[] = [];

    for (const group of ['plugdev', 'dialout']) {
      const done = await this.attempt(`add ${host.username} to ${group}`, () =>
        CommandExecutor.runOrThrow(
          { command: 'usermod', args: ['-a', '-G', group, host.username], elevated: true },
          host.isRoot
        )
      );
      if (done) steps.push(`Added ${host.username} to ${group}`);
    }

    const rulesDir = path.join(this.paths.mtkclientDir, 'mtkclient', 'Setup', 'Linux');
    if (fsSync.existsSync(path.join(rulesDir, '51-edl.rules'))) {
      logger.info('Installing udev rules...');
      const rules = (await fs.readdir(rulesDir))
        .filter(name => name.endsWith('.rules'))
        .sort()
        .map(name => path.join(rulesDir, name));

      const installed = await this.attempt('install udev rules', async () => {
        await CommandExecutor.runOrThrow(
          { command: 'cp', args: [...rules, '/etc/udev/rules.d/'], elevated: true },
          host.isRoot
        );
        await CommandExecutor.runOrThrow({ command: 'udevadm', args: ['control', '-R'], elevated: true }, host.isRoot);
        await CommandExecutor.runOrThrow({ command: 'udevadm', args: ['trigger'], elevated: true }, host.isRoot);
      });
      if (installed) steps.push(`Installed udev rules: ${rules.map(r => path.basename(r)).join(', ')}`);
    }

    if (await this.mediatekDeviceAttached()) {
      const blacklisted = await this.attempt('blacklist qcaux', () =>
        CommandExecutor.runOrThrow(
          { command: 'tee', args: ['-a', '/etc/modprobe.d/blacklist.conf'], elevated: true },
          host.isRoot,
          { input: 'blacklist qcaux\n' }
        )
      );
      if (blacklisted) steps.push('Blacklisted qcaux driver');
    }

    logger.warn('You may need to log out and log back in for group changes to take effect');
    return steps;
  }

  /**
   * Whether lsusb lists a MediaTek (vendor 0e8d) device
   */
  private async mediatekDeviceAttached(): Promise<boolean> {
    try {
      const result = await CommandExecutor.execute('lsusb', []);
      return result.success && /\b(?:0x)?0e8d\b/i.test(result.stdout);
    } catch (error) {
      logger.debug('lsusb unavailable', error instanceof Error ? error.message : String(error));
      return false;
    }
  }

  /**
   * Run a best-effort setup action; failures are logged, not raised
   */
  private async attempt(description: string, fn: () => Promise<unknown>): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (error) {
      logger.warn(`Could not ${description}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  /**
   * Commands to try, in order, when verifying the install
   */
  candidates(): MtkCommand[] {
    const list: MtkCommand[] = [];

    if (this.current) {
      list.push(this.current);
    } else if (this.hasVenv()) {
      list.push({ command: this.venvPython(), args: ['-m', 'mtkclient.mtk'] });
    }

    const script = path.join(this.paths.mtkclientDir, 'mtk.py');
    list.push({ command: this.paths.python, args: [script] });
    list.push({ command: script, args: [] });
    list.push({ command: path.join(this.paths.liveDvdDir, 'mtk'), args: [] });

    const seen = new Set<string>();
    return list.filter(cmd => {
      const key = formatCommand(cmd);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  /**
   * Find the first candidate that answers --help and make it current
   */
  async verify(): Promise<MtkCommand> {
    logger.step('Verifying MTKClient installation...');

    for (const cmd of this.candidates()) {
      try {
        const result = await CommandExecutor.execute(cmd.command, [...cmd.args, '--help'], {
          cwd: this.workingDir(),
          env: this.runtimeEnv()
        });
        if (result.success) {
          this.current = cmd;
          this.verified = true;
          logger.success(`MTKClient is working: ${formatCommand(cmd)}`);
          return cmd;
        }
      } catch (error) {
        logger.debug(`candidate failed: ${formatCommand(cmd)}`, error instanceof Error ? error.message : String(error));
      }
    }

    logger.error('MTKClient installation verification failed');
    throw new MtkResetError(MtkResetErrorCode.VERIFY_FAILED, ERROR_MESSAGES.VERIFY_FAILED, {
      tried: this.candidates().map(formatCommand)
    });
  }

  /**
   * The verified command, verifying first when needed
   */
  async resolve(): Promise<MtkCommand> {
    if (this.current && this.verified) {
      return this.current;
    }
    return this.verify();
  }

  /**
   * Full setup: dependencies, fetch, Python environment, permissions, verification
   */
  async autoSetup(host: HostInfo, options: AutoSetupOptions = {}): Promise<SetupReport> {
    logger.step('Starting automatic setup...');

    const steps: string[] = [];
    let method: SetupMethod;

    if (host.isLiveDvd) {
      logger.success('Running on MTK Live DVD - setup not needed');
      method = 'live-dvd';
      this.setCommand({ command: path.join(this.paths.liveDvdDir, 'mtk'), args: [] });
    } else {
      if (options.skipSystemDeps) {
        logger.info('Skipping system dependency installation');
      } else {
        const deps = await SystemDeps.install(host);
        steps.push(...deps.commands);
        if (deps.manualSteps) {
          steps.push(...deps.manualSteps.map(s => `Manual prerequisite: ${s}`));
        }
      }

      steps.push(await this.fetch());

      method = host.os === 'macos' || !host.isRoot ? 'venv' : 'direct';
      const cmd = method === 'venv' ? await this.setupVenv() : await this.setupDirect();
      steps.push(`Installed MTKClient (${method}): ${formatCommand(cmd)}`);

      steps.push(...await this.setupPermissions(host));
    }

    let verified: MtkCommand;
    try {
      verified = await this.verify();
    } catch (error) {
      logger.error('Setup failed - MTKClient not working properly');
      throw error;
    }

    logger.success('Automatic setup completed successfully!');

    return {
      method,
      mtkCommand: formatCommand(verified),
      mtkclientDir: this.paths.mtkclientDir,
      venvDir: method === 'venv' ? this.paths.venvDir : undefined,
      steps
    };
  }

  status(): SetupStatus {
    return {
      mtkclientInstalled: this.hasCheckout(),
      mtkclientDir: this.paths.mtkclientDir,
      venvPresent: this.hasVenv(),
      venvDir: this.paths.venvDir,
      mtkCommand: this.current ? formatCommand(this.current) : undefined
    };
  }
}

export const mtkClient = new MtkClientManager({
  installDir: CONFIG.INSTALL_DIR,
  mtkclientDir: CONFIG.MTKCLIENT_DIR,
  venvDir: CONFIG.VENV_DIR,
  liveDvdDir: CONFIG.LIVE_DVD_DIR,
  python: CONFIG.PYTHON_PATH
});
