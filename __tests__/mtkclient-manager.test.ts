/**
 * Tests for MtkClientManager
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CONFIG } from '../src/config.js';
import type { CommandResult, HostInfo } from '../src/types.js';
import { MtkResetErrorCode } from '../src/utils/errors.js';
import { CommandExecutor, type ExecuteOptions } from '../src/utils/executor.js';
import { MtkClientManager, formatCommand } from '../src/utils/mtkclient-manager.js';

const ok: CommandResult = { stdout: '', stderr: '', exitCode: 0, success: true };
const failed: CommandResult = { stdout: '', stderr: 'error', exitCode: 1, success: false };

interface Call {
  line: string;
  options: ExecuteOptions | undefined;
}

function host(overrides: Partial<HostInfo> = {}): HostInfo {
  return {
    os: 'ubuntu',
    family: 'apt',
    arch: 'x64',
    username: 'tester',
    isRoot: false,
    isLiveDvd: false,
    ...overrides
  };
}

describe('MtkClientManager', () => {
  let root: string;
  let manager: MtkClientManager;
  let calls: Call[];
  let respond: (line: string) => CommandResult;

  const mtkclientDir = () => path.join(root, 'mtkclient');
  const venvDir = () => path.join(root, 'mtk_venv');
  const liveDvdDir = () => path.join(root, 'live');
  const venvPython = () => path.join(venvDir(), 'bin', 'python');

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'mtk-reset-test-'));
    manager = new MtkClientManager({
      installDir: root,
      mtkclientDir: mtkclientDir(),
      venvDir: venvDir(),
      liveDvdDir: liveDvdDir(),
      python: 'python3'
    });
    calls = [];
    respond = () => ok;

    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    jest.spyOn(CommandExecutor, 'execute').mockImplementation(async (command, args, options) => {
      const line = [command, ...args].join(' ');
      calls.push({ line, options });
      return respond(line);
    });
    jest.spyOn(CommandExecutor, 'commandExists').mockReturnValue(true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('candidates', () => {
    it('should try the checkout script, the script itself, then the Live DVD tool', () => {
      const script = path.join(mtkclientDir(), 'mtk.py');

      expect(manager.candidates().map(formatCommand)).toEqual([
        `python3 ${script}`,
        script,
        path.join(liveDvdDir(), 'mtk')
      ]);
    });

    it('should put the virtual environment first when it exists', () => {
      fs.mkdirSync(path.join(venvDir(), 'bin'), { recursive: true });
      fs.writeFileSync(path.join(venvDir(), 'bin', 'activate'), '');

      expect(formatCommand(manager.candidates()[0])).toBe(`${venvPython()} -m mtkclient.mtk`);
    });

    it('should put the current command first without duplicates', () => {
      const script = path.join(mtkclientDir(), 'mtk.py');
      manager.setCommand({ command: 'python3', args: [script] });

      expect(manager.candidates().map(formatCommand)).toEqual([
        `python3 ${script}`,
        script,
        path.join(liveDvdDir(), 'mtk')
      ]);
    });
  });

  describe('verify', () => {
    it('should settle on the first candidate that answers --help', async () => {
      const script = path.join(mtkclientDir(), 'mtk.py');
      respond = (line) => (line === `${script} --help` ? ok : failed);

      const cmd = await manager.verify();

      expect(formatCommand(cmd)).toBe(script);
      expect(calls.map(c => c.line)).toEqual([`python3 ${script} --help`, `${script} --help`]);
      expect(manager.getCommand()).toEqual(cmd);
    });

    it('should move on when a candidate cannot be spawned', async () => {
      jest.spyOn(CommandExecutor, 'execute').mockImplementation(async (command) => {
        if (command === 'python3') {
          throw new Error('spawn python3 ENOENT');
        }
        return ok;
      });

      const cmd = await manager.verify();

      expect(formatCommand(cmd)).toBe(path.join(mtkclientDir(), 'mtk.py'));
    });

    it('should fail when no candidate works', async () => {
      respond = () => failed;

      await expect(manager.verify()).rejects.toMatchObject({ code: MtkResetErrorCode.VERIFY_FAILED });
    });

    it('should not verify again once resolved', async () => {
      await manager.resolve();
      await manager.resolve();

      expect(calls).toHaveLength(1);
    });
  });

  describe('fetch', () => {
    it('should clone when there is no checkout', async () => {
      await manager.fetch();

      expect(calls.map(c => c.line)).toEqual([`git clone ${CONFIG.MTKCLIENT_REPO} ${mtkclientDir()}`]);
    });

    it('should pull master when main is missing', async () => {
      fs.mkdirSync(mtkclientDir());
      respond = (line) => (line === 'git pull origin main' ? failed : ok);

      await manager.fetch();

      expect(calls.map(c => c.line)).toEqual(['git pull origin main', 'git pull origin master']);
      expect(calls[1].options?.cwd).toBe(mtkclientDir());
    });

    it('should keep an existing checkout when git is missing', async () => {
      fs.mkdirSync(mtkclientDir());
      jest.spyOn(CommandExecutor, 'commandExists').mockReturnValue(false);

      const step = await manager.fetch();

      expect(step).toBe(`Kept existing checkout at ${mtkclientDir()}`);
      expect(calls).toEqual([]);
    });
  });

  describe('setupDirect', () => {
    it('should install with pip3 into the user site', async () => {
      const cmd = await manager.setupDirect();

      expect(calls.map(c => c.line)).toEqual([
        'pip3 install --user -r requirements.txt',
        'pip3 install --user .'
      ]);
      expect(formatCommand(cmd)).toBe('python3 -m mtkclient.mtk');
    });

    it('should fall back to pip with python', async () => {
      jest.spyOn(CommandExecutor, 'commandExists').mockImplementation((name) => name === 'pip');

      const cmd = await manager.setupDirect();

      expect(calls.map(c => c.line)).toEqual(['pip install --user -r requirements.txt', 'pip install --user .']);
      expect(formatCommand(cmd)).toBe('python -m mtkclient.mtk');
    });

    it('should run mtk.py directly without pip', async () => {
      jest.spyOn(CommandExecutor, 'commandExists').mockReturnValue(false);

      const cmd = await manager.setupDirect();

      expect(calls).toEqual([]);
      expect(formatCommand(cmd)).toBe(`python3 ${path.join(mtkclientDir(), 'mtk.py')}`);
    });
  });

  describe('setupPermissions', () => {
    it('should skip hosts that need no permission setup', async () => {
      expect(await manager.setupPermissions(host({ os: 'macos', family: 'brew' }))).toEqual([]);
      expect(calls).toEqual([]);
    });

    it('should add groups, install udev rules and blacklist qcaux', async () => {
      const rulesDir = path.join(mtkclientDir(), 'mtkclient', 'Setup', 'Linux');
      fs.mkdirSync(rulesDir, { recursive: true });
      fs.writeFileSync(path.join(rulesDir, '50-android.rules'), '');
      fs.writeFileSync(path.join(rulesDir, '51-edl.rules'), '');
      fs.writeFileSync(path.join(rulesDir, 'README.md'), '');
      respond = (line) => (line === 'lsusb' ? { ...ok, stdout: 'Bus 001 Device 004: ID 0e8d:0003 MediaTek Inc.' } : ok);

      const steps = await manager.setupPermissions(host());

      expect(calls.map(c => c.line)).toEqual([
        'sudo -n usermod -a -G plugdev tester',
        'sudo -n usermod -a -G dialout tester',
        `sudo -n cp ${path.join(rulesDir, '50-android.rules')} ${path.join(rulesDir, '51-edl.rules')} /etc/udev/rules.d/`,
        'sudo -n udevadm control -R',
        'sudo -n udevadm trigger',
        'lsusb',
        'sudo -n tee -a /etc/modprobe.d/blacklist.conf'
      ]);
      expect(calls[6].options?.input).toBe('blacklist qcaux\n');
      expect(steps).toEqual([
        'Added tester to plugdev',
        'Added tester to dialout',
        'Installed udev rules: 50-android.rules, 51-edl.rules',
        'Blacklisted qcaux driver'
      ]);
    });

    it('should match the MediaTek vendor id in any case', async () => {
      respond = (line) => (line === 'lsusb' ? { ...ok, stdout: 'Bus 003 Device 007: ID 0E8D:2000 MediaTek Preloader' } : ok);

      const steps = await manager.setupPermissions(host());

      expect(calls.map(c => c.line).slice(-2)).toEqual([
        'lsusb',
        'sudo -n tee -a /etc/modprobe.d/blacklist.conf'
      ]);
      expect(steps).toContain('Blacklisted qcaux driver');
    });

    it('should leave qcaux alone when no MediaTek device is listed', async () => {
      respond = (line) => (line === 'lsusb' ? { ...ok, stdout: 'Bus 001 Device 002: ID 18d1:4ee7 Google Inc.' } : ok);

      const steps = await manager.setupPermissions(host());

      expect(calls.map(c => c.line)).toEqual([
        'sudo -n usermod -a -G plugdev tester',
        'sudo -n usermod -a -G dialout tester',
        'lsusb'
      ]);
      expect(steps).toEqual(['Added tester to plugdev', 'Added tester to dialout']);
    });

    it('should carry on when a group cannot be added', async () => {
      respond = (line) => (line.includes('plugdev') ? failed : ok);

      const steps = await manager.setupPermissions(host({ os: 'arch', family: 'pacman' }));

      expect(steps).toEqual(['Added tester to dialout']);
    });
  });

  describe('autoSetup', () => {
    it('should use the Live DVD tool without installing anything', async () => {
      const report = await manager.autoSetup(host({ isLiveDvd: true }));

      expect(report.method).toBe('live-dvd');
      expect(report.mtkCommand).toBe(path.join(liveDvdDir(), 'mtk'));
      expect(report.steps).toEqual([]);
      expect(calls.map(c => c.line)).toEqual([`${path.join(liveDvdDir(), 'mtk')} --help`]);
    });

    it('should set up a virtual environment for a regular user', async () => {
      const report = await manager.autoSetup(host(), { skipSystemDeps: true });

      expect(calls.map(c => c.line)).toEqual([
        `git clone ${CONFIG.MTKCLIENT_REPO} ${mtkclientDir()}`,
        `python3 -m venv ${venvDir()}`,
        `${venvPython()} -m pip install --upgrade pip`,
        `${venvPython()} -m pip install -r requirements.txt`,
        `${venvPython()} -m pip install .`,
        'sudo -n usermod -a -G plugdev tester',
        'sudo -n usermod -a -G dialout tester',
        'lsusb',
        `${venvPython()} -m mtkclient.mtk --help`
      ]);
      expect(calls[3].options?.cwd).toBe(mtkclientDir());
      expect(report.method).toBe('venv');
      expect(report.venvDir).toBe(venvDir());
      expect(report.mtkCommand).toBe(`${venvPython()} -m mtkclient.mtk`);
    });

    it('should install directly when running as root', async () => {
      const report = await manager.autoSetup(host({ os: 'gentoo', family: 'unsupported', isRoot: true }), {
        skipSystemDeps: true
      });

      expect(report.method).toBe('direct');
      expect(report.venvDir).toBeUndefined();
      expect(report.mtkCommand).toBe('python3 -m mtkclient.mtk');
    });

    it('should use a virtual environment on macOS even as root', async () => {
      const report = await manager.autoSetup(host({ os: 'macos', family: 'brew', isRoot: true }), {
        skipSystemDeps: true
      });

      expect(report.method).toBe('venv');
    });

    it('should fail when the install does not verify', async () => {
      respond = (line) => (line.endsWith('--help') ? failed : ok);

      await expect(manager.autoSetup(host(), { skipSystemDeps: true })).rejects.toMatchObject({
        code: MtkResetErrorCode.VERIFY_FAILED
      });
    });
  });

  describe('runtime', () => {
    it('should activate the virtual environment when it exists', () => {
      fs.mkdirSync(path.join(venvDir(), 'bin'), { recursive: true });
      fs.writeFileSync(path.join(venvDir(), 'bin', 'activate'), '');

      const env = manager.runtimeEnv();

      expect(env.VIRTUAL_ENV).toBe(venvDir());
      expect(env.PATH?.split(path.delimiter)[0]).toBe(path.join(venvDir(), 'bin'));
    });

    it('should run in the checkout when present, else the install root', () => {
      expect(manager.workingDir()).toBe(root);
      fs.mkdirSync(mtkclientDir());
      expect(manager.workingDir()).toBe(mtkclientDir());
    });

    it('should report setup status', () => {
      expect(manager.status()).toEqual({
        mtkclientInstalled: false,
        mtkclientDir: mtkclientDir(),
        venvPresent: false,
        venvDir: venvDir(),
        mtkCommand: undefined
      });
    });
  });
});
