/**
 * Tests for CommandExecutor
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CommandResult } from '../src/types.js';
import { MtkResetErrorCode } from '../src/utils/errors.js';
import { CommandExecutor, formatSpec } from '../src/utils/executor.js';

const ok: CommandResult = { stdout: '', stderr: '', exitCode: 0, success: true };

describe('CommandExecutor', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('commandExists', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mtk-reset-path-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should find executables on PATH', () => {
      const tool = path.join(dir, 'fake-git');
      fs.writeFileSync(tool, '#!/bin/sh\n');
      fs.chmodSync(tool, 0o755);

      expect(CommandExecutor.commandExists('fake-git', { PATH: dir })).toBe(true);
      expect(CommandExecutor.commandExists('fake-pip', { PATH: dir })).toBe(false);
    });

    it('should report nothing with an empty PATH', () => {
      expect(CommandExecutor.commandExists('git', {})).toBe(false);
    });
  });

  describe('run', () => {
    it('should prefix non-interactive sudo for elevated commands', async () => {
      const execute = jest.spyOn(CommandExecutor, 'execute').mockResolvedValue(ok);

      await CommandExecutor.run({ command: 'apt', args: ['update'], elevated: true }, false);

      expect(execute).toHaveBeenCalledWith('sudo', ['-n', 'apt', 'update'], {});
    });

    it('should run elevated commands directly as root', async () => {
      const execute = jest.spyOn(CommandExecutor, 'execute').mockResolvedValue(ok);

      await CommandExecutor.run({ command: 'apt', args: ['update'], elevated: true }, true);

      expect(execute).toHaveBeenCalledWith('apt', ['update'], {});
    });

    it('should raise SUDO_REQUIRED when sudo wants a password', async () => {
      jest.spyOn(CommandExecutor, 'execute').mockResolvedValue({
        stdout: '',
        stderr: 'sudo: a terminal is required to read the password',
        exitCode: 1,
        success: false
      });

      await expect(
        CommandExecutor.run({ command: 'udevadm', args: ['trigger'], elevated: true }, false)
      ).rejects.toMatchObject({ code: MtkResetErrorCode.SUDO_REQUIRED });
    });
  });

  describe('executeOrThrow', () => {
    it('should turn a non-zero exit into COMMAND_FAILED', async () => {
      jest.spyOn(CommandExecutor, 'execute').mockResolvedValue({
        stdout: '',
        stderr: 'boom',
        exitCode: 1,
        success: false
      });

      await expect(CommandExecutor.executeOrThrow('git', ['pull'])).rejects.toMatchObject({
        code: MtkResetErrorCode.COMMAND_FAILED,
        message: 'Command failed: git pull\nExit code: 1\nError: boom'
      });
    });
  });

  describe('execute', () => {
    it('should settle on the exit code when the child ignores its input', async () => {
      jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

      const result = await CommandExecutor.execute(process.execPath, ['-e', 'process.exit(3)'], {
        input: 'x'.repeat(1 << 20)
      });

      expect(result).toEqual({ stdout: '', stderr: '', exitCode: 3, success: false });
    });
  });

  describe('formatSpec', () => {
    it('should show sudo for elevated specs', () => {
      expect(formatSpec({ command: 'dnf', args: ['install', '-y', 'git'], elevated: true })).toBe('sudo dnf install -y git');
      expect(formatSpec({ command: 'brew', args: ['install', 'git'] })).toBe('brew install git');
    });
  });

  describe('killAll', () => {
    it('should report zero when nothing is running', () => {
      expect(CommandExecutor.killAll()).toBe(0);
    });
  });
});
