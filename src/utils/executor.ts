/**
 * Command execution utility for package managers, git, Python and mtk
 */

import { spawn, type ChildProcess } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { CONFIG, ERROR_MESSAGES } from '../config.js';
import type { CommandResult, CommandSpec } from '../types.js';
import { MtkResetError, MtkResetErrorCode } from './errors.js';
import * as logger from './logger.js';

export interface ExecuteOptions {
  timeout?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  input?: string;
  /** Forward output to the log line by line as it arrives */
  stream?: boolean;
}

export class CommandExecutor {
  private static active: Set<ChildProcess> = new Set();

  /**
   * Execute a command with timeout and error handling
   */
  static async execute(
    command: string,
    args: string[],
    options: ExecuteOptions = {}
  ): Promise<CommandResult> {
    const timeout = options.timeout || CONFIG.COMMAND_TIMEOUT;
    const printable = [command, ...args].join(' ');
    logger.debug(`exec: ${printable}`, { cwd: options.cwd });

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let isResolved = false;

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env || process.env,
        stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe']
      });
      this.active.add(child);

      const settle = (): boolean => {
        if (isResolved) return false;
        isResolved = true;
        clearTimeout(timeoutId);
        this.active.delete(child);
        return true;
      };

      const timeoutId = setTimeout(() => {
        if (settle()) {
          child.kill('SIGTERM');
          reject(new MtkResetError(
            MtkResetErrorCode.TIMEOUT,
            `Command timed out after ${timeout}ms: ${printable}`
          ));
        }
      }, timeout);

      const outLines = options.stream ? new LineForwarder() : null;
      const errLines = options.stream ? new LineForwarder() : null;

      child.stdout?.on('data', (data: Buffer) => {
        const text = data.toString();
        stdout += text;
        outLines?.push(text);
      });

      child.stderr?.on('data', (data: Buffer) => {
        const text = data.toString();
        stderr += text;
        errLines?.push(text);
      });

      if (options.input !== undefined && child.stdin) {
        // The exit code settles the result when the child stops reading early
        child.stdin.on('error', (error) => {
          logger.debug(`stdin closed early: ${printable}`, error.message);
        });
        child.stdin.end(options.input);
      }

      child.on('close', (exitCode) => {
        outLines?.flush();
        errLines?.flush();
        if (settle()) {
          resolve({
            stdout: stdout.trim(),
            stderr: stderr.trim(),
            exitCode: exitCode ?? 1,
            success: exitCode === 0
          });
        }
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (!settle()) return;

        if (error.code === 'ENOENT') {
          reject(new MtkResetError(
            MtkResetErrorCode.COMMAND_NOT_FOUND,
            ERROR_MESSAGES.COMMAND_NOT_FOUND(command),
            { command }
          ));
          return;
        }
        reject(error);
      });
    });
  }

  /**
   * Execute a command and throw when it exits non-zero
   */
  static async executeOrThrow(
    command: string,
    args: string[],
    options: ExecuteOptions = {}
  ): Promise<CommandResult> {
    const result = await this.execute(command, args, options);

    if (!result.success) {
      throw new MtkResetError(
        MtkResetErrorCode.COMMAND_FAILED,
        ERROR_MESSAGES.COMMAND_FAILED([command, ...args].join(' '), result.stderr, result.exitCode),
        { stdout: result.stdout, stderr: result.stderr }
      );
    }

    return result;
  }

  /**
   * Run a command spec, prefixing non-interactive sudo when elevation is
   * required and the process is not already root
   */
  static async run(
    spec: CommandSpec,
    isRoot: boolean,
    options: ExecuteOptions = {}
  ): Promise<CommandResult> {
    if (!spec.elevated || isRoot) {
      return this.execute(spec.command, spec.args, options);
    }

    const result = await this.execute('sudo', ['-n', spec.command, ...spec.args], options);

    if (!result.success && /password is required|a terminal is required/i.test(result.stderr)) {
      throw new MtkResetError(
        MtkResetErrorCode.SUDO_REQUIRED,
        ERROR_MESSAGES.SUDO_REQUIRED(formatSpec(spec)),
        { stderr: result.stderr }
      );
    }

    return result;
  }

  /**
   * Run a command spec and throw when it exits non-zero
   */
  static async runOrThrow(
    spec: CommandSpec,
    isRoot: boolean,
    options: ExecuteOptions = {}
  ): Promise<CommandResult> {
    const result = await this.run(spec, isRoot, options);

    if (!result.success) {
      throw new MtkResetError(
        MtkResetErrorCode.COMMAND_FAILED,
        ERROR_MESSAGES.COMMAND_FAILED(formatSpec(spec), result.stderr, result.exitCode),
        { stdout: result.stdout, stderr: result.stderr }
      );
    }

    return result;
  }

  /**
   * Check whether a command is available on PATH
   */
  static commandExists(name: string, env: NodeJS.ProcessEnv = process.env): boolean {
    const dirs = (env.PATH || '').split(path.delimiter).filter(Boolean);
    const extensions = process.platform === 'win32'
      ? ['', ...(env.PATHEXT || '.EXE;.CMD;.BAT').split(';')]
      : [''];

    for (const dir of dirs) {
      for (const ext of extensions) {
        try {
          fs.accessSync(path.join(dir, name + ext), fs.constants.X_OK);
          return true;
        } catch {
          // not in this directory
        }
      }
    }

    return false;
  }

  /**
   * Kill every running child process
   */
  static killAll(): number {
    const count = this.active.size;
    for (const child of this.active) {
      child.kill('SIGTERM');
    }
    this.active.clear();
    return count;
  }
}

/**
 * Printable form of a command spec
 */
export function formatSpec(spec: CommandSpec): string {
  const line = [spec.command, ...spec.args].join(' ');
  return spec.elevated ? `sudo ${line}` : line;
}

class LineForwarder {
  private pending = '';

  push(text: string): void {
    this.pending += text;
    const lines = this.pending.split(/\r?\n/);
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      if (line.trim()) logger.info(`  ${line}`);
    }
  }

  flush(): void {
    if (this.pending.trim()) logger.info(`  ${this.pending}`);
    this.pending = '';
  }
}
