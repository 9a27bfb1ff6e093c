/**
 * TypeScript type definitions for MTK Reset MCP Server
 */

export type OutputFormat = 'markdown' | 'json';

export type PackageFamily = 'apt' | 'pacman' | 'dnf' | 'brew' | 'manual' | 'unsupported';

export type SetupMethod = 'live-dvd' | 'venv' | 'direct';

export interface HostInfo {
  os: string;
  version?: string;
  family: PackageFamily;
  arch: string;
  username: string;
  isRoot: boolean;
  isLiveDvd: boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  success: boolean;
}

export interface CommandSpec {
  command: string;
  args: string[];
  elevated?: boolean;
}

/**
 * An invocable mtk entry point: executable plus leading arguments
 */
export interface MtkCommand {
  command: string;
  args: string[];
}

export interface DependencyReport {
  os: string;
  family: PackageFamily;
  commands: string[];
  manualSteps?: string[];
}

export interface SetupReport {
  method: SetupMethod;
  mtkCommand: string;
  mtkclientDir: string;
  venvDir?: string;
  steps: string[];
}

export interface SetupStatus {
  mtkclientInstalled: boolean;
  mtkclientDir: string;
  venvPresent: boolean;
  venvDir: string;
  mtkCommand?: string;
}

export interface EraseResult {
  partition: string;
  command: string;
  duration: string;
  output: string;
}
