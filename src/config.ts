/**
 * Configuration constants for MTK Reset MCP Server
 */

import * as os from 'os';
import * as path from 'path';

export interface InstallPaths {
  root: string;
  mtkclientDir: string;
  venvDir: string;
}

/**
 * Derive installation paths from the environment
 */
export function resolvePaths(env: NodeJS.ProcessEnv, home: string): InstallPaths {
  const root = env.MTK_RESET_HOME || path.join(home, '.mtk-reset');

  return {
    root,
    mtkclientDir: env.MTKCLIENT_DIR || path.join(root, 'mtkclient'),
    venvDir: env.MTK_VENV_DIR || path.join(root, 'mtk_venv')
  };
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return isNaN(parsed) ? fallback : parsed;
}

const paths = resolvePaths(process.env, os.homedir());

export const CONFIG = {
  // Installation
  INSTALL_DIR: paths.root,
  MTKCLIENT_DIR: paths.mtkclientDir,
  VENV_DIR: paths.venvDir,
  MTKCLIENT_REPO: process.env.MTKCLIENT_REPO || 'https://github.com/bkerler/mtkclient.git',
  MTKCLIENT_ARCHIVE: process.env.MTKCLIENT_ARCHIVE || 'https://github.com/bkerler/mtkclient/archive/refs/heads/main.zip',
  PYTHON_PATH: process.env.PYTHON_PATH || (process.platform === 'win32' ? 'python' : 'python3'),
  LIVE_DVD_DIR: process.env.MTK_LIVE_DVD_DIR || '/opt/mtkclient',
  HOMEBREW_INSTALLER: 'https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh',
  CONNECTIVITY_URL: 'https://github.com',

  // Command execution
  COMMAND_TIMEOUT: readInt(process.env.COMMAND_TIMEOUT, 30000),
  INSTALL_TIMEOUT: readInt(process.env.INSTALL_TIMEOUT, 1800000),
  ERASE_TIMEOUT: readInt(process.env.ERASE_TIMEOUT, 600000),
  CONNECTIVITY_TIMEOUT: readInt(process.env.CONNECTIVITY_TIMEOUT, 5000),

  // Response formatting
  CHARACTER_LIMIT: readInt(process.env.CHARACTER_LIMIT, 25000),

  // Safety
  TOKEN_EXPIRY: readInt(process.env.TOKEN_EXPIRY, 60000),
  DEFAULT_PARTITION: 'userdata',
  ERASABLE_PARTITIONS: ['userdata', 'cache', 'metadata'],
  DESTRUCTIVE_OPERATIONS: [
    'erase_partition',
    'factory_reset'
  ]
} as const;

export const ERROR_MESSAGES = {
  INVALID_CONFIRMATION: (operation: string) =>
    `Missing or invalid confirmation token for ${operation}. Destructive operations require confirm_token parameter. Format: CONFIRM_${operation.toUpperCase()}_<timestamp>`,

  UNSUPPORTED_OS: (osId: string) =>
    `Unsupported operating system: ${osId}. Install the dependencies manually, then run setup_mtkclient(skip_system_deps=true).`,

  NO_INTERNET: 'No internet connection detected. Internet is required for automatic setup.',

  SUDO_REQUIRED: (command: string) =>
    `Administrator access required for: ${command}. Run "sudo -v" in a terminal to cache credentials, or start the server as root.`,

  COMMAND_NOT_FOUND: (command: string) =>
    `Command not found: ${command}. Ensure it is installed and in your system PATH.`,

  COMMAND_FAILED: (cmd: string, stderr: string, exitCode: number) =>
    `Command failed: ${cmd}\nExit code: ${exitCode}\nError: ${stderr}`,

  VERIFY_FAILED: 'MTKClient installation verification failed. No working mtk command was found.',

  ERASE_FAILED: (partition: string) => `Failed to erase ${partition} partition`
} as const;
