/**
 * Host operating system and environment detection
 */

import * as fs from 'fs';
import * as os from 'os';
import { CONFIG } from '../config.js';
import type { HostInfo, PackageFamily } from '../types.js';

/**
 * Everything detection reads from the host, injectable for tests
 */
export interface HostProbe {
  platform: NodeJS.Platform;
  arch: string;
  username: string;
  uid: number;
  readFile(filePath: string): string | null;
  isDirectory(dirPath: string): boolean;
  exists(filePath: string): boolean;
}

export const systemProbe: HostProbe = {
  platform: process.platform,
  arch: os.arch(),
  username: process.env.USER || safeUsername(),
  uid: typeof process.getuid === 'function' ? process.getuid() : -1,
  readFile(filePath) {
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch {
      return null;
    }
  },
  isDirectory(dirPath) {
    try {
      return fs.statSync(dirPath).isDirectory();
    } catch {
      return false;
    }
  },
  exists(filePath) {
    return fs.existsSync(filePath);
  }
};

function safeUsername(): string {
  try {
    return os.userInfo().username;
  } catch {
    return 'unknown';
  }
}

const FAMILIES: Record<string, PackageFamily> = {
  ubuntu: 'apt',
  debian: 'apt',
  arch: 'pacman',
  manjaro: 'pacman',
  fedora: 'dnf',
  rhel: 'dnf',
  centos: 'dnf',
  macos: 'brew',
  windows: 'manual'
};

// udev rules and group membership are only set up on these
const PERMISSION_HOSTS = ['ubuntu', 'debian', 'arch', 'fedora'];

export class HostDetector {
  /**
   * Detect the host OS, package family and Live DVD environment
   */
  static detect(probe: HostProbe = systemProbe): HostInfo {
    let osId = 'unknown';
    let version: string | undefined;

    const osRelease = probe.readFile('/etc/os-release');
    if (osRelease !== null) {
      const fields = this.parseOsRelease(osRelease);
      osId = fields.ID || 'unknown';
      version = fields.VERSION_ID;
    } else if (probe.exists('/etc/redhat-release')) {
      osId = 'rhel';
    } else if (probe.platform === 'darwin') {
      osId = 'macos';
    } else if (probe.platform === 'win32' || probe.platform === 'cygwin') {
      osId = 'windows';
    }

    return {
      os: osId,
      version,
      family: this.packageFamily(osId),
      arch: probe.arch,
      username: probe.username,
      isRoot: probe.uid === 0 || probe.username === 'root',
      isLiveDvd: probe.username === 'user' && probe.isDirectory(CONFIG.LIVE_DVD_DIR)
    };
  }

  /**
   * Parse KEY=VALUE lines of an os-release file
   */
  static parseOsRelease(content: string): Record<string, string> {
    const fields: Record<string, string> = {};

    for (const rawLine of content.split('\n')) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) continue;

      const eq = line.indexOf('=');
      if (eq <= 0) continue;

      const key = line.slice(0, eq);
      let value = line.slice(eq + 1);
      const quoted = value.match(/^(["'])(.*)\1$/);
      if (quoted) value = quoted[2];

      fields[key] = value;
    }

    return fields;
  }

  static packageFamily(osId: string): PackageFamily {
    return FAMILIES[osId] ?? 'unsupported';
  }

  /**
   * Whether USB permissions (groups, udev rules) are set up on this host
   */
  static needsPermissions(host: HostInfo): boolean {
    return PERMISSION_HOSTS.includes(host.os);
  }
}
