/**
 * Host detection and MTKClient setup tools
 */

import { z } from 'zod';
import { CONFIG } from '../config.js';
import { installationItems } from '../guidance.js';
import { ConnectivityChecker } from '../utils/connectivity.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { ResponseFormatter } from '../utils/formatter.js';
import { HostDetector } from '../utils/host-detector.js';
import { mtkClient } from '../utils/mtkclient-manager.js';
import { SystemDeps } from '../utils/system-deps.js';
import { defineTool, FORMAT_PROPERTY } from './define.js';

// Schemas
export const DetectHostSchema = z.object({
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

export const CheckInternetSchema = z.object({
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

export const InstallSystemDepsSchema = z.object({
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

export const SetupMtkClientSchema = z.object({
  skip_system_deps: z.boolean().default(false).describe('Skip OS package installation'),
  skip_internet_check: z.boolean().default(false).describe('Skip the connectivity check'),
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

export const GetSetupStatusSchema = z.object({
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

// Tool implementations
export const setupTools = {
  detect_host: defineTool({
    description: `Detect the host operating system and environment.

Reports the OS identifier (from /etc/os-release on Linux), the package manager family used for
setup (apt, pacman, dnf, brew), whether the MTK Live DVD is running, and whether the server runs as root.

Examples:
- detect_host() → Show host details before setup`,
    inputSchema: {
      type: 'object',
      properties: { format: FORMAT_PROPERTY }
    },
    schema: DetectHostSchema,
    handler: async (args) => {
      return ErrorHandler.wrap(async () => {
        const host = HostDetector.detect();

        return ResponseFormatter.format({
          ...host,
          permissionSetup: HostDetector.needsPermissions(host),
          willInstall: installationItems(host)
        }, args.format);
      });
    }
  }),

  check_internet: defineTool({
    description: `Check internet connectivity (required for automatic setup).

Sends a request to github.com with a short timeout. Not needed on the MTK Live DVD.

Examples:
- check_internet()`,
    inputSchema: {
      type: 'object',
      properties: { format: FORMAT_PROPERTY }
    },
    schema: CheckInternetSchema,
    handler: async (args) => {
      return ErrorHandler.wrap(async () => {
        await ConnectivityChecker.check();

        if (args.format === 'json') {
          return ResponseFormatter.format({ online: true, url: CONFIG.CONNECTIVITY_URL }, 'json');
        }
        return ResponseFormatter.success('Internet connection verified', { url: CONFIG.CONNECTIVITY_URL });
      });
    }
  }),

  install_system_deps: defineTool({
    description: `Install system packages MTKClient needs (Python, pip, venv, git, libusb, fuse, build tools).

Uses the host package manager:
- Ubuntu/Debian: apt
- Arch/Manjaro: pacman
- Fedora/RHEL/CentOS: dnf
- macOS: Homebrew (installed first when missing)
- Windows: returns the manual prerequisite checklist

Package managers run through non-interactive sudo; cache credentials with "sudo -v" first.

Examples:
- install_system_deps()`,
    inputSchema: {
      type: 'object',
      properties: { format: FORMAT_PROPERTY }
    },
    schema: InstallSystemDepsSchema,
    handler: async (args) => {
      return ErrorHandler.wrap(async () => {
        const host = HostDetector.detect();
        const report = await SystemDeps.install(host);

        if (args.format === 'json') {
          return ResponseFormatter.format(report, 'json');
        }

        if (report.manualSteps) {
          return ResponseFormatter.warning(
            `Windows detected. Please ensure the following are installed:\n${report.manualSteps.map(s => `- ${s}`).join('\n')}`
          );
        }

        return ResponseFormatter.success(`System dependencies installed for ${host.os}`, report);
      });
    }
  }),

  setup_mtkclient: defineTool({
    description: `Automatic MTKClient setup.

Steps:
1. Install system dependencies (unless skip_system_deps=true)
2. Clone or update MTKClient from GitHub (source archive when git is missing)
3. Install into a Python virtual environment (macOS or non-root), or the user site (root)
4. Set up USB permissions on Linux (plugdev/dialout groups, udev rules)
5. Verify that an mtk command answers --help

On the MTK Live DVD the preinstalled tool is used and nothing is installed.

Examples:
- setup_mtkclient()
- setup_mtkclient(skip_system_deps=true) → Dependencies already installed`,
    inputSchema: {
      type: 'object',
      properties: {
        skip_system_deps: {
          type: 'boolean',
          default: false,
          description: 'Skip OS package installation'
        },
        skip_internet_check: {
          type: 'boolean',
          default: false,
          description: 'Skip the connectivity check'
        },
        format: FORMAT_PROPERTY
      }
    },
    schema: SetupMtkClientSchema,
    handler: async (args) => {
      return ErrorHandler.wrap(async () => {
        const host = HostDetector.detect();

        if (!host.isLiveDvd && !args.skip_internet_check) {
          await ConnectivityChecker.check();
        }

        const report = await mtkClient.autoSetup(host, { skipSystemDeps: args.skip_system_deps });

        if (args.format === 'json') {
          return ResponseFormatter.format(report, 'json');
        }
        return ResponseFormatter.success('Automatic setup completed successfully!', report);
      });
    }
  }),

  get_setup_status: defineTool({
    description: `Show where MTKClient is installed and which mtk command is in use.

Examples:
- get_setup_status()`,
    inputSchema: {
      type: 'object',
      properties: { format: FORMAT_PROPERTY }
    },
    schema: GetSetupStatusSchema,
    handler: async (args) => {
      return ErrorHandler.wrap(async () => {
        return ResponseFormatter.format(mtkClient.status(), args.format);
      });
    }
  })
};
