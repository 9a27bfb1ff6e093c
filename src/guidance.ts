/**
 * User-facing guidance shown before and after a reset
 */

import type { HostInfo, SetupStatus } from './types.js';

export const BANNER = [
  'Rabbit R1 Auto-Setup Factory Reset Tool v2.0',
  'Automatic MTKClient Installation'
];

export const WINDOWS_PREREQUISITES = [
  'Python 3.9+ from python.org (NOT Microsoft Store)',
  'Git for Windows',
  'Visual Studio Build Tools (C++ workload)',
  'WinFsp from https://winfsp.dev/rel/',
  'UsbDk from https://github.com/daynix/UsbDk/releases/'
];

export const MANUAL_DEPENDENCIES = [
  'Python 3.8+',
  'pip',
  'git',
  'libusb',
  'fuse'
];

export const RESET_WARNINGS = [
  'Automatically install MTKClient and dependencies',
  'Set up required permissions and drivers',
  'Erase ALL user data on the device',
  'Reset the device to factory settings',
  'Cannot be undone once started'
];

export const PREREQUISITES = [
  'Internet connection for downloads',
  'Administrator/sudo access (except Live DVD)',
  'MediaTek device (e.g. Rabbit R1) with USB cable'
];

export const CONNECTION_STEPS = [
  'Ensure the device is completely powered off',
  'Connect the USB cable to the computer only',
  'Start the reset; the tool waits for the device',
  'When the tool is waiting, plug the cable into the device'
];

export const POST_RESET_STEPS = [
  'Unplug the USB cable from the device',
  'Hold the power button to turn on the device',
  'The device should boot to the initial setup screen',
  'Follow on-screen instructions to set up your device'
];

export const TROUBLESHOOTING = {
  setup: [
    'Run "sudo -v" first if permission errors occur',
    'Ensure internet connection for downloads',
    'Check if Python 3.8+ is properly installed'
  ],
  device: [
    'Ensure device drivers are properly installed',
    'Try a different USB cable or port',
    'Make sure the device is completely powered off before connecting',
    'On Linux, logout and login after first run (for group permissions)'
  ],
  windows: [
    'Install UsbDk drivers from: https://github.com/daynix/UsbDk/releases/',
    'Install Visual Studio Build Tools with C++ workload',
    'Use Python from python.org, NOT Microsoft Store'
  ],
  links: [
    'https://github.com/bkerler/mtkclient',
    'MTK Live DVD: https://androidfilehost.com/?fid=15664248565197184488'
  ]
};

/**
 * What automatic setup installs on this host
 */
export function installationItems(host: HostInfo): string[] {
  if (host.isLiveDvd) {
    return ['Nothing - Live DVD environment detected'];
  }

  return [
    'System dependencies (Python, Git, USB libraries)',
    'MTKClient from GitHub',
    'Python virtual environment',
    'USB device rules and permissions'
  ];
}

function bullets(items: string[]): string {
  return items.map(item => `- ${item}`).join('\n');
}

function numbered(items: string[]): string {
  return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
}

/**
 * Warnings, install list, prerequisites and connection steps shown before a reset
 */
export function renderResetPlan(host: HostInfo, token: string): string {
  return `# ${BANNER[0]}
_${BANNER[1]}_

## ⚠️ Automatic Setup & Factory Reset

**Detected OS**: ${host.os}${host.isLiveDvd ? ' (MTK Live DVD)' : ''}

## This will
${bullets(RESET_WARNINGS)}

## What will be installed
${bullets(installationItems(host))}

## Prerequisites
${bullets(PREREQUISITES)}

## Device connection
${numbered(CONNECTION_STEPS)}

To proceed, call \`factory_reset(confirm_token="${token}")\` once the user has agreed.`;
}

/**
 * Next steps and setup information after a successful reset
 */
export function renderPostReset(status: SetupStatus, isLiveDvd: boolean): string {
  let result = `# ✅ Factory Reset Complete!

## Next Steps
${numbered(POST_RESET_STEPS)}`;

  if (!isLiveDvd) {
    const info = [`MTKClient installed in: ${status.mtkclientDir}`];
    if (status.venvPresent) {
      info.push(`Python environment: ${status.venvDir}`);
      info.push(`To use MTKClient again: source ${status.venvDir}/bin/activate`);
    }
    info.push('You can run factory_reset again anytime');

    result += `\n\n## Setup Information\n${bullets(info)}`;
  }

  return result;
}

/**
 * Troubleshooting sections, with the Windows section only where it applies
 */
export function renderTroubleshooting(includeWindows: boolean): string {
  const sections = [
    `## Setup Issues\n${bullets(TROUBLESHOOTING.setup)}`,
    `## Device Issues\n${bullets(TROUBLESHOOTING.device)}`
  ];

  if (includeWindows) {
    sections.push(`## Windows Specific\n${bullets(TROUBLESHOOTING.windows)}`);
  }

  sections.push(`## More Help\n${bullets(TROUBLESHOOTING.links)}`);

  return `# Troubleshooting\n\n${sections.join('\n\n')}`;
}
