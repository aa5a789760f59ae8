/**
 * Best-effort launch of the platform's default browser.
 */

import { spawn } from 'node:child_process';

export type BrowserLauncher = (url: string) => Promise<boolean>;

/**
 * Command that opens `url` on `platform`:
 * - macOS: `open url`
 * - Windows: `cmd /c start "" url`
 * - everything else: `xdg-open url`
 */
export function browserCommand(
  platform: NodeJS.Platform,
  url: string
): { command: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Resolves `true` once the opener process has started, `false` when it could
 * not be spawned. Never rejects.
 */
export const openBrowser: BrowserLauncher = (url) => {
  const { command, args } = browserCommand(process.platform, url);

  return new Promise<boolean>((resolve) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
      windowsVerbatimArguments: process.platform === 'win32',
    });
    child.once('error', () => resolve(false));
    child.once('spawn', () => {
      child.unref();
      resolve(true);
    });
  });
};
