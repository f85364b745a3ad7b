import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runCommand, type CommandRunner } from '@/adapters/system/commandRunner';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export const DESKTOP_FILE_NAME = 'nowplaying-presence.desktop';

export interface UriRegistrationOptions {
  /** e.g. `listenalong` and `discord-<clientId>`. */
  schemes: readonly string[];
  /** Program and leading arguments; the URI is appended. */
  launchCommand: readonly string[];
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  homeDir?: string;
  log?: ComponentLogger;
}

/**
 * The command line that reopens this process with a URI argument.
 */
export function currentLaunchCommand(): string[] {
  const script = process.argv[1] ? path.resolve(process.argv[1]) : '';
  return [process.execPath, ...process.execArgv, script].filter((part) => part.length > 0);
}

function quoteWindows(part: string): string {
  return `"${part.replace(/"/g, '\\"')}"`;
}

/**
 * `reg.exe` invocations for one scheme under HKCU, which needs no elevation.
 */
export function windowsRegistryCommands(
  scheme: string,
  launchCommand: readonly string[],
): string[][] {
  const key = `HKCU\\Software\\Classes\\${scheme}`;
  const command = [...launchCommand.map(quoteWindows), '"%1"'].join(' ');
  return [
    ['add', key, '/ve', '/d', `URL:${scheme}`, '/f'],
    ['add', key, '/v', 'URL Protocol', '/d', '', '/f'],
    ['add', `${key}\\shell\\open\\command`, '/ve', '/d', command, '/f'],
  ];
}

function quoteDesktopExec(part: string): string {
  return /[\s"'\\$`]/.test(part) ? `"${part.replace(/(["`$\\])/g, '\\$1')}"` : part;
}

export function buildDesktopEntry(
  schemes: readonly string[],
  launchCommand: readonly string[],
): string {
  const exec = [...launchCommand.map(quoteDesktopExec), '%u'].join(' ');
  const mimeTypes = schemes.map((scheme) => `x-scheme-handler/${scheme};`).join('');
  return [
    '[Desktop Entry]',
    'Type=Application',
    'Name=Now Playing Presence',
    'NoDisplay=true',
    'Terminal=false',
    `Exec=${exec}`,
    `MimeType=${mimeTypes}`,
    '',
  ].join('\n');
}

/**
 * Registers the custom URI schemes so that invite links start this program.
 */
export async function registerUriSchemes(options: UriRegistrationOptions): Promise<void> {
  const platform = options.platform ?? process.platform;
  const run = options.run ?? runCommand;
  const log = options.log ?? createLogger('System', 'UriRegistration');

  if (platform === 'win32') {
    for (const scheme of options.schemes) {
      for (const args of windowsRegistryCommands(scheme, options.launchCommand)) {
        await run('reg', args);
      }
      log.info('uri scheme registered', { scheme, hive: 'HKCU' });
    }
    return;
  }

  if (platform === 'darwin') {
    throw new Error('uri schemes are registered through an application bundle on macOS');
  }

  const home = options.homeDir ?? os.homedir();
  const applications = path.join(home, '.local', 'share', 'applications');
  const desktopFile = path.join(applications, DESKTOP_FILE_NAME);
  await fs.mkdir(applications, { recursive: true });
  await fs.writeFile(desktopFile, buildDesktopEntry(options.schemes, options.launchCommand), 'utf-8');
  for (const scheme of options.schemes) {
    await run('xdg-mime', ['default', DESKTOP_FILE_NAME, `x-scheme-handler/${scheme}`]);
    log.info('uri scheme registered', { scheme, desktopFile });
  }
}
