import { runCommand, type CommandRunner } from '@/adapters/system/commandRunner';
import type { UrlOpenerPort } from '@/ports/PlaybackPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export function openerCommand(
  platform: NodeJS.Platform,
  url: string,
): { file: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { file: 'open', args: [url] };
    case 'win32':
      return { file: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
    default:
      return { file: 'xdg-open', args: [url] };
  }
}

/**
 * Hands a URL to the desktop's default handler (browser or registered app).
 */
export class SystemUrlOpener implements UrlOpenerPort {
  private readonly log: ComponentLogger;

  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly run: CommandRunner = runCommand,
    log?: ComponentLogger,
  ) {
    this.log = log ?? createLogger('System', 'UrlOpener');
  }

  public async open(url: string): Promise<void> {
    if (!/^[a-z][a-z0-9+.-]*:/i.test(url)) {
      throw new Error(`refusing to open non-URL value: ${url.slice(0, 80)}`);
    }
    const { file, args } = openerCommand(this.platform, url);
    this.log.debug('opening url', { file, url });
    await this.run(file, args, { timeoutMs: 10_000 });
  }
}
