import { readFile } from 'node:fs/promises';
import path from 'node:path';
import SysTray, { type ClickEvent, type MenuItem } from 'systray2';
import { formatStatus } from '@/adapters/status/statusText';
import type { LoopCommand } from '@/application/scheduler/presenceLoop';
import { errorMessage } from '@/domain/errors';
import type { PresenceStatus } from '@/domain/presence/types';
import type { StatusPort } from '@/ports/StatusPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

// Indices in the flattened menu; separators take a slot too.
const STATUS_SEQ = 0;
const PAUSE_SEQ = 2;
const CLEAR_SEQ = 3;
const EXIT_SEQ = 5;

export function trayCommandFor(seqId: number, paused: boolean): LoopCommand | null {
  switch (seqId) {
    case PAUSE_SEQ:
      return paused ? 'resume' : 'pause';
    case CLEAR_SEQ:
      return 'clear';
    case EXIT_SEQ:
      return 'exit';
    default:
      return null;
  }
}

export interface TrayControllerOptions {
  onCommand: (command: LoopCommand) => void;
  /** Directory holding `tray-icon.png` and `tray-icon.ico`. */
  iconDir: string;
  log?: ComponentLogger;
}

/**
 * System tray menu: status line, Pause/Resume, Clear, Exit.
 */
export class TrayController implements StatusPort {
  private readonly log: ComponentLogger;
  private tray: SysTray | null = null;
  private paused = false;
  private statusItem: MenuItem = { title: 'Starting…', tooltip: 'Status', enabled: false };
  private pauseItem: MenuItem = { title: 'Pause', tooltip: 'Pause presence updates', enabled: true };

  constructor(private readonly options: TrayControllerOptions) {
    this.log = options.log ?? createLogger('Tray');
  }

  public async start(): Promise<void> {
    const iconFile = process.platform === 'win32' ? 'tray-icon.ico' : 'tray-icon.png';
    const icon = (await readFile(path.join(this.options.iconDir, iconFile))).toString('base64');
    const tray = new SysTray({
      menu: {
        icon,
        title: '',
        tooltip: 'Now playing presence',
        items: [
          this.statusItem,
          SysTray.separator,
          this.pauseItem,
          { title: 'Clear presence', tooltip: 'Hide presence until resumed', enabled: true },
          SysTray.separator,
          { title: 'Exit', tooltip: 'Clear presence and quit', enabled: true },
        ],
      },
      debug: false,
      copyDir: true,
    });
    await tray.onClick((action: ClickEvent) => this.handleClick(action));
    await tray.ready();
    this.tray = tray;
    this.log.info('tray ready');
  }

  public report(status: PresenceStatus): void {
    const paused = status.mode === 'paused';
    const title = formatStatus(status);
    if (title !== this.statusItem.title) {
      this.statusItem = { ...this.statusItem, title };
      void this.send(this.statusItem, STATUS_SEQ);
    }
    if (paused !== this.paused) {
      this.paused = paused;
      this.pauseItem = { ...this.pauseItem, title: paused ? 'Resume' : 'Pause' };
      void this.send(this.pauseItem, PAUSE_SEQ);
    }
  }

  public async stop(): Promise<void> {
    const tray = this.tray;
    this.tray = null;
    if (tray) {
      await tray.kill(false);
    }
  }

  private handleClick(action: ClickEvent): void {
    const command = trayCommandFor(action.seq_id, this.paused);
    if (command) {
      this.log.debug('tray command', { command });
      this.options.onCommand(command);
    }
  }

  private async send(item: MenuItem, seqId: number): Promise<void> {
    if (!this.tray) {
      return;
    }
    try {
      await this.tray.sendAction({ type: 'update-item', item, seq_id: seqId });
    } catch (error) {
      this.log.debug('tray update failed', { message: errorMessage(error) });
    }
  }
}
