import type { PresenceReconciler } from '@/application/presence/presenceReconciler';
import { errorMessage } from '@/domain/errors';
import type { TrackSnapshot } from '@/domain/track/trackSnapshot';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type LoopCommand = 'pause' | 'resume' | 'toggle-pause' | 'clear' | 'exit';

export interface TrackSelector {
  select(): Promise<TrackSnapshot | null>;
}

export interface PresenceLoopOptions {
  selector: TrackSelector;
  reconciler: PresenceReconciler;
  intervalMs: number;
  log?: ComponentLogger;
}

type ExitListener = () => void;

/**
 * Single serial queue for ticks and user commands. A command never runs in
 * the middle of a tick, and the next tick is only scheduled once the
 * previous one has settled.
 */
export class PresenceLoop {
  private readonly selector: TrackSelector;
  private readonly reconciler: PresenceReconciler;
  private readonly intervalMs: number;
  private readonly log: ComponentLogger;
  private readonly exitListeners = new Set<ExitListener>();

  private queue: Promise<void> = Promise.resolve();
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private closed = false;

  constructor(options: PresenceLoopOptions) {
    this.selector = options.selector;
    this.reconciler = options.reconciler;
    this.intervalMs = options.intervalMs;
    this.log = options.log ?? createLogger('Presence', 'Loop');
  }

  public get isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.running || this.closed) {
      return;
    }
    this.running = true;
    this.log.info('presence loop started', { intervalMs: this.intervalMs });
    void this.scheduledTick();
  }

  public onExit(listener: ExitListener): () => void {
    this.exitListeners.add(listener);
    return () => this.exitListeners.delete(listener);
  }

  public dispatch(command: LoopCommand): Promise<void> {
    if (this.closed) {
      this.log.debug('command ignored after exit', { command });
      return Promise.resolve();
    }
    if (command === 'exit') {
      // Later commands must not slip in behind the release path.
      this.closed = true;
      this.running = false;
      this.clearTimer();
    }
    return this.enqueue(() => this.applyCommand(command));
  }

  /**
   * Queues one tick outside the timer, e.g. right after a resume.
   */
  public runTick(): Promise<void> {
    return this.enqueue(() => this.tick());
  }

  private async applyCommand(command: LoopCommand): Promise<void> {
    this.log.debug('command', { command });
    switch (command) {
      case 'pause':
        this.reconciler.pause();
        return;
      case 'resume':
        this.reconciler.resume();
        return;
      case 'toggle-pause':
        if (this.reconciler.getState().mode === 'paused') {
          this.reconciler.resume();
        } else {
          this.reconciler.pause();
        }
        return;
      case 'clear':
        await this.reconciler.clearPresence();
        return;
      case 'exit':
        await this.reconciler.shutdown();
        this.log.info('presence loop exited');
        for (const listener of this.exitListeners) {
          listener();
        }
        return;
    }
  }

  private async tick(): Promise<void> {
    try {
      const snapshot = await this.selector.select();
      const result = await this.reconciler.reconcile(snapshot);
      this.log.spam('tick', { result });
    } catch (error) {
      this.log.error('presence tick failed', { message: errorMessage(error) });
    }
  }

  private async scheduledTick(): Promise<void> {
    this.timer = null;
    await this.runTick();
    if (this.running) {
      this.timer = setTimeout(() => {
        void this.scheduledTick();
      }, this.intervalMs);
    }
  }

  private enqueue(job: () => Promise<void>): Promise<void> {
    const next = this.queue.then(job).catch((error: unknown) => {
      this.log.error('presence job failed', { message: errorMessage(error) });
    });
    this.queue = next;
    return next;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
