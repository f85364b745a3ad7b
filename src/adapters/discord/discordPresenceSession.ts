import { Client, type SetActivity } from '@xhayper/discord-rpc';
import { ActivityType } from 'discord-api-types/v10';
import { NotConnectedError, errorMessage } from '@/domain/errors';
import type { PresencePayload } from '@/domain/presence/types';
import type {
  JoinEventSource,
  JoinListener,
  PresenceSessionPort,
} from '@/ports/PresenceSessionPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

/**
 * The slice of the RPC client the session talks to.
 */
export interface RpcConnection {
  readonly username: string | undefined;
  login(): Promise<void>;
  isAlive(): boolean;
  setActivity(activity: SetActivity): Promise<void>;
  clearActivity(): Promise<void>;
  sendJoinInvite(userId: string): Promise<void>;
  subscribeJoinEvents(): Promise<void>;
  onReady(listener: () => void): void;
  onDisconnected(listener: () => void): void;
  onJoin(listener: (data: unknown) => void): void;
  onJoinRequest(listener: (data: unknown) => void): void;
  destroy(): Promise<void>;
}

export function discordRpcConnection(clientId: string): RpcConnection {
  const client = new Client({ clientId });
  return {
    get username() {
      return client.user?.username;
    },
    login: async () => {
      await client.login();
    },
    isAlive: () => client.isConnected,
    setActivity: async (activity) => {
      await client.user?.setActivity(activity);
    },
    clearActivity: async () => {
      await client.user?.clearActivity();
    },
    sendJoinInvite: async (userId) => {
      await client.user?.sendJoinInvite(userId);
    },
    subscribeJoinEvents: async () => {
      await client.subscribe('ACTIVITY_JOIN');
      await client.subscribe('ACTIVITY_JOIN_REQUEST');
    },
    onReady: (listener) => {
      client.on('ready', () => listener());
    },
    onDisconnected: (listener) => {
      client.on('disconnected', () => listener());
    },
    onJoin: (listener) => {
      client.on('ACTIVITY_JOIN', (data: unknown) => listener(data));
    },
    onJoinRequest: (listener) => {
      client.on('ACTIVITY_JOIN_REQUEST', (data: unknown) => listener(data));
    },
    destroy: async () => {
      client.removeAllListeners();
      await client.destroy();
    },
  };
}

export interface DiscordPresenceSessionOptions {
  clientId: string;
  /** Answer ACTIVITY_JOIN_REQUEST with an invite instead of waiting for the user. */
  autoAcceptJoinRequests: boolean;
  createConnection?: (clientId: string) => RpcConnection;
  log?: ComponentLogger;
}

/**
 * Maps the protocol-neutral payload onto a Discord "Listening" activity.
 */
export function toDiscordActivity(payload: PresencePayload): SetActivity {
  return {
    type: ActivityType.Listening,
    details: payload.details,
    state: payload.state,
    startTimestamp: new Date(payload.startTimestamp),
    endTimestamp: payload.endTimestamp !== undefined ? new Date(payload.endTimestamp) : undefined,
    largeImageKey: payload.largeImage,
    largeImageText: payload.largeText,
    smallImageText: payload.smallText,
    partyId: payload.partyId,
    partySize: payload.partySize[0],
    partyMax: payload.partySize[1],
    joinSecret: payload.joinSecret,
  };
}

/**
 * Discord Rich Presence over the local IPC socket. A fresh client is created
 * for every connect, since a destroyed client cannot log in again.
 */
export class DiscordPresenceSession implements PresenceSessionPort, JoinEventSource {
  private readonly log: ComponentLogger;
  private readonly joinListeners = new Set<JoinListener>();
  private readonly createConnection: (clientId: string) => RpcConnection;
  private connection: RpcConnection | null = null;
  private ready = false;

  constructor(private readonly options: DiscordPresenceSessionOptions) {
    this.log = options.log ?? createLogger('Discord', 'Session');
    this.createConnection = options.createConnection ?? discordRpcConnection;
  }

  public isConnected(): boolean {
    return this.connection !== null && this.ready;
  }

  public async connect(): Promise<void> {
    if (this.isConnected()) {
      return;
    }
    await this.disposeConnection();

    const connection = this.createConnection(this.options.clientId);
    connection.onReady(() => {
      this.ready = true;
      this.log.info('connected to discord', { user: connection.username ?? 'unknown' });
    });
    connection.onDisconnected(() => {
      if (this.connection === connection) {
        this.ready = false;
        this.log.warn('discord connection lost');
      }
    });
    this.connection = connection;

    try {
      await connection.login();
    } catch (error) {
      await this.disposeConnection();
      throw error;
    }
    this.ready = true;
    await this.subscribeJoinEvents(connection);
  }

  public async update(payload: PresencePayload): Promise<void> {
    const connection = this.requireConnection();
    await this.guard(connection, () => connection.setActivity(toDiscordActivity(payload)));
  }

  public async clear(): Promise<void> {
    const connection = this.requireConnection();
    await this.guard(connection, () => connection.clearActivity());
  }

  public async disconnect(): Promise<void> {
    await this.disposeConnection();
  }

  public onJoin(listener: JoinListener): () => void {
    this.joinListeners.add(listener);
    return () => this.joinListeners.delete(listener);
  }

  private requireConnection(): RpcConnection {
    if (!this.connection || !this.ready) {
      throw new NotConnectedError();
    }
    return this.connection;
  }

  /**
   * A call that fails because the pipe went away is reported as NotConnectedError,
   * so the reconciler can reconnect.
   */
  private async guard(connection: RpcConnection, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      if (!connection.isAlive()) {
        this.ready = false;
        throw new NotConnectedError(`discord connection lost: ${errorMessage(error)}`);
      }
      throw error;
    }
  }

  private async subscribeJoinEvents(connection: RpcConnection): Promise<void> {
    connection.onJoin((data) => {
      const secret = readString(data, 'secret');
      if (!secret) {
        return;
      }
      this.log.info('join event received');
      for (const listener of this.joinListeners) {
        listener(secret);
      }
    });
    connection.onJoinRequest((data) => {
      void this.handleJoinRequest(connection, data);
    });

    try {
      await connection.subscribeJoinEvents();
      this.log.debug('subscribed to join events');
    } catch (error) {
      this.log.warn('join event subscription failed', { message: errorMessage(error) });
    }
  }

  private async handleJoinRequest(connection: RpcConnection, data: unknown): Promise<void> {
    const user = isRecord(data) ? data.user : undefined;
    const userId = readString(user, 'id');
    const username = readString(user, 'username') ?? '?';
    if (!userId) {
      return;
    }
    if (!this.options.autoAcceptJoinRequests) {
      this.log.info('join request received', { username });
      return;
    }
    try {
      await connection.sendJoinInvite(userId);
      this.log.info('join request accepted', { username });
    } catch (error) {
      this.log.warn('failed to accept join request', { username, message: errorMessage(error) });
    }
  }

  private async disposeConnection(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.ready = false;
    if (!connection) {
      return;
    }
    try {
      await connection.destroy();
    } catch (error) {
      this.log.debug('discord client destroy failed', { message: errorMessage(error) });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readString(value: unknown, key: string): string | null {
  if (!isRecord(value)) {
    return null;
  }
  const entry = value[key];
  return typeof entry === 'string' && entry.length > 0 ? entry : null;
}
