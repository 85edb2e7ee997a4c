import type { NotificationEvent } from '../domain/types/event.types';
import type { UserId } from '../domain/types/message.types';
import type { Logger } from '../observability/logging';
import type { MessagingMetrics } from '../observability/metrics';
import type { Notifier } from '../ports/notifier/notifierPort';
import { toStreamFrame } from '../app/routes/mappers';

const DEFAULT_HEARTBEAT_INTERVAL_MS = 45_000;
const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

/**
 * The slice of a `ws` WebSocket the hub drives.
 */
export interface StreamSocket {
  readonly readyState: number;
  readonly OPEN: number;
  readonly bufferedAmount: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'pong' | 'close' | 'error', listener: (err: Error) => void): unknown;
}

export interface StreamHubOptions {
  heartbeatIntervalMs?: number;
  maxBufferedBytes?: number;
  logger?: Logger;
  metrics?: Pick<MessagingMetrics, 'streamConnections' | 'streamDroppedTotal'>;
}

type StreamConnection = {
  id: number;
  userId: UserId;
  socket: StreamSocket;
  alive: boolean;
};

/**
 * Live-connection notifier. Keeps the open stream sockets of each user and
 * writes every event for that user to all of them.
 */
export class StreamHub implements Notifier {
  private readonly connections = new Map<UserId, Map<number, StreamConnection>>();
  private readonly heartbeatIntervalMs: number;
  private readonly maxBufferedBytes: number;
  private heartbeat?: NodeJS.Timeout;
  private nextConnectionId = 1;

  constructor(private readonly options: StreamHubOptions = {}) {
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
  }

  register(userId: UserId, socket: StreamSocket): number {
    const connection: StreamConnection = { id: this.nextConnectionId++, userId, socket, alive: true };
    const forUser = this.connections.get(userId) ?? new Map<number, StreamConnection>();
    forUser.set(connection.id, connection);
    this.connections.set(userId, forUser);

    socket.on('pong', () => {
      connection.alive = true;
    });
    socket.on('close', () => this.unregister(connection));
    socket.on('error', (err) => {
      this.options.logger?.warn({ err, userId, connectionId: connection.id }, 'stream_socket_error');
    });

    this.options.metrics?.streamConnections.inc();
    this.options.logger?.debug({ userId, connectionId: connection.id }, 'stream_registered');
    this.ensureHeartbeat();
    return connection.id;
  }

  notify(userId: UserId, event: NotificationEvent): void {
    const forUser = this.connections.get(userId);
    if (!forUser || forUser.size === 0) return;

    const frame = JSON.stringify(toStreamFrame(event));
    for (const connection of forUser.values()) {
      this.send(connection, frame);
    }
  }

  size(userId?: UserId): number {
    if (userId !== undefined) return this.connections.get(userId)?.size ?? 0;
    let total = 0;
    for (const forUser of this.connections.values()) total += forUser.size;
    return total;
  }

  /**
   * One heartbeat round: drop sockets that never answered the previous
   * ping, ping the rest.
   */
  sweep(): void {
    for (const forUser of this.connections.values()) {
      for (const connection of forUser.values()) {
        if (!connection.alive) {
          this.drop(connection, 'heartbeat_timeout');
          connection.socket.terminate();
          continue;
        }
        connection.alive = false;
        connection.socket.ping();
      }
    }
  }

  close(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = undefined;
    }
    for (const forUser of Array.from(this.connections.values())) {
      for (const connection of Array.from(forUser.values())) {
        this.unregister(connection);
        connection.socket.close(1001, 'server_shutdown');
      }
    }
  }

  private send(connection: StreamConnection, frame: string) {
    const { socket } = connection;
    if (socket.readyState !== socket.OPEN) return;

    if (socket.bufferedAmount > this.maxBufferedBytes) {
      this.drop(connection, 'overloaded');
      socket.close(1013, 'overloaded');
      return;
    }

    socket.send(frame, (err) => {
      if (err) {
        this.options.logger?.warn({ err, userId: connection.userId, connectionId: connection.id }, 'stream_send_failed');
      }
    });
  }

  private drop(connection: StreamConnection, reason: string) {
    this.options.metrics?.streamDroppedTotal.labels({ reason }).inc();
    this.options.logger?.info({ userId: connection.userId, connectionId: connection.id, reason }, 'stream_dropped');
    this.unregister(connection);
  }

  private unregister(connection: StreamConnection) {
    const forUser = this.connections.get(connection.userId);
    if (!forUser?.delete(connection.id)) return;
    if (forUser.size === 0) this.connections.delete(connection.userId);
    this.options.metrics?.streamConnections.dec();
  }

  private ensureHeartbeat() {
    if (this.heartbeat) return;
    this.heartbeat = setInterval(() => this.sweep(), this.heartbeatIntervalMs);
    this.heartbeat.unref();
  }
}
