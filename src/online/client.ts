import { io, type Socket } from 'socket.io-client';
import type { BattleSummary, MoveEvent } from '../engine/types';
import type { ClientToServerEvents, ServerToClientEvents, WatchRequest } from './types';

export interface OnlineClientOpts {
  serverUrl: string;
  // Gives up on a watched battle that has not finished by then.
  timeoutMs?: number;
}

export class OnlineClient {
  socket: Socket<ServerToClientEvents, ClientToServerEvents>;
  private readonly timeoutMs: number;

  constructor(opts: OnlineClientOpts) {
    this.socket = io(opts.serverUrl, {
      transports: ['websocket', 'polling'],
    });
    this.timeoutMs = opts.timeoutMs ?? 60_000;
  }

  /** Asks the server to play one battle and streams its moves to `onMove`. */
  watch(request: WatchRequest, onMove: (event: MoveEvent) => void): Promise<BattleSummary> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error(`No battle result after ${this.timeoutMs} ms`));
      }, this.timeoutMs);
      const cleanup = (): void => {
        clearTimeout(timer);
        this.socket.off('move');
        this.socket.off('battle_over');
        this.socket.off('error_msg');
        this.socket.off('connect_error');
        this.socket.off('disconnect');
      };
      this.socket.on('move', ({ event }) => onMove(event));
      this.socket.on('battle_over', ({ summary }) => {
        cleanup();
        resolve(summary);
      });
      this.socket.on('error_msg', ({ message }) => {
        cleanup();
        reject(new Error(message));
      });
      this.socket.on('connect_error', (err) => {
        cleanup();
        reject(err);
      });
      this.socket.on('disconnect', (reason) => {
        cleanup();
        reject(new Error(`Disconnected from server: ${reason}`));
      });
      this.socket.emit('watch', request);
    });
  }

  close(): void {
    this.socket.close();
  }
}
