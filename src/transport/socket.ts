/**
 * Socket Transport
 *
 * Line-buffered wrapper over a plain TCP socket, used for both the control
 * connection and passive data connections.
 */

import { Socket } from 'node:net';
import type { Transport, TransportFactory } from '../types/index.js';
import { ConnectionError } from '../core/errors.js';
import { DEFAULT_CONNECT_TIMEOUT_MS } from '../constants.js';

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
}

export interface SocketTransportOptions {
  /** Connect timeout in ms (default: DEFAULT_CONNECT_TIMEOUT_MS) */
  timeout?: number;
  /** @internal Socket factory for testing */
  _socketFactory?: () => Socket;
}

export class SocketTransport implements Transport {
  private buffer = '';
  private lines: string[] = [];
  private ended = false;
  private failure: Error | null = null;
  private pending: PendingRead[] = [];
  private isClosed = false;

  constructor(private readonly socket: Socket) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('end', () => this.onEnd());
    socket.on('close', () => this.onEnd());
    socket.on('error', (err: Error) => this.onError(err));
  }

  get closed(): boolean {
    return this.isClosed;
  }

  readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  writeLine(line: string): Promise<void> {
    if (this.isClosed || this.socket.destroyed) {
      return Promise.reject(new Error('Transport is closed'));
    }

    return new Promise((resolve, reject) => {
      this.socket.write(line + '\r\n', 'utf8', (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.socket.destroy();
    this.onEnd();
  }

  // ==========================================================================
  // Buffering
  // ==========================================================================

  private onData(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      this.lines.push(stripCarriageReturn(this.buffer.substring(0, newline)));
      this.buffer = this.buffer.substring(newline + 1);
      newline = this.buffer.indexOf('\n');
    }

    this.drain();
  }

  private onEnd(): void {
    if (this.ended) return;
    // An unterminated last line still counts
    if (this.buffer.length > 0) {
      this.lines.push(stripCarriageReturn(this.buffer));
      this.buffer = '';
    }
    this.ended = true;
    this.drain();
  }

  private onError(err: Error): void {
    this.failure = err;
    this.drain();
  }

  private drain(): void {
    while (this.pending.length > 0) {
      const line = this.lines.shift();
      if (line !== undefined) {
        this.pending.shift()?.resolve(line);
        continue;
      }
      if (this.failure) {
        const failure = this.failure;
        for (const read of this.pending.splice(0)) {
          read.reject(failure);
        }
        return;
      }
      if (this.ended) {
        for (const read of this.pending.splice(0)) {
          read.resolve(null);
        }
      }
      return;
    }
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Open a TCP connection and wrap it as a line transport.
 */
export function connectSocket(
  host: string,
  port: number,
  options: SocketTransportOptions = {}
): Promise<Transport> {
  const timeout = options.timeout ?? DEFAULT_CONNECT_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    const socket = options._socketFactory ? options._socketFactory() : new Socket();
    socket.setTimeout(timeout);

    const cleanup = () => {
      socket.removeListener('connect', onConnect);
      socket.removeListener('error', onError);
      socket.removeListener('timeout', onTimeout);
      socket.setTimeout(0);
    };

    const onConnect = () => {
      cleanup();
      resolve(new SocketTransport(socket));
    };

    const onError = (err: NodeJS.ErrnoException) => {
      cleanup();
      socket.destroy();
      reject(
        new ConnectionError(`Could not connect to ${host}:${port}: ${err.message}`, {
          host,
          port,
          code: err.code,
          cause: err,
        })
      );
    };

    const onTimeout = () => {
      cleanup();
      socket.destroy();
      reject(
        new ConnectionError(`Connection to ${host}:${port} timed out after ${timeout}ms`, {
          host,
          port,
          code: 'ETIMEDOUT',
        })
      );
    };

    socket.on('connect', onConnect);
    socket.on('error', onError);
    socket.on('timeout', onTimeout);

    socket.connect(port, host);
  });
}

/**
 * Transport factory backed by plain TCP sockets.
 */
export function createSocketTransportFactory(options: SocketTransportOptions = {}): TransportFactory {
  return (host, port) => connectSocket(host, port, options);
}
