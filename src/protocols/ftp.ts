/**
 * FTP control channel
 *
 * Owns one control connection: sends commands, reads single and multi-line
 * replies, authenticates, and transparently reconnects when a read fails.
 * Directory listings are fetched over a passive data connection.
 *
 * @module ftptree/protocols/ftp
 */

import type {
  Client,
  ControlChannelConfig,
  RetryPolicy,
  RetryState,
  SessionState,
  Transport,
  TransportFactory,
} from '../types/index.js';
import {
  AuthenticationError,
  ConnectionError,
  ProtocolIOError,
  ProtocolParseError,
  StateError,
} from '../core/errors.js';
import { Logger, getLogger } from '../utils/logger.js';
import { createSocketTransportFactory } from '../transport/socket.js';
import { ResponseCode, hasCode } from './codes.js';
import { openDataChannel } from './passive.js';

export const DEFAULT_PORT = 21;

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  retryDelay: 5000,
};

/**
 * Replies that let a login proceed: 230 (logged in) or 331 (need password)
 */
export function isPositiveLoginReply(reply: string | null): reply is string {
  return (
    reply !== null &&
    (hasCode(reply, ResponseCode.USER_LOGGED_IN) || hasCode(reply, ResponseCode.NEED_PASSWORD))
  );
}

/**
 * Completion lines that end a multi-line read
 */
export function isCompletionLine(line: string): boolean {
  return (
    hasCode(line, ResponseCode.CLOSING_DATA_CONNECTION) ||
    hasCode(line, ResponseCode.SERVICE_UNAVAILABLE)
  );
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * FTP control channel
 *
 * @example
 * ```typescript
 * const session = createControlChannel({ host: 'ftp.example.com' });
 *
 * await session.connect();
 * await session.login('anonymous', 'anonymous@example.com');
 * const listing = await session.listDirectory('/pub');
 * session.disconnect();
 * ```
 */
export class ControlChannel implements Client {
  private transport: Transport | null = null;
  private currentState: SessionState = 'disconnected';
  private readonly config: { host: string; port: number } & RetryPolicy;
  private readonly transportFactory: TransportFactory;
  private readonly logger: Logger;
  private retry = { attempts: 0 };

  constructor(config: ControlChannelConfig) {
    this.config = {
      host: config.host,
      port: config.port ?? DEFAULT_PORT,
      maxAttempts: config.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      retryDelay: config.retryDelay ?? DEFAULT_RETRY_POLICY.retryDelay,
    };

    if (this.config.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be at least 1');
    }

    this.transportFactory =
      config.transportFactory ?? createSocketTransportFactory({ timeout: config.timeout });
    this.logger = config.logger ?? getLogger();
  }

  // ==========================================================================
  // Properties
  // ==========================================================================

  get host(): string {
    return this.config.host;
  }

  get port(): number {
    return this.config.port;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Attempts used by the most recent read operation
   */
  get retryState(): RetryState {
    return { attempts: this.retry.attempts, maxAttempts: this.config.maxAttempts };
  }

  isConnected(): boolean {
    return this.transport !== null && !this.transport.closed;
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  /**
   * Open the control connection and discard the server greeting
   */
  async connect(): Promise<void> {
    this.closeTransport();

    this.transport = await this.openTransport();
    this.currentState = 'connected';

    const greeting = await this.readLine();
    if (greeting !== null) {
      this.logger.info(greeting);
    }
  }

  async login(username: string, password: string): Promise<void> {
    await this.sendCommand(`USER ${username}`);
    const userReply = await this.readLine();
    this.logReply(userReply);
    if (!isPositiveLoginReply(userReply)) {
      throw new AuthenticationError('Authentication failed: Invalid credentials', {
        reply: userReply ?? undefined,
      });
    }

    await this.sendCommand(`PASS ${password}`);
    const passReply = await this.readLine();
    this.logReply(passReply);
    if (!isPositiveLoginReply(passReply)) {
      throw new AuthenticationError('Authentication failed: Invalid credentials', {
        reply: passReply ?? undefined,
      });
    }

    this.currentState = 'authenticated';
  }

  /**
   * Replace the control transport with a fresh one to the same address.
   *
   * Only the connection is restored; the session is not logged in again.
   */
  async reconnect(): Promise<void> {
    this.closeTransport();

    const { host, port, maxAttempts, retryDelay } = this.config;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        this.transport = await this.openTransport();
        this.currentState = 'connected';
        this.logger.info(`Reconnected to ${host}:${port}`);
        return;
      } catch (error) {
        lastError = error;
        this.logger.warn(
          `Reconnection attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}`
        );
        if (attempt < maxAttempts) {
          await sleep(retryDelay);
        }
      }
    }

    this.logger.error('Reconnection failed.');
    throw new ConnectionError(`Reconnection to ${host}:${port} failed after ${maxAttempts} attempts`, {
      host,
      port,
      retriable: false,
      cause: lastError,
    });
  }

  /**
   * Close the control connection. Safe to call repeatedly.
   */
  disconnect(): void {
    if (this.closeTransport()) {
      this.logger.info('Disconnected from the FTP server.');
    }
  }

  /**
   * Say goodbye to the server, then disconnect
   */
  async quit(): Promise<void> {
    const transport = this.transport;
    if (transport && !transport.closed) {
      try {
        await this.sendCommand('QUIT');
        const reply = await transport.readLine();
        if (reply !== null) this.logger.wire('<<<', reply);
      } catch (error) {
        this.logger.debug(`QUIT failed: ${errorMessage(error)}`);
      }
    }
    this.disconnect();
  }

  // ==========================================================================
  // Command/Response Handling
  // ==========================================================================

  async sendCommand(command: string): Promise<void> {
    const transport = this.requireTransport();

    const displayCommand = command.startsWith('PASS ') ? 'PASS ****' : command;
    this.logger.wire('>>>', displayCommand);

    await transport.writeLine(command);
  }

  /**
   * Read one reply line; `null` once the server has closed the connection
   */
  async readLine(): Promise<string | null> {
    return this.withRetry(async (transport) => {
      const line = await transport.readLine();
      if (line !== null) this.logger.wire('<<<', line);
      return line;
    });
  }

  /**
   * Read lines up to and including a 226 or 421 line (or end of stream)
   */
  async readMultiline(): Promise<string> {
    return this.withRetry(async (transport) => {
      let response = '';

      for (;;) {
        const line = await transport.readLine();
        if (line === null) break;

        this.logger.wire('<<<', line);
        response += line + '\n';

        if (isCompletionLine(line)) break;
      }

      return response;
    });
  }

  // ==========================================================================
  // Directory Listing
  // ==========================================================================

  /**
   * Raw `LIST` output for a path, one entry per line.
   *
   * Returns `''` when the server offers no usable passive connection.
   */
  async listDirectory(path: string): Promise<string> {
    let dataChannel: Transport | null;
    try {
      dataChannel = await openDataChannel(this, this.transportFactory);
    } catch (error) {
      if (error instanceof ProtocolParseError) {
        this.logger.warn(`${error.message}; listing of ${path} skipped`);
        return '';
      }
      throw error;
    }

    if (!dataChannel) {
      this.logger.warn(`No data connection available; listing of ${path} skipped`);
      return '';
    }

    let listing = '';
    try {
      await this.sendCommand(`LIST ${path}`);

      for (let line = await dataChannel.readLine(); line !== null; line = await dataChannel.readLine()) {
        listing += line + '\n';
      }
    } catch (error) {
      if (error instanceof StateError) throw error;
      throw new ProtocolIOError(`Transfer of the listing for ${path} failed: ${errorMessage(error)}`, {
        attempts: 1,
        cause: error,
      });
    } finally {
      dataChannel.close();
    }

    await this.readMultiline();
    return listing;
  }

  // ==========================================================================
  // Utilities
  // ==========================================================================

  private async withRetry<T>(operation: (transport: Transport) => Promise<T>): Promise<T> {
    const { maxAttempts } = this.config;
    let lastError: unknown;

    this.retry.attempts = 0;

    while (this.retry.attempts < maxAttempts) {
      const transport = this.requireTransport();
      this.retry.attempts++;

      try {
        return await operation(transport);
      } catch (error) {
        lastError = error;
        this.logger.warn(`Reading response failed (${errorMessage(error)}); attempting to reconnect...`);
      }

      if (this.retry.attempts >= maxAttempts) break;

      try {
        await this.reconnect();
      } catch (reconnectError) {
        throw new ProtocolIOError('Reading response from server failed: could not reconnect.', {
          attempts: this.retry.attempts,
          cause: reconnectError,
        });
      }
    }

    throw new ProtocolIOError('Reading response from server failed after several attempts.', {
      attempts: this.retry.attempts,
      cause: lastError,
    });
  }

  private async openTransport(): Promise<Transport> {
    const { host, port } = this.config;
    try {
      return await this.transportFactory(host, port);
    } catch (error) {
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(`Could not connect to ${host}:${port}: ${errorMessage(error)}`, {
        host,
        port,
        cause: error,
      });
    }
  }

  private requireTransport(): Transport {
    if (!this.transport) {
      throw new StateError('Not connected to FTP server. Call connect() first.', {
        expectedState: 'connected',
        actualState: this.currentState,
      });
    }
    return this.transport;
  }

  /**
   * @returns whether an open transport was closed
   */
  private closeTransport(): boolean {
    const transport = this.transport;
    this.transport = null;
    this.currentState = 'disconnected';

    if (transport && !transport.closed) {
      transport.close();
      return true;
    }
    return false;
  }

  private logReply(reply: string | null): void {
    this.logger.info(reply ?? '(no reply)');
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createControlChannel(config: ControlChannelConfig): ControlChannel {
  return new ControlChannel(config);
}

/**
 * Run an operation against a logged-in session, disconnecting afterwards
 *
 * @example
 * ```typescript
 * const listing = await withSession(
 *   { host: 'ftp.example.com' },
 *   { username: 'anonymous', password: 'anonymous@example.com' },
 *   (session) => session.listDirectory('/')
 * );
 * ```
 */
export async function withSession<T>(
  config: ControlChannelConfig,
  credentials: { username: string; password: string },
  operation: (session: ControlChannel) => Promise<T>
): Promise<T> {
  const session = createControlChannel(config);

  try {
    await session.connect();
    await session.login(credentials.username, credentials.password);
    return await operation(session);
  } finally {
    await session.quit();
  }
}
