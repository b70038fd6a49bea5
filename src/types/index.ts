import type { Logger } from '../utils/logger.js';

// ============================================================================
// Transport
// ============================================================================

/**
 * A line-oriented byte stream to the server.
 *
 * Owned by exactly one channel; replaced as a whole on reconnect.
 */
export interface Transport {
  /** Next line without its terminator, or `null` once the peer has closed the stream */
  readLine(): Promise<string | null>;
  /** Write `line` followed by CRLF */
  writeLine(line: string): Promise<void>;
  close(): void;
  readonly closed: boolean;
}

export type TransportFactory = (host: string, port: number) => Promise<Transport>;

// ============================================================================
// Control channel
// ============================================================================

export type SessionState = 'disconnected' | 'connected' | 'authenticated';

export type ResponseClass =
  | 'preliminary'
  | 'success'
  | 'intermediate'
  | 'transient'
  | 'permanent'
  | 'unknown';

export interface RetryPolicy {
  /** Reads (and reconnect attempts) allowed per operation (default: 3) */
  maxAttempts: number;
  /** Fixed delay between reconnect attempts in ms (default: 5000) */
  retryDelay: number;
}

export interface RetryState {
  readonly attempts: number;
  readonly maxAttempts: number;
}

export interface ControlChannelConfig {
  host: string;
  /** default: 21 */
  port?: number;
  /** default: 3 */
  maxAttempts?: number;
  /** default: 5000 */
  retryDelay?: number;
  /** Connect timeout in ms for the default socket transport (default: 30000) */
  timeout?: number;
  logger?: Logger;
  /** Opens control and data transports; defaults to plain TCP sockets */
  transportFactory?: TransportFactory;
}

/**
 * The capability surface of one FTP session.
 */
export interface Client {
  connect(): Promise<void>;
  login(username: string, password: string): Promise<void>;
  reconnect(): Promise<void>;
  readLine(): Promise<string | null>;
  readMultiline(): Promise<string>;
  sendCommand(command: string): Promise<void>;
  disconnect(): void;
  listDirectory(path: string): Promise<string>;
}

/**
 * The slice of a session the traversal engine needs.
 */
export type DirectoryLister = Pick<Client, 'listDirectory'>;

// ============================================================================
// Listing & tree
// ============================================================================

export interface Entry {
  name: string;
  isDirectory: boolean;
}

export interface TreeNode {
  name: string;
  children: TreeNode[];
}

export type TraversalMode = 'dfs' | 'bfs';

export interface TraversalOptions {
  /** Inclusive depth bound; `Infinity` for none */
  maxDepth?: number;
  /** Hard recursion limit applied even when maxDepth is unbounded (default: 64) */
  depthCeiling?: number;
  /** Receives each rendered tree line (default: process.stdout) */
  write?: (line: string) => void;
  logger?: Logger;
}

export interface PassiveAddress {
  host: string;
  port: number;
}
