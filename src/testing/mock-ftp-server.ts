/**
 * Mock FTP Server
 *
 * In-process FTP server over a virtual directory tree. It speaks enough of
 * the protocol to be walked: login, PASV, LIST and QUIT. Other commands get 502.
 *
 * @example
 * ```typescript
 * import { MockFtpServer } from 'ftptree/testing';
 *
 * const server = await MockFtpServer.create();
 * server.addDirectory('/pub/docs');
 * server.addFile('/pub/readme.txt', 'hello');
 *
 * // ftptree 127.0.0.1 --port <server.port>
 *
 * await server.stop();
 * ```
 */

import { EventEmitter } from 'node:events';
import * as net from 'node:net';

export interface MockFtpServerOptions {
  /** Control port; 0 picks a free one (default: 0) */
  port?: number;
  /** default: '127.0.0.1' */
  host?: string;
  /** Let `anonymous` in with any password (default: true) */
  anonymous?: boolean;
  /** default: 'user' */
  username?: string;
  /** default: 'pass' */
  password?: string;
  welcomeMessage?: string;
  /** Answer PASV with 425 instead of opening a data port (default: false) */
  refusePassive?: boolean;
  /** How long LIST waits for the data connection, in ms (default: 5000) */
  dataTimeout?: number;
}

export interface VirtualEntry {
  isDirectory: boolean;
  size: number;
  modified: Date;
}

export interface FtpSession {
  id: string;
  socket: net.Socket;
  authenticated: boolean;
  username: string | null;
  dataPort: DataPort | null;
}

/** A listening passive port and the first connection it receives */
interface DataPort {
  listener: net.Server;
  accepted: Promise<net.Socket | null>;
}

export interface MockFtpStats {
  connectionsTotal: number;
  commandsReceived: number;
  listings: number;
  commandLog: Array<{ command: string; sessionId: string; timestamp: number }>;
}

type CommandHandler = (session: FtpSession, arg: string) => void | Promise<void>;

// Fixed so listings are stable across runs
const MODIFIED = new Date('2024-01-15T10:00:00Z');

export class MockFtpServer extends EventEmitter {
  private readonly options: Required<MockFtpServerOptions>;
  private readonly entries = new Map<string, VirtualEntry>();
  private readonly sessions = new Map<string, FtpSession>();
  private listener: net.Server | null = null;
  private boundPort = 0;
  private nextSessionId = 1;
  private readonly stats: MockFtpStats = {
    connectionsTotal: 0,
    commandsReceived: 0,
    listings: 0,
    commandLog: [],
  };

  private readonly commands: Record<string, CommandHandler> = {
    USER: (session, arg) => this.user(session, arg),
    PASS: (session, arg) => this.pass(session, arg),
    PASV: (session) => this.pasv(session),
    LIST: (session, arg) => this.list(session, arg),
    QUIT: (session) => {
      reply(session, 221, 'Goodbye');
      session.socket.end();
    },
  };

  constructor(options: MockFtpServerOptions = {}) {
    super();

    this.options = {
      port: 0,
      host: '127.0.0.1',
      anonymous: true,
      username: 'user',
      password: 'pass',
      welcomeMessage: 'ftptree mock FTP server ready',
      refusePassive: false,
      dataTimeout: 5000,
      ...options,
    };

    this.addDirectory('/');
  }

  get isRunning(): boolean {
    return this.listener !== null;
  }

  /**
   * Bound control port once started; the configured one before
   */
  get port(): number {
    return this.listener ? this.boundPort : this.options.port;
  }

  get host(): string {
    return this.options.host;
  }

  get statistics(): MockFtpStats {
    return { ...this.stats, commandLog: [...this.stats.commandLog] };
  }

  // ============================================
  // Virtual tree
  // ============================================

  addDirectory(path: string): void {
    this.put(normalizePath(path), { isDirectory: true, size: 0, modified: MODIFIED });
  }

  addFile(path: string, content = ''): void {
    this.put(normalizePath(path), {
      isDirectory: false,
      size: Buffer.byteLength(content),
      modified: MODIFIED,
    });
  }

  removeEntry(path: string): boolean {
    return this.entries.delete(normalizePath(path));
  }

  clearEntries(): void {
    this.entries.clear();
    this.addDirectory('/');
  }

  /**
   * Sorted names directly under `path`
   */
  listDirectory(path: string): string[] {
    const dir = normalizePath(path);
    const prefix = dir === '/' ? '/' : `${dir}/`;
    const names = new Set<string>();

    for (const entryPath of this.entries.keys()) {
      if (entryPath === dir || !entryPath.startsWith(prefix)) continue;
      const [name] = entryPath.slice(prefix.length).split('/');
      if (name) names.add(name);
    }

    return [...names].sort();
  }

  /**
   * `ls -l` lines for the entries directly under `path`
   */
  formatListing(path: string): string[] {
    const dir = normalizePath(path);
    const lines: string[] = [];

    for (const name of this.listDirectory(dir)) {
      const entry = this.entries.get(joinPath(dir, name));
      if (!entry) continue;

      const mode = `${entry.isDirectory ? 'd' : '-'}rw-r--r--`;
      const size = String(entry.size).padStart(8);
      const day = entry.modified.toISOString().slice(0, 10);
      lines.push(`${mode} 1 user group ${size} ${day} ${name}`);
    }

    return lines;
  }

  // Parents are created as directories
  private put(path: string, entry: VirtualEntry): void {
    let parent = '';
    for (const segment of path.split('/').filter(Boolean).slice(0, -1)) {
      parent += `/${segment}`;
      if (!this.entries.has(parent)) {
        this.entries.set(parent, { isDirectory: true, size: 0, modified: MODIFIED });
      }
    }
    this.entries.set(path, entry);
  }

  // ============================================
  // Lifecycle
  // ============================================

  async start(): Promise<void> {
    if (this.listener) {
      throw new Error('Server already started');
    }

    const listener = net.createServer((socket) => this.accept(socket));
    this.boundPort = await listenOn(listener, this.options.port, this.options.host);
    listener.on('error', (err) => this.emit('serverError', err));
    this.listener = listener;
    this.emit('start');
  }

  async stop(): Promise<void> {
    const listener = this.listener;
    if (!listener) return;

    this.dropConnections();
    this.sessions.clear();

    await new Promise<void>((resolve) => listener.close(() => resolve()));
    this.listener = null;
    this.emit('stop');
  }

  /**
   * Close every control connection without a goodbye
   */
  dropConnections(): void {
    for (const session of this.sessions.values()) {
      closeDataPort(session);
      session.socket.destroy();
    }
  }

  // ============================================
  // Sessions
  // ============================================

  private accept(socket: net.Socket): void {
    const session: FtpSession = {
      id: `ftp-${this.nextSessionId++}`,
      socket,
      authenticated: false,
      username: null,
      dataPort: null,
    };

    this.sessions.set(session.id, session);
    this.stats.connectionsTotal++;
    this.emit('connect', session);

    reply(session, 220, this.options.welcomeMessage);

    let pending = '';
    // One command at a time, in arrival order
    let queue = Promise.resolve();

    socket.on('data', (chunk: Buffer) => {
      pending += chunk.toString('utf8');
      const lines = pending.split('\r\n');
      pending = lines.pop() ?? '';

      for (const line of lines.filter(Boolean)) {
        queue = queue
          .then(() => this.dispatch(session, line))
          .catch((err: unknown) => {
            this.emit('sessionError', err, session);
          });
      }
    });

    socket.on('close', () => {
      closeDataPort(session);
      this.sessions.delete(session.id);
      this.emit('disconnect', session);
    });

    socket.on('error', (err) => this.emit('sessionError', err, session));
  }

  private async dispatch(session: FtpSession, line: string): Promise<void> {
    const space = line.indexOf(' ');
    const verb = (space === -1 ? line : line.slice(0, space)).toUpperCase();
    const arg = space === -1 ? '' : line.slice(space + 1);

    this.stats.commandsReceived++;
    this.stats.commandLog.push({
      command: verb === 'PASS' ? 'PASS ****' : line,
      sessionId: session.id,
      timestamp: Date.now(),
    });
    this.emit('command', verb, arg, session);

    const handler = this.commands[verb];
    if (!handler) {
      reply(session, 502, `Command not implemented: ${verb}`);
      return;
    }
    await handler(session, arg);
  }

  // ============================================
  // Commands
  // ============================================

  private user(session: FtpSession, name: string): void {
    session.username = name;
    session.authenticated = this.options.anonymous && name.toLowerCase() === 'anonymous';

    if (session.authenticated) {
      reply(session, 230, 'Anonymous access granted');
    } else {
      reply(session, 331, 'Password required');
    }
  }

  private pass(session: FtpSession, password: string): void {
    if (session.authenticated) {
      reply(session, 230, 'Already logged in');
    } else if (session.username === this.options.username && password === this.options.password) {
      session.authenticated = true;
      reply(session, 230, 'Login successful');
    } else {
      reply(session, 530, 'Login incorrect');
    }
  }

  private async pasv(session: FtpSession): Promise<void> {
    if (!this.loggedIn(session)) return;

    if (this.options.refusePassive) {
      reply(session, 425, 'Cannot open passive connection');
      return;
    }

    closeDataPort(session);

    const listener = net.createServer();
    // Clients connect as soon as they read the 227, before sending LIST
    const accepted = new Promise<net.Socket | null>((resolve) => {
      const timer = setTimeout(() => resolve(null), this.options.dataTimeout);
      listener.once('connection', (socket) => {
        clearTimeout(timer);
        resolve(socket);
      });
      listener.once('close', () => {
        clearTimeout(timer);
        resolve(null);
      });
    });
    session.dataPort = { listener, accepted };

    const port = await listenOn(listener, 0, this.options.host);
    const address = [...this.options.host.split('.'), Math.floor(port / 256), port % 256].join(',');
    reply(session, 227, `Entering Passive Mode (${address})`);
  }

  private async list(session: FtpSession, path: string): Promise<void> {
    if (!this.loggedIn(session)) return;

    const dataPort = session.dataPort;
    if (!dataPort) {
      reply(session, 425, 'Use PASV first');
      return;
    }

    const lines = this.formatListing(path || '/');
    reply(session, 150, 'Opening data connection');

    const data = await dataPort.accepted;
    if (!data) {
      closeDataPort(session);
      reply(session, 425, 'No data connection');
      return;
    }

    const payload = lines.map((line) => `${line}\r\n`).join('');
    await new Promise<void>((resolve) => data.end(payload, () => resolve()));
    closeDataPort(session);
    this.stats.listings++;

    reply(session, 226, 'Transfer complete');
  }

  private loggedIn(session: FtpSession): boolean {
    if (!session.authenticated) {
      reply(session, 530, 'Please login first');
    }
    return session.authenticated;
  }

  static async create(options: MockFtpServerOptions = {}): Promise<MockFtpServer> {
    const server = new MockFtpServer(options);
    await server.start();
    return server;
  }
}

function reply(session: FtpSession, code: number, text: string): void {
  if (!session.socket.destroyed) {
    session.socket.write(`${code} ${text}\r\n`);
  }
}

function closeDataPort(session: FtpSession): void {
  session.dataPort?.listener.close();
  session.dataPort = null;
}

function listenOn(listener: net.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    listener.once('error', reject);
    listener.listen(port, host, () => {
      listener.removeListener('error', reject);
      const address = listener.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}

function normalizePath(path: string): string {
  const collapsed = `/${path}`.replace(/\/+/g, '/');
  return collapsed.length > 1 && collapsed.endsWith('/') ? collapsed.slice(0, -1) : collapsed;
}

function joinPath(dir: string, name: string): string {
  return dir === '/' ? `/${name}` : `${dir}/${name}`;
}

