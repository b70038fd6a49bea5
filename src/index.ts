/**
 * ftptree
 *
 * Walks an FTP server's directory hierarchy and renders it as a text tree or
 * a JSON document.
 *
 * @example
 * ```typescript
 * import { withSession, createTreeWalker } from 'ftptree';
 *
 * await withSession(
 *   { host: 'ftp.example.com' },
 *   { username: 'anonymous', password: 'anonymous@example.com' },
 *   (session) => createTreeWalker(session, { maxDepth: 2 }).showTreeDfs('/')
 * );
 * ```
 */

// Control channel
export {
  ControlChannel,
  createControlChannel,
  withSession,
  isPositiveLoginReply,
  isCompletionLine,
  DEFAULT_PORT,
  DEFAULT_RETRY_POLICY,
} from './protocols/ftp.js';
export { ResponseCode, responseCode, hasCode, classifyResponse } from './protocols/codes.js';
export { parsePassiveReply, openDataChannel, type PassiveControl } from './protocols/passive.js';
export { classify, extractName, parseEntry, splitListing } from './protocols/listing.js';

// Transport
export {
  SocketTransport,
  connectSocket,
  createSocketTransportFactory,
  type SocketTransportOptions,
} from './transport/socket.js';

// Tree
export { TreeWalker, createTreeWalker, childPath, DEFAULT_DEPTH_CEILING } from './tree/traversal.js';
export { createTreeNode, addChild, countNodes } from './tree/node.js';
export { writeTreeToJson, serializeTree, DEFAULT_EXPORT_FILE } from './tree/export.js';

// Configuration
export {
  resolveConfig,
  DEFAULT_USERNAME,
  DEFAULT_PASSWORD,
  type CliInput,
  type AppConfig,
} from './config.js';

// Errors
export {
  FtpTreeError,
  ConnectionError,
  ProtocolIOError,
  AuthenticationError,
  ProtocolParseError,
  ExportWriteError,
  StateError,
  ConfigurationError,
} from './core/errors.js';

// Logging
export { Logger, getLogger, setLogger, type LogLevel, type LoggerOptions } from './utils/logger.js';

export type * from './types/index.js';

export { VERSION } from './constants.js';
