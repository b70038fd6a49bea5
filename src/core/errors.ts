export class FtpTreeError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    suggestions: string[] = [],
    retriable = false,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'FtpTreeError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Error thrown when a transport to the server cannot be opened
 */
export class ConnectionError extends FtpTreeError {
  host?: string;
  port?: number;
  code?: string;

  constructor(
    message: string,
    options?: {
      host?: string;
      port?: number;
      code?: string;
      retriable?: boolean;
      cause?: unknown;
    }
  ) {
    super(
      message,
      [
        'Verify the host and port are correct and the FTP service is running.',
        'Check network connectivity and firewall rules.',
        'Passive data ports must also be reachable from this machine.'
      ],
      options?.retriable ?? true,
      options?.cause
    );
    this.name = 'ConnectionError';
    this.host = options?.host;
    this.port = options?.port;
    this.code = options?.code;
  }
}

/**
 * Error thrown when a read keeps failing after every reconnection attempt
 */
export class ProtocolIOError extends FtpTreeError {
  attempts: number;

  constructor(message: string, options: { attempts: number; cause?: unknown }) {
    super(
      message,
      [
        'The control connection dropped repeatedly; check the server logs.',
        'Raise FTPTREE_RETRY_ATTEMPTS or FTPTREE_RETRY_DELAY_MS for flaky links.'
      ],
      false,
      options.cause
    );
    this.name = 'ProtocolIOError';
    this.attempts = options.attempts;
  }
}

/**
 * Error thrown when the server rejects USER or PASS
 */
export class AuthenticationError extends FtpTreeError {
  reply?: string;

  constructor(message: string, options?: { reply?: string }) {
    super(
      message,
      [
        'Verify the username and password.',
        'Anonymous access may be disabled on this server.'
      ],
      false
    );
    this.name = 'AuthenticationError';
    this.reply = options?.reply;
  }
}

/**
 * Error thrown when a PASV reply cannot be parsed
 */
export class ProtocolParseError extends FtpTreeError {
  reply?: string;

  constructor(message: string, options?: { reply?: string }) {
    super(
      message,
      [
        'The server may not support passive mode.',
        'Expected a reply like: 227 Entering Passive Mode (h1,h2,h3,h4,p1,p2)'
      ],
      false
    );
    this.name = 'ProtocolParseError';
    this.reply = options?.reply;
  }
}

/**
 * Error thrown when the exported tree cannot be written
 */
export class ExportWriteError extends FtpTreeError {
  file: string;

  constructor(message: string, options: { file: string; cause?: unknown }) {
    super(
      message,
      [
        'Check that the destination directory exists.',
        'Ensure the file is writable by the current user.'
      ],
      false,
      options.cause
    );
    this.name = 'ExportWriteError';
    this.file = options.file;
  }
}

/**
 * Error thrown when a state precondition is not met
 */
export class StateError extends FtpTreeError {
  expectedState?: string;
  actualState?: string;

  constructor(
    message: string,
    options?: {
      expectedState?: string;
      actualState?: string;
    }
  ) {
    super(
      message,
      [
        'Call connect() before issuing commands.',
        'Check that the session was not disconnected by a failed reconnection.'
      ],
      false
    );
    this.name = 'StateError';
    this.expectedState = options?.expectedState;
    this.actualState = options?.actualState;
  }
}

/**
 * Error thrown when configuration is invalid or missing
 */
export class ConfigurationError extends FtpTreeError {
  configKey?: string;

  constructor(message: string, options?: { configKey?: string }) {
    super(
      message,
      [
        'Run with --help to see the accepted arguments.',
        'Check the FTPTREE_* environment variables.'
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}
