import { Command, CommanderError } from 'commander';
import type { TransportFactory } from '../types/index.js';
import { type CliInput, DEFAULT_PASSWORD, DEFAULT_USERNAME, resolveConfig } from '../config.js';
import { DEFAULT_PORT } from '../protocols/ftp.js';
import { DEFAULT_EXPORT_FILE } from '../tree/export.js';
import { Logger, setLogger } from '../utils/logger.js';
import colors from '../utils/colors.js';
import { VERSION } from '../constants.js';
import { runTree } from './handler.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  /** Spinner on stderr while the export tree is built */
  interactive?: boolean;
  transportFactory?: TransportFactory;
}

interface CliOptions {
  json?: boolean;
  output?: string;
  port?: string;
  verbose?: boolean;
}

const stripNewline = (text: string) => text.replace(/\n$/, '');

export function createProgram(io: CliIO, onRun: (input: CliInput) => Promise<void>): Command {
  const program = new Command();

  program
    .name('ftptree')
    .description('Print the directory tree of an FTP server, depth-first or breadth-first')
    .version(VERSION)
    .argument('[server]', 'The address of the FTP server to connect to')
    .argument('[username]', 'Username for the FTP server', DEFAULT_USERNAME)
    .argument('[password]', 'Password for the FTP server', DEFAULT_PASSWORD)
    .argument('[max-depth]', 'The maximum depth for tree traversal (default: unbounded)')
    .argument('[method]', 'Traversal method: dfs (depth-first) or bfs (breadth-first)', 'dfs')
    .option('--json', 'Also write the tree as JSON')
    .option('-o, --output <file>', 'File the JSON tree is written to', DEFAULT_EXPORT_FILE)
    .option('-p, --port <port>', 'Control connection port', String(DEFAULT_PORT))
    .option('--verbose', 'Log protocol traffic')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(stripNewline(str)),
      writeErr: (str) => io.err(stripNewline(str)),
    })
    .action(
      async (
        server: string | undefined,
        username: string,
        password: string,
        maxDepth: string | undefined,
        method: string,
        options: CliOptions
      ) => {
        if (!server) {
          program.outputHelp();
          return;
        }

        await onRun({
          server,
          username,
          password,
          maxDepth,
          mode: method,
          json: options.json ?? false,
          output: options.output,
          port: options.port,
          verbose: options.verbose ?? false,
        });
      }
    );

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 *
 * @returns the process exit code
 */
export async function run(args: string[], io: CliIO): Promise<number> {
  const logger = new Logger({
    level: 'info',
    timestamp: false,
    out: io.out,
    err: io.err,
  });
  setLogger(logger);

  const program = createProgram(io, async (input) => {
    const config = resolveConfig(input, io.env ?? process.env);
    if (config.verbose) {
      logger.setLevel('debug');
    }

    await runTree(config, {
      logger,
      write: io.out,
      interactive: io.interactive,
      transportFactory: io.transportFactory,
    });
  });

  try {
    await program.parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const message = error instanceof Error ? error.message : String(error);
    io.err(colors.red(`An unexpected error occurred. The application will close: ${message}`));
    if (error instanceof Error && logger.shouldLog('debug')) {
      logger.logError(error);
    }
    return 1;
  }
}
