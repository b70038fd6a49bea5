import ora from 'ora';
import type { AppConfig } from '../config.js';
import type { TransportFactory } from '../types/index.js';
import { createControlChannel } from '../protocols/ftp.js';
import { createTreeWalker } from '../tree/traversal.js';
import { writeTreeToJson } from '../tree/export.js';
import { countNodes } from '../tree/node.js';
import type { Logger } from '../utils/logger.js';
import colors from '../utils/colors.js';

export interface TreeRunOptions {
  logger: Logger;
  /** Receives each rendered tree line */
  write: (line: string) => void;
  /** Show a spinner on stderr while the export tree is built */
  interactive?: boolean;
  transportFactory?: TransportFactory;
}

/**
 * Connect, log in, optionally export the tree as JSON, then print it.
 */
export async function runTree(config: AppConfig, options: TreeRunOptions): Promise<void> {
  const { logger } = options;

  const session = createControlChannel({
    host: config.server,
    port: config.port,
    maxAttempts: config.maxAttempts,
    retryDelay: config.retryDelay,
    logger,
    transportFactory: options.transportFactory,
  });

  try {
    await session.connect();
    await session.login(config.username, config.password);

    const walker = createTreeWalker(session, {
      maxDepth: config.maxDepth,
      depthCeiling: config.depthCeiling,
      write: options.write,
      logger,
    });

    if (config.json) {
      const spinner = ora({
        text: `Building tree of ${colors.cyan(config.server)}`,
        stream: process.stderr,
        isSilent: !options.interactive,
      }).start();

      const root = await walker.buildTree('/').catch((error: unknown) => {
        spinner.fail('Tree building failed');
        throw error;
      });
      spinner.succeed(`Tree built (${countNodes(root)} nodes)`);

      await writeTreeToJson(root, config.output, { logger });
    }

    if (config.mode === 'bfs') {
      await walker.showTreeBfs('/');
    } else {
      await walker.showTreeDfs('/');
    }
  } finally {
    await session.quit();
  }
}
