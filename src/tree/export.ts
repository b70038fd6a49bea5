import { writeFile } from 'node:fs/promises';
import type { TreeNode } from '../types/index.js';
import { ExportWriteError } from '../core/errors.js';
import { Logger, getLogger } from '../utils/logger.js';
import { tryFn } from '../utils/try-fn.js';

export const DEFAULT_EXPORT_FILE = 'directory_structure.json';

/**
 * Pretty-printed JSON of `{ name, children }` nodes
 */
export function serializeTree(root: TreeNode | null): string {
  return JSON.stringify(root, null, 2);
}

/**
 * Write the tree as JSON.
 *
 * Never throws: a failed write is logged as an ExportWriteError and reported
 * through the return value.
 */
export async function writeTreeToJson(
  root: TreeNode | null,
  filename: string = DEFAULT_EXPORT_FILE,
  options: { logger?: Logger } = {}
): Promise<boolean> {
  const logger = options.logger ?? getLogger();

  logger.info(`Writing the JSON representation to ${filename}...`);

  const [ok, cause] = await tryFn(() => writeFile(filename, serializeTree(root), 'utf8'));
  if (!ok) {
    logger.logError(
      new ExportWriteError(`An error occurred while writing to the JSON file: ${cause.message}`, {
        file: filename,
        cause,
      })
    );
    return false;
  }

  logger.info(`JSON file written successfully to ${filename}`);
  return true;
}
