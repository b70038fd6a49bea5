/**
 * Tree traversal
 *
 * Walks a remote hierarchy one `LIST` at a time, to an inclusive depth bound.
 * Depth 0 is the root: its listing is always fetched, and a directory found at
 * depth d is fetched only while d <= maxDepth.
 */

import type { DirectoryLister, TraversalOptions, TreeNode } from '../types/index.js';
import { Logger, getLogger } from '../utils/logger.js';
import { classify, extractName, splitListing } from '../protocols/listing.js';
import { createTreeNode } from './node.js';

export const DEFAULT_DEPTH_CEILING = 64;

const BRANCH = '|-- ';
const LAST_BRANCH = '`-- ';
const PIPE_INDENT = '|   ';
const BLANK_INDENT = '    ';
const BFS_INDENT = '   ';
const BFS_BRANCH = '|__ ';

/**
 * Path of an entry inside `parent`; the root does not double its separator
 */
export function childPath(parent: string, name: string): string {
  return parent === '/' ? parent + name : parent + '/' + name;
}

export class TreeWalker {
  private readonly maxDepth: number;
  private readonly depthCeiling: number;
  private readonly write: (line: string) => void;
  private readonly logger: Logger;

  constructor(
    private readonly client: DirectoryLister,
    options: TraversalOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? Infinity;
    this.depthCeiling = options.depthCeiling ?? DEFAULT_DEPTH_CEILING;
    this.write = options.write ?? ((line) => process.stdout.write(line + '\n'));
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Print the hierarchy depth-first, pre-order.
   *
   * The last raw line of a listing gets the closing branch, even when that
   * line has a blank name and is not printed.
   */
  async showTreeDfs(rootPath: string = '/'): Promise<void> {
    await this.dfs(rootPath, '', 0);
  }

  /**
   * Print the hierarchy level by level, indenting by depth
   */
  async showTreeBfs(rootPath: string = '/'): Promise<void> {
    const pathsQueue: string[] = [rootPath];
    const depthQueue: number[] = [0];

    for (;;) {
      const currentPath = pathsQueue.shift();
      const currentDepth = depthQueue.shift();
      if (currentPath === undefined || currentDepth === undefined) break;

      if (!this.canExpand(currentDepth, currentPath)) continue;

      const contents = splitListing(await this.client.listDirectory(currentPath));

      for (const item of contents) {
        const itemName = extractName(item);
        if (!itemName) continue;

        this.write(BFS_INDENT.repeat(currentDepth) + BFS_BRANCH + itemName);

        if (classify(item)) {
          pathsQueue.push(childPath(currentPath, itemName));
          depthQueue.push(currentDepth + 1);
        }
      }
    }
  }

  /**
   * Build the hierarchy in memory, for export.
   *
   * Each node is named after its own path (the root of `/` is `/`, a
   * directory is its full path); files are named as listed. Directories
   * beyond the depth bound appear as childless nodes.
   */
  async buildTree(rootPath: string = '/'): Promise<TreeNode> {
    return this.build(rootPath, 0);
  }

  // ==========================================================================
  // Recursion
  // ==========================================================================

  private async dfs(path: string, prefix: string, depth: number): Promise<void> {
    if (!this.canExpand(depth, path)) return;

    const contents = splitListing(await this.client.listDirectory(path));

    for (let i = 0; i < contents.length; i++) {
      const item = contents[i];
      const itemName = extractName(item);
      if (!itemName) continue;

      const isLastItem = i === contents.length - 1;
      this.write(prefix + (isLastItem ? LAST_BRANCH : BRANCH) + itemName);

      if (classify(item)) {
        const childPrefix = prefix + (isLastItem ? BLANK_INDENT : PIPE_INDENT);
        await this.dfs(childPath(path, itemName), childPrefix, depth + 1);
      }
    }
  }

  private async build(path: string, depth: number): Promise<TreeNode> {
    const node = createTreeNode(extractName(path));
    if (!this.canExpand(depth, path)) return node;

    const contents = splitListing(await this.client.listDirectory(path));

    for (const item of contents) {
      const itemName = extractName(item);
      if (!itemName) continue;

      if (classify(item)) {
        node.children.push(await this.build(childPath(path, itemName), depth + 1));
      } else {
        node.children.push(createTreeNode(itemName));
      }
    }

    return node;
  }

  private canExpand(depth: number, path: string): boolean {
    if (depth > this.maxDepth) return false;

    if (depth > this.depthCeiling) {
      this.logger.warn(`Depth ceiling ${this.depthCeiling} reached at ${path}; not descending further`);
      return false;
    }

    return true;
  }
}

export function createTreeWalker(client: DirectoryLister, options?: TraversalOptions): TreeWalker {
  return new TreeWalker(client, options);
}
