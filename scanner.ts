import { readdir, stat } from "node:fs/promises";
import { join, extname, basename } from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { rootColour, toHexColour } from "./src/lib/colors";
import type { TreeNode } from "./src/lib/types";

export type { TreeNode };

const execFileAsync = promisify(execFile);

export const DEFAULT_MAX_DEPTH = 8;
const FOLD_FROM_DEPTH = 2;
const KEEP_CHILDREN = 30;
const MAX_OPEN_HANDLES = 64;
const DU_TIMEOUT_MS = 300_000;

export interface ScanOptions {
  maxDepth?: number;
  /** Hue (0..1) of the first top-level family; the rest are spread evenly after it. */
  hueOffset?: number;
}

/** Caps concurrent fs calls for one scan, so wide trees don't hit EMFILE. */
class HandlePool {
  private inUse = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly limit: number) {}

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.inUse < this.limit) {
      this.inUse++;
    } else {
      // The releasing task hands its handle straight over
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }
    try {
      return await task();
    } finally {
      const next = this.waiting.shift();
      if (next) next();
      else this.inUse--;
    }
  }
}

interface ScanState {
  pool: HandlePool;
  maxDepth: number;
}

/**
 * Reads `dirPath` into a tree sized in bytes, children largest first.
 * Each top-level entry gets its own root colour, so every subtree renders as
 * a distinct colour family; entries that already carry one keep it.
 */
export async function scanDirectory(dirPath: string, options: ScanOptions = {}): Promise<TreeNode> {
  const state: ScanState = {
    pool: new HandlePool(MAX_OPEN_HANDLES),
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  };
  const root = await scanNode(dirPath, 0, state);
  if (root.children) {
    root.children = assignFamilyColours(root.children, options.hueOffset ?? 0);
  }
  return root;
}

export function assignFamilyColours(children: TreeNode[], hueOffset: number): TreeNode[] {
  const families = children.filter((c) => !c.dummy).length;
  let index = 0;
  return children.map((child) => {
    if (child.dummy) return child;
    const hue = hueOffset + index++ / families;
    if (child.colour !== undefined) return child;
    return { ...child, colour: toHexColour(rootColour(hue)) };
  });
}

async function scanNode(dirPath: string, depth: number, state: ScanState): Promise<TreeNode> {
  const node: TreeNode = {
    name: basename(dirPath) || dirPath,
    path: dirPath,
    size: 0,
    type: "directory",
  };

  if (depth >= state.maxDepth) {
    node.truncated = true;
    node.size = await diskUsage(dirPath);
    return node;
  }

  // Unreadable directories show up empty
  const entries = await state.pool
    .run(() => readdir(dirPath, { withFileTypes: true }))
    .catch(() => null);
  if (!entries) return node;

  const scanned = await Promise.all(
    entries.map(async (entry): Promise<TreeNode | null> => {
      const fullPath = join(dirPath, entry.name);
      if (entry.isSymbolicLink()) return null;
      if (entry.isDirectory()) {
        return scanNode(fullPath, depth + 1, state);
      }
      if (!entry.isFile()) return null;
      try {
        const { size } = await state.pool.run(() => stat(fullPath));
        const extension = extname(entry.name).toLowerCase();
        return {
          name: entry.name,
          path: fullPath,
          size,
          type: "file",
          extension: extension || undefined,
        };
      } catch {
        return null;
      }
    })
  );

  let children = scanned.filter((c): c is TreeNode => c !== null);
  children.sort((a, b) => b.size - a.size);
  if (depth >= FOLD_FROM_DEPTH && children.length > KEEP_CHILDREN) {
    children = foldTail(dirPath, children);
  }

  node.children = children;
  node.size = children.reduce((sum, c) => sum + c.size, 0);
  return node;
}

/** Keeps the largest KEEP_CHILDREN entries and merges the rest into one dummy leaf. */
function foldTail(dirPath: string, sorted: TreeNode[]): TreeNode[] {
  const tail = sorted.slice(KEEP_CHILDREN);
  const tailSize = tail.reduce((sum, c) => sum + c.size, 0);
  const kept = sorted.slice(0, KEEP_CHILDREN);
  if (tailSize === 0) return kept;
  return [
    ...kept,
    {
      name: `(${tail.length} smaller items)`,
      path: join(dirPath, "__other__"),
      size: tailSize,
      type: "file",
      dummy: true,
    },
  ];
}

/** Size of a directory below the depth limit, from `du -sk`; 0 when du fails. */
async function diskUsage(dirPath: string): Promise<number> {
  try {
    const { stdout } = await execFileAsync("du", ["-sk", dirPath], { timeout: DU_TIMEOUT_MS });
    const kb = Number.parseInt(stdout.split("\t")[0], 10);
    return Number.isNaN(kb) ? 0 : kb * 1024;
  } catch {
    return 0;
  }
}
