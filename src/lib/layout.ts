import { hierarchy, treemap, treemapSquarify } from "d3-hierarchy";
import type { HierarchyRectangularNode } from "d3-hierarchy";
import type { TreeNode } from "./types";

export type LayoutNode = HierarchyRectangularNode<TreeNode>;

export interface LayoutOptions {
  /** Leaf cap applied by pruning before layout. */
  maxRects?: number;
  /** Space above a group's children, where its label goes. */
  headerHeight?: number;
  /** Gap between a group's frame and its children on the other three sides. */
  padding?: number;
  /** Gap between siblings. */
  innerPadding?: number;
  /** Target aspect ratio of squarified tiles. */
  tileRatio?: number;
}

export const DEFAULT_MAX_RECTS = 500;
export const DEFAULT_HEADER_HEIGHT = 20;
export const DEFAULT_PADDING = 2;
export const DEFAULT_INNER_PADDING = 1;
export const DEFAULT_TILE_RATIO = 1.2;

/**
 * Lays `root` out as a squarified treemap filling `width` x `height`, or
 * returns null when the area is empty. Only leaves carry size; groups are
 * the sum of their leaves.
 */
export function layoutTree(
  root: TreeNode,
  width: number,
  height: number,
  options: LayoutOptions = {}
): LayoutNode | null {
  if (width <= 0 || height <= 0) return null;

  const {
    maxRects = DEFAULT_MAX_RECTS,
    headerHeight = DEFAULT_HEADER_HEIGHT,
    padding = DEFAULT_PADDING,
    innerPadding = DEFAULT_INNER_PADDING,
    tileRatio = DEFAULT_TILE_RATIO,
  } = options;

  const ranked = hierarchy(pruneTree(root, maxRects))
    .sum((d) => (d.children?.length ? 0 : d.size))
    .sort((a, b) => (b.value ?? 0) - (a.value ?? 0));

  return treemap<TreeNode>()
    .size([width, height])
    .paddingTop(headerHeight)
    .paddingRight(padding)
    .paddingBottom(padding)
    .paddingLeft(padding)
    .paddingInner(innerPadding)
    .tile(treemapSquarify.ratio(tileRatio))(ranked);
}

/**
 * Trims `node` to at most `maxLeaves` leaves, visiting children largest first
 * and giving each subtree whatever budget its larger siblings left over.
 */
export function pruneTree(node: TreeNode, maxLeaves: number): TreeNode {
  if (!node.children?.length) return node;

  const kept: TreeNode[] = [];
  let budget = maxLeaves;
  for (const child of [...node.children].sort((a, b) => b.size - a.size)) {
    if (budget <= 0) break;
    const trimmed = child.children?.length ? pruneTree(child, budget) : child;
    kept.push(trimmed);
    budget -= countLeaves(trimmed);
  }
  return { ...node, children: kept };
}

export function countLeaves(node: TreeNode): number {
  if (!node.children?.length) return 1;
  let leaves = 0;
  for (const child of node.children) leaves += countLeaves(child);
  return leaves;
}
