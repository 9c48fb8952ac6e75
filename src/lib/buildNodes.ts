import { parseHexColour } from "./colors";
import { centreOf } from "./geometry";
import type { LayoutNode } from "./layout";
import { NodeAttributes, type ColourOverride } from "./nodeAttributes";
import type { RenderContext } from "./renderContext";
import type { Point, Rect, Rgb, TreeNode } from "./types";

export interface BuildOptions {
  /** Hue for nodes that have nothing to inherit from. */
  baseHue: number;
}

export interface SerializedNode {
  label: string;
  level: number;
  leaf: boolean;
  dummy: boolean;
  bounds: Rect;
  geoCentre: Point;
  colour: string | null;
}

interface Frame {
  node: LayoutNode;
  parentColour: Rgb | null;
}

function overrideFor(data: TreeNode): ColourOverride {
  if (data.dummy) return { kind: "uncoloured" };
  if (data.colour !== undefined) {
    const colour = parseHexColour(data.colour);
    if (colour) return { kind: "explicit", colour };
  }
  return { kind: "none" };
}

/**
 * Creates one NodeAttributes per laid-out node, parents before children.
 * Each child receives its parent's resolved colour through the traversal
 * stack; an uncoloured parent passes nothing, so its children start a new
 * family from their hue.
 */
export function buildNodeAttributes(
  root: LayoutNode,
  context: RenderContext,
  options: BuildOptions
): NodeAttributes[] {
  const result: NodeAttributes[] = [];
  const stack: Frame[] = [{ node: root, parentColour: null }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, parentColour } = frame;

    const footprint: Rect = {
      x: node.x0,
      y: node.y0,
      width: node.x1 - node.x0,
      height: node.y1 - node.y0,
    };

    const attrs = NodeAttributes.create(
      {
        label: node.data.name,
        footprint,
        geoCentre: node.data.geo ?? centreOf(footprint),
        isLeaf: !node.children,
        isDummy: node.data.dummy === true,
        hue: node.data.hue ?? options.baseHue,
        override: overrideFor(node.data),
        parentColour,
        level: node.depth,
      },
      context
    );
    result.push(attrs);

    if (node.children) {
      // Reverse push keeps siblings in layout order when popped
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ node: node.children[i], parentColour: attrs.getColour() });
      }
    }
  }

  return result;
}

export function serializeNode(node: NodeAttributes): SerializedNode {
  return {
    label: node.getLabel(),
    level: node.getLevel(),
    leaf: node.isLeaf(),
    dummy: node.isDummy(),
    bounds: { ...node.getBounds() },
    geoCentre: { ...node.getGeoBounds() },
    colour: node.getHexColour(),
  };
}
