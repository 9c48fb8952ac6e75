import type { ReactNode } from "react";
import type { NodeAttributes } from "../lib/nodeAttributes";
import { TreemapRect } from "./TreemapRect";

interface Props {
  nodes: NodeAttributes[];
  width: number;
  height: number;
}

/** Renders built nodes in the order given; pre-order keeps parents underneath. */
export function Treemap({ nodes, width, height }: Props) {
  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
    >
      {nodes.map((node, i) => renderNode(node, i))}
    </svg>
  );
}

function renderNode(node: NodeAttributes, key: number): ReactNode {
  if (node.isLeaf()) {
    return <TreemapRect key={key} node={node} />;
  }

  // The root frame is the canvas itself
  if (node.getLevel() === 0) return null;

  const { x, y, width: w, height: h } = node.getBounds();
  if (w <= 1 || h <= 1) return null;

  return (
    <g key={key}>
      <rect
        x={x}
        y={y}
        width={w}
        height={h}
        fill="rgba(255,255,255,0.04)"
        stroke={node.getHexColour() ?? "rgba(255,255,255,0.15)"}
        strokeWidth={1}
      />
      {w > 50 && (
        <text x={x + 4} y={y + 14} className="dir-label" style={{ pointerEvents: "none" }}>
          {node.getLabel()}
        </text>
      )}
    </g>
  );
}
