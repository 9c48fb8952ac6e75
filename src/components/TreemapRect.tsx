import type { NodeAttributes } from "../lib/nodeAttributes";

interface Props {
  node: NodeAttributes;
}

const DUMMY_FILL = "rgba(255,255,255,0.06)";
const FALLBACK_FILL = "rgba(255,255,255,0.04)";

export function TreemapRect({ node }: Props) {
  const { x, y, width: w, height: h } = node.getBounds();

  if (w < 1 || h < 1) return null;

  const dummy = node.isDummy();
  const fill = node.getHexColour() ?? (dummy ? DUMMY_FILL : FALLBACK_FILL);
  const showLabel = w > 40 && h > 16;

  return (
    <g>
      <rect
        x={x}
        y={y}
        width={w}
        height={h}
        fill={fill}
        stroke={dummy ? "#7ec8e3" : "rgba(0,0,0,0.3)"}
        strokeWidth={dummy ? 1 : 0.5}
        strokeDasharray={dummy ? "4 2" : undefined}
      />
      {showLabel && (
        <text
          x={x + 4}
          y={y + 14}
          className={dummy ? "rect-label-dummy" : "rect-label"}
          style={{ pointerEvents: "none" }}
        >
          {truncate(node.getLabel(), Math.floor(w / 7))}
        </text>
      )}
      <title>{node.getLabel()}</title>
    </g>
  );
}

export function truncate(s: string, maxLen: number): string {
  if (maxLen < 3) return "";
  return s.length <= maxLen ? s : s.slice(0, maxLen - 1) + "…";
}
