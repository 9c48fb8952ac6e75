import type { NodeAttributes } from "../lib/nodeAttributes";

interface Props {
  nodes: NodeAttributes[];
}

/** One swatch per top-level node: each heads its own colour family. */
export function Legend({ nodes }: Props) {
  const families = nodes.filter((n) => n.getLevel() === 1 && n.getColour() !== null);
  if (families.length === 0) return null;

  return (
    <div className="legend">
      {families.map((node, i) => (
        <span key={i} className="legend-item">
          <span
            className="legend-swatch"
            style={{ backgroundColor: node.getHexColour() ?? undefined }}
          />
          {node.getLabel()}
        </span>
      ))}
    </div>
  );
}
