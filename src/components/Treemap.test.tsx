import { describe, it, expect, vi } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import { NodeAttributes, type NodeAttributesInit } from "../lib/nodeAttributes";
import type { RenderContext } from "../lib/renderContext";
import { Treemap } from "./Treemap";
import { TreemapRect, truncate } from "./TreemapRect";
import { Legend } from "./Legend";
import { ancestors } from "./Breadcrumb";

const context: RenderContext = {
  mutationMagnitude: 0,
  random: () => 0.5,
  registerBounds: vi.fn(),
};

function node(overrides: Partial<NodeAttributesInit>): NodeAttributes {
  return NodeAttributes.create(
    {
      label: "alpha",
      footprint: { x: 0, y: 0, width: 100, height: 50 },
      geoCentre: { x: 50, y: 25 },
      isLeaf: true,
      isDummy: false,
      hue: 0,
      level: 1,
      override: { kind: "explicit", colour: { r: 18, g: 52, b: 86 } },
      ...overrides,
    },
    context
  );
}

describe("TreemapRect", () => {
  it("fills with the node colour and labels wide rects", () => {
    const html = renderToStaticMarkup(<TreemapRect node={node({})} />);
    expect(html).toContain(
      '<rect x="0" y="0" width="100" height="50" fill="#123456" stroke="rgba(0,0,0,0.3)" stroke-width="0.5"></rect>'
    );
    expect(html).toContain('<text x="4" y="14" class="rect-label" style="pointer-events:none">alpha</text>');
  });

  it("omits the label on narrow rects", () => {
    const html = renderToStaticMarkup(
      <TreemapRect node={node({ footprint: { x: 0, y: 0, width: 30, height: 50 } })} />
    );
    expect(html).not.toContain("<text");
  });

  it("draws dummy nodes dashed and uncoloured", () => {
    const html = renderToStaticMarkup(
      <TreemapRect node={node({ isDummy: true, override: { kind: "uncoloured" } })} />
    );
    expect(html).toContain('fill="rgba(255,255,255,0.06)"');
    expect(html).toContain('stroke-dasharray="4 2"');
    expect(html).toContain('class="rect-label-dummy"');
  });

  it("renders nothing for sub-pixel rects", () => {
    const html = renderToStaticMarkup(
      <TreemapRect node={node({ footprint: { x: 0, y: 0, width: 0.5, height: 50 } })} />
    );
    expect(html).toBe("");
  });
});

describe("truncate", () => {
  it("shortens with an ellipsis", () => {
    expect(truncate("abcdefgh", 5)).toBe("abcd…");
    expect(truncate("abc", 5)).toBe("abc");
    expect(truncate("abcdefgh", 2)).toBe("");
  });
});

describe("Treemap", () => {
  it("skips the root frame and outlines inner groups in their colour", () => {
    const nodes = [
      node({ label: "root", level: 0, isLeaf: false, footprint: { x: 0, y: 0, width: 200, height: 100 } }),
      node({ label: "group", level: 1, isLeaf: false, footprint: { x: 2, y: 20, width: 120, height: 78 } }),
    ];
    const html = renderToStaticMarkup(<Treemap nodes={nodes} width={200} height={100} />);
    expect(html).not.toContain(">root<");
    expect(html).toContain('stroke="#123456"');
    expect(html).toContain('<text x="6" y="34" class="dir-label" style="pointer-events:none">group</text>');
  });
});

describe("Legend", () => {
  it("shows one swatch per top-level family", () => {
    const nodes = [
      node({ label: "root", level: 0, isLeaf: false }),
      node({ label: "docs", level: 1 }),
      node({ label: "deep", level: 2 }),
    ];
    const html = renderToStaticMarkup(<Legend nodes={nodes} />);
    expect(html).toBe(
      '<div class="legend"><span class="legend-item"><span class="legend-swatch" style="background-color:#123456"></span>docs</span></div>'
    );
  });
});

describe("ancestors", () => {
  it("splits an absolute path into links", () => {
    expect(ancestors("/home/user/")).toEqual([
      { name: "/", path: "/" },
      { name: "home", path: "/home" },
      { name: "user", path: "/home/user" },
    ]);
  });
});
