import {
  MAX_COLOUR_VAR,
  perturbChannel,
  rootColour,
  toHexColour,
} from "./colors";
import { integerBounds } from "./geometry";
import type { RenderContext } from "./renderContext";
import type { Point, Rect, Rgb } from "./types";

export type ColourOverride =
  | { kind: "none" }
  | { kind: "explicit"; colour: Rgb }
  | { kind: "uncoloured" };

export interface NodeAttributesInit {
  label: string;
  footprint: Rect;
  geoCentre: Point;
  isLeaf: boolean;
  isDummy: boolean;
  /** Only used when there is neither an override nor a parent colour. */
  hue: number;
  override?: ColourOverride;
  parentColour?: Rgb | null;
  /** 0 is the root, 1 a child, 2 a grandchild and so on. */
  level: number;
}

function resolveColour(
  init: NodeAttributesInit,
  colourVar: number,
  context: RenderContext
): Rgb | null {
  const override: ColourOverride = init.override ?? { kind: "none" };
  switch (override.kind) {
    case "explicit":
      return override.colour;
    case "uncoloured":
      return null;
    case "none":
      break;
  }

  const parent = init.parentColour ?? null;
  if (parent === null) return rootColour(init.hue);

  const r = perturbChannel(parent.r, context.random(), colourVar);
  const g = perturbChannel(parent.g, context.random(), colourVar);
  const b = perturbChannel(parent.b, context.random(), colourVar);
  return { r, g, b };
}

/**
 * Visual representation of one treemap node. Everything is settled at
 * construction; the tree itself lives with whoever builds these.
 */
export class NodeAttributes {
  private constructor(
    private readonly footprint: Rect,
    private readonly geoCentre: Point,
    private readonly label: string,
    private readonly colour: Rgb | null,
    private readonly leaf: boolean,
    private readonly dummy: boolean,
    private readonly level: number
  ) {
    Object.freeze(this);
  }

  /**
   * Resolves the node colour and registers the node's integer bounds with
   * `context`. Children must be created after their parent so the parent's
   * colour can be passed down.
   */
  static create(init: NodeAttributesInit, context: RenderContext): NodeAttributes {
    const colourVar = context.mutationMagnitude * MAX_COLOUR_VAR;
    context.registerBounds(integerBounds(init.footprint));
    const colour = resolveColour(init, colourVar, context);
    return new NodeAttributes(
      Object.freeze({ ...init.footprint }),
      Object.freeze({ ...init.geoCentre }),
      init.label,
      colour ? Object.freeze({ r: colour.r, g: colour.g, b: colour.b }) : null,
      init.isLeaf,
      init.isDummy,
      init.level
    );
  }

  /** Footprint in render coordinates. */
  getBounds(): Rect {
    return this.footprint;
  }

  /** Transformed geographic centre of the node. */
  getGeoBounds(): Point {
    return this.geoCentre;
  }

  getLabel(): string {
    return this.label;
  }

  getColour(): Rgb | null {
    return this.colour;
  }

  /** Colour as `#rrggbb`, or null for an uncoloured node. */
  getHexColour(): string | null {
    return this.colour ? toHexColour(this.colour) : null;
  }

  getLevel(): number {
    return this.level;
  }

  isLeaf(): boolean {
    return this.leaf;
  }

  /** True for blank spacer nodes. */
  isDummy(): boolean {
    return this.dummy;
  }
}
