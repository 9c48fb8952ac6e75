import { mulberry32 } from "./colors";
import { unionRect } from "./geometry";
import type { Rect } from "./types";

/** What a node needs from the surface it is drawn on. */
export interface RenderContext {
  /** 0..1, how far a child colour may drift from its parent. */
  readonly mutationMagnitude: number;
  /** Uniform draw in [0, 1). */
  random(): number;
  registerBounds(bounds: Rect): void;
}

export interface RenderContextOptions {
  mutation?: number;
  seed?: number;
  random?: () => number;
}

export const DEFAULT_MUTATION = 0.5;

/**
 * Per-render context. Tracks the overall extent of every node registered
 * against it, so one instance belongs to exactly one treemap build.
 */
export class TreemapRenderContext implements RenderContext {
  readonly mutationMagnitude: number;
  private readonly source: () => number;
  private extent: Rect | null = null;
  private registered = 0;

  constructor(options: RenderContextOptions = {}) {
    this.mutationMagnitude = options.mutation ?? DEFAULT_MUTATION;
    if (options.random) {
      this.source = options.random;
    } else if (options.seed !== undefined) {
      this.source = mulberry32(options.seed);
    } else {
      this.source = Math.random;
    }
  }

  random(): number {
    return this.source();
  }

  registerBounds(bounds: Rect): void {
    this.extent = this.extent ? unionRect(this.extent, bounds) : { ...bounds };
    this.registered++;
  }

  getExtent(): Rect | null {
    return this.extent ? { ...this.extent } : null;
  }

  getRegisteredCount(): number {
    return this.registered;
  }
}
