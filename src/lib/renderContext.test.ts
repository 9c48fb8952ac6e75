import { describe, it, expect } from "vitest";
import { DEFAULT_MUTATION, TreemapRenderContext } from "./renderContext";
import { centreOf, integerBounds, unionRect } from "./geometry";

describe("TreemapRenderContext", () => {
  it("defaults the mutation magnitude", () => {
    expect(new TreemapRenderContext().mutationMagnitude).toBe(DEFAULT_MUTATION);
    expect(new TreemapRenderContext({ mutation: 0.2 }).mutationMagnitude).toBe(0.2);
  });

  it("prefers an injected random source", () => {
    const context = new TreemapRenderContext({ seed: 1, random: () => 0.25 });
    expect(context.random()).toBe(0.25);
  });

  it("repeats draws for the same seed", () => {
    const a = new TreemapRenderContext({ seed: 42 });
    const b = new TreemapRenderContext({ seed: 42 });
    expect([a.random(), a.random(), a.random()]).toEqual([b.random(), b.random(), b.random()]);
  });

  it("unions registered bounds into an extent", () => {
    const context = new TreemapRenderContext();
    expect(context.getExtent()).toBeNull();
    context.registerBounds({ x: 0, y: 0, width: 10, height: 10 });
    context.registerBounds({ x: 5, y: 5, width: 10, height: 20 });
    expect(context.getExtent()).toEqual({ x: 0, y: 0, width: 15, height: 25 });
    expect(context.getRegisteredCount()).toBe(2);
  });

  it("hands out copies of the extent", () => {
    const context = new TreemapRenderContext();
    context.registerBounds({ x: 1, y: 1, width: 2, height: 2 });
    const extent = context.getExtent();
    if (extent) extent.width = 100;
    expect(context.getExtent()).toEqual({ x: 1, y: 1, width: 2, height: 2 });
  });
});

describe("geometry", () => {
  it("rounds bounds outwards", () => {
    expect(integerBounds({ x: 10.4, y: 2.6, width: 20.2, height: 5.5 })).toEqual({
      x: 10,
      y: 2,
      width: 21,
      height: 7,
    });
    expect(integerBounds({ x: -1.5, y: 0, width: 1, height: 2 })).toEqual({
      x: -2,
      y: 0,
      width: 2,
      height: 2,
    });
  });

  it("maps negative sizes to the empty rectangle", () => {
    expect(integerBounds({ x: 5, y: 5, width: -1, height: 3 })).toEqual({
      x: 0,
      y: 0,
      width: 0,
      height: 0,
    });
  });

  it("unions and centres rectangles", () => {
    expect(
      unionRect({ x: 2, y: 3, width: 4, height: 4 }, { x: 0, y: 5, width: 1, height: 1 })
    ).toEqual({ x: 0, y: 3, width: 6, height: 4 });
    expect(centreOf({ x: 10, y: 20, width: 4, height: 6 })).toEqual({ x: 12, y: 23 });
  });
});
