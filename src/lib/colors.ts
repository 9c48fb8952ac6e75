import type { Rgb } from "./types";

// Root colours sit in a muted band so inherited drift stays readable
export const ROOT_SATURATION = 0.4;
export const ROOT_BRIGHTNESS = 0.8;

/** Largest per-channel swing, reached at mutation magnitude 1. */
export const MAX_COLOUR_VAR = 127;

const HEX_PATTERN = /^#([0-9a-f]{6}|[0-9a-f]{3})$/i;

// HSB intermediates are rounded to single precision
const f32 = Math.fround;

function toChannel(v: number): number {
  return Math.trunc(f32(f32(v * 255) + 0.5));
}

/**
 * Converts hue/saturation/brightness (each 0..1) to RGB. Hue wraps, so 1.25
 * and 0.25 give the same colour.
 */
export function hsbToRgb(hue: number, saturation: number, brightness: number): Rgb {
  const s = f32(saturation);
  const v = f32(brightness);
  if (s === 0) {
    const c = toChannel(v);
    return { r: c, g: c, b: c };
  }

  const hf = f32(hue);
  const h = f32(f32(hf - Math.floor(hf)) * 6);
  const f = f32(h - Math.floor(h));
  const p = f32(v * f32(1 - s));
  const q = f32(v * f32(1 - f32(s * f)));
  const t = f32(v * f32(1 - f32(s * f32(1 - f))));

  switch (Math.trunc(h)) {
    case 0:
      return { r: toChannel(v), g: toChannel(t), b: toChannel(p) };
    case 1:
      return { r: toChannel(q), g: toChannel(v), b: toChannel(p) };
    case 2:
      return { r: toChannel(p), g: toChannel(v), b: toChannel(t) };
    case 3:
      return { r: toChannel(p), g: toChannel(q), b: toChannel(v) };
    case 4:
      return { r: toChannel(t), g: toChannel(p), b: toChannel(v) };
    default:
      return { r: toChannel(v), g: toChannel(p), b: toChannel(q) };
  }
}

export function rootColour(hue: number): Rgb {
  return hsbToRgb(hue, ROOT_SATURATION, ROOT_BRIGHTNESS);
}

export function clampChannel(v: number): number {
  if (v < 0) return 0;
  if (v > 255) return 255;
  return v;
}

/**
 * One channel of a child colour: the parent's value shifted by up to
 * ±colourVar/2. Truncates toward zero before clamping.
 */
export function perturbChannel(parent: number, draw: number, colourVar: number): number {
  return clampChannel(Math.trunc(parent + (draw - 0.5) * colourVar));
}

export function toHexColour(colour: Rgb): string {
  const rgb = (colour.r << 16) | (colour.g << 8) | colour.b;
  return "#" + ((rgb & 0xffffff) | 0x1000000).toString(16).slice(1);
}

/** Parses `#rrggbb` or `#rgb`. Returns null for anything else. */
export function parseHexColour(hex: string): Rgb | null {
  const match = HEX_PATTERN.exec(hex.trim());
  if (!match) return null;
  let digits = match[1];
  if (digits.length === 3) {
    digits = digits
      .split("")
      .map((d) => d + d)
      .join("");
  }
  const value = parseInt(digits, 16);
  return { r: (value >> 16) & 0xff, g: (value >> 8) & 0xff, b: value & 0xff };
}

/** Mulberry32 deterministic PRNG — returns [0, 1) */
export function mulberry32(seed: number): () => number {
  return function () {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
