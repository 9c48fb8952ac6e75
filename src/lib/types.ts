export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Rgb {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export interface TreeNode {
  name: string;
  path: string;
  size: number;
  type: "file" | "directory";
  extension?: string;
  children?: TreeNode[];
  truncated?: boolean;
  /** Explicit `#rrggbb` colour; wins over inheritance. */
  colour?: string;
  /** 0..1, only consulted when the node has no coloured parent. */
  hue?: number;
  /** Spacer node with no data of its own; rendered uncoloured. */
  dummy?: boolean;
  geo?: Point;
}
