export const config = {
  port: Number(process.env.PORT ?? 3000),
  host: process.env.HOST ?? "127.0.0.1",
  logLevel: process.env.LOG_LEVEL ?? "info",
  maxDepth: Number(process.env.MAX_DEPTH ?? 8),
  maxRects: Number(process.env.MAX_RECTS ?? 500),
  defaultWidth: Number(process.env.DEFAULT_WIDTH ?? 1200),
  defaultHeight: Number(process.env.DEFAULT_HEIGHT ?? 800),
  mutation: Number(process.env.MUTATION ?? 0.5),
  baseHue: Number(process.env.BASE_HUE ?? 0.6),
};

export type AppConfig = typeof config;
