import Fastify, { type FastifyInstance } from "fastify";
import { resolve } from "node:path";
import { stat } from "node:fs/promises";
import { createElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { scanDirectory } from "./scanner";
import { config as defaultConfig, type AppConfig } from "./src/config";
import { App, type ScanResult } from "./src/App";
import { Treemap } from "./src/components/Treemap";
import { buildNodeAttributes, serializeNode } from "./src/lib/buildNodes";
import { layoutTree } from "./src/lib/layout";
import type { NodeAttributes } from "./src/lib/nodeAttributes";
import { TreemapRenderContext } from "./src/lib/renderContext";
import { errorCode, serializeError } from "./src/lib/logging";
import {
  describeIssues,
  layoutBodySchema,
  pageQuerySchema,
  scanQuerySchema,
  type PageQuery,
  type RenderSettings,
} from "./src/lib/schema";
import type { Rect, TreeNode } from "./src/lib/types";

interface RenderedTree {
  nodes: NodeAttributes[];
  extent: Rect | null;
  width: number;
  height: number;
}

/** Failure with an HTTP status attached; anything else becomes a 500. */
export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function renderTree(tree: TreeNode, settings: RenderSettings, cfg: AppConfig): RenderedTree {
  const width = settings.width ?? cfg.defaultWidth;
  const height = settings.height ?? cfg.defaultHeight;
  const context = new TreemapRenderContext({
    mutation: settings.mutation ?? cfg.mutation,
    seed: settings.seed,
  });

  const layout = layoutTree(tree, width, height, { maxRects: cfg.maxRects });
  const nodes = layout
    ? buildNodeAttributes(layout, context, { baseHue: settings.hue ?? cfg.baseHue })
    : [];
  return { nodes, extent: context.getExtent(), width, height };
}

/** Resolves and checks a directory path, mapping fs failures to HTTP errors. */
async function resolveScanRoot(path: string): Promise<string> {
  const resolved = resolve(path);
  const stats = await stat(resolved).catch((err: unknown) => {
    const code = errorCode(err);
    if (code === "ENOENT") throw new HttpError(404, "Path not found");
    if (code === "EACCES") throw new HttpError(403, "Permission denied");
    throw new HttpError(400, "Cannot access path");
  });
  if (!stats.isDirectory()) {
    throw new HttpError(400, "Path is not a directory");
  }
  return resolved;
}

export function buildServer(cfg: AppConfig = defaultConfig): FastifyInstance {
  const app = Fastify({
    logger: cfg.logLevel === "silent" ? false : { level: cfg.logLevel },
  });

  async function scanAndRender(path: string, settings: RenderSettings) {
    const root = await resolveScanRoot(path);
    const started = Date.now();
    const tree = await scanDirectory(root, {
      maxDepth: cfg.maxDepth,
      hueOffset: settings.hue ?? cfg.baseHue,
    });
    const rendered = renderTree(tree, settings, cfg);
    app.log.info(
      { path: root, nodes: rendered.nodes.length, ms: Date.now() - started },
      "scan rendered"
    );
    return { root, tree, rendered };
  }

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof HttpError) {
      reply.code(error.statusCode).send({ error: error.message });
      return;
    }
    // Body parse failures carry their own 4xx status
    if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: error.message });
      return;
    }
    request.log.error({ err: serializeError(error) }, "request failed");
    reply.code(500).send({ error: error.message || "Internal error" });
  });

  app.get("/api/health", async () => ({ ok: true }));

  app.post("/api/layout", async (request) => {
    const parsed = layoutBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw new HttpError(400, describeIssues(parsed.error));
    }
    const { tree, ...settings } = parsed.data;
    const rendered = renderTree(tree, settings, cfg);
    return {
      extent: rendered.extent,
      nodes: rendered.nodes.map(serializeNode),
    };
  });

  app.get("/api/scan", async (request) => {
    const parsed = scanQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new HttpError(400, describeIssues(parsed.error));
    }
    const { path, ...settings } = parsed.data;
    const { root, tree, rendered } = await scanAndRender(path, settings);
    return {
      path: root,
      totalSize: tree.size,
      extent: rendered.extent,
      nodes: rendered.nodes.map(serializeNode),
    };
  });

  app.get("/api/treemap.svg", async (request, reply) => {
    const parsed = scanQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new HttpError(400, describeIssues(parsed.error));
    }
    const { path, ...settings } = parsed.data;
    const { rendered } = await scanAndRender(path, settings);
    const svg = renderToStaticMarkup(
      createElement(Treemap, {
        nodes: rendered.nodes,
        width: rendered.width,
        height: rendered.height,
      })
    );
    reply.type("image/svg+xml");
    return svg;
  });

  app.get("/", async (request, reply) => {
    const parsed = pageQuerySchema.safeParse(request.query);
    const query: PageQuery = parsed.success ? parsed.data : {};
    const { path, ...settings } = query;
    const mutation = settings.mutation ?? cfg.mutation;

    let result: ScanResult | null = null;
    let error: string | null = parsed.success ? null : describeIssues(parsed.error);

    if (error === null && path) {
      try {
        const { root, tree, rendered } = await scanAndRender(path, settings);
        result = {
          path: root,
          totalSize: tree.size,
          nodes: rendered.nodes,
          width: rendered.width,
          height: rendered.height,
        };
      } catch (err) {
        if (!(err instanceof HttpError)) throw err;
        reply.code(err.statusCode);
        error = err.message;
      }
    }

    const html = renderToStaticMarkup(
      createElement(App, { mutation, seed: settings.seed, result, error })
    );
    reply.type("text/html; charset=utf-8");
    return "<!DOCTYPE html>" + html;
  });

  return app;
}
