import { z } from "zod";
import type { TreeNode } from "./types";

export const pointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const hexColourSchema = z
  .string()
  .regex(/^#([0-9a-fA-F]{6}|[0-9a-fA-F]{3})$/, "colour must be #rrggbb or #rgb");

export const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.object({
    name: z.string(),
    path: z.string(),
    size: z.number().nonnegative(),
    type: z.enum(["file", "directory"]),
    extension: z.string().optional(),
    children: z.array(treeNodeSchema).optional(),
    truncated: z.boolean().optional(),
    colour: hexColourSchema.optional(),
    hue: z.number().finite().optional(),
    dummy: z.boolean().optional(),
    geo: pointSchema.optional(),
  })
);

/** Render settings shared by the query-string and JSON entry points. */
export const renderSettingsSchema = z.object({
  width: z.coerce.number().int().positive().optional(),
  height: z.coerce.number().int().positive().optional(),
  mutation: z.coerce.number().min(0).max(1).optional(),
  seed: z.coerce.number().int().optional(),
  hue: z.coerce.number().finite().optional(),
});

export type RenderSettings = z.infer<typeof renderSettingsSchema>;

export const scanQuerySchema = renderSettingsSchema.extend({
  path: z.string({ required_error: "Missing 'path' query parameter" }).min(1, "Missing 'path' query parameter"),
});

export const pageQuerySchema = renderSettingsSchema.extend({
  path: z.string().optional(),
});

export type PageQuery = z.infer<typeof pageQuerySchema>;

export const layoutBodySchema = renderSettingsSchema.extend({
  tree: treeNodeSchema,
});

/** First issue of a failed parse, as a single line. */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid input";
  const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${where}${issue.message}`;
}
