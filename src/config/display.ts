import { z } from "zod";

import { omitUndefinedEntries } from "../utils/object.js";
import { readOptionalBool, readOptionalEnum, readOptionalString } from "./env.js";

/** Script URL of the browser library embedded in the exported document. */
export const DEFAULT_VIS_NETWORK_URL =
  "https://unpkg.com/vis-network@9.1.9/standalone/umd/vis-network.min.js";

export const LAYOUT_MODES = ["default", "hierarchical"] as const;

export type LayoutMode = (typeof LAYOUT_MODES)[number];

/** CSS length: a bare number (pixels) or a number followed by a unit. */
const CssLengthSchema = z.union([
  z.number().positive().transform((value) => `${value}px`),
  z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?(px|%|vh|vw|em|rem)$/, "expected a CSS length such as 500px or 100%"),
]);

const CssColorSchema = z
  .string()
  .trim()
  .regex(/^[#a-zA-Z0-9(),.\s%]+$/, "expected a CSS colour");

/** Global display settings applied to the exported document. */
export const DisplayConfigSchema = z.object({
  height: CssLengthSchema.default("500px"),
  width: CssLengthSchema.default("100%"),
  bgcolor: CssColorSchema.default("#ffffff"),
  fontColor: CssColorSchema.optional(),
  directed: z.boolean().default(false),
  notebook: z.boolean().default(false),
  heading: z.string().default(""),
  layout: z.enum(LAYOUT_MODES).default("default"),
  cdnUrl: z.string().url().default(DEFAULT_VIS_NETWORK_URL),
});

export type DisplayConfig = z.output<typeof DisplayConfigSchema>;

export type DisplayConfigInput = z.input<typeof DisplayConfigSchema>;

export class InvalidDisplayConfigError extends Error {
  public readonly code = "E-CONFIG-INVALID";
  public readonly details: { issues: string[] };

  constructor(issues: string[]) {
    super(`invalid display configuration: ${issues.join("; ")}`);
    this.name = "InvalidDisplayConfigError";
    this.details = { issues };
  }
}

/**
 * Resolves the display configuration. Explicit values win over the
 * `NETCANVAS_*` environment overrides, which win over the schema defaults.
 */
export function resolveDisplayConfig(input: DisplayConfigInput = {}): DisplayConfig {
  const fromEnv: DisplayConfigInput = {};
  const cdnUrl = readOptionalString("NETCANVAS_CDN_URL");
  if (cdnUrl !== undefined) {
    fromEnv.cdnUrl = cdnUrl;
  }
  const height = readOptionalString("NETCANVAS_DEFAULT_HEIGHT");
  if (height !== undefined) {
    fromEnv.height = height;
  }
  const width = readOptionalString("NETCANVAS_DEFAULT_WIDTH");
  if (width !== undefined) {
    fromEnv.width = width;
  }
  const layout = readOptionalEnum("NETCANVAS_LAYOUT", LAYOUT_MODES);
  if (layout !== undefined) {
    fromEnv.layout = layout;
  }
  const notebook = readOptionalBool("NETCANVAS_NOTEBOOK");
  if (notebook !== undefined) {
    fromEnv.notebook = notebook;
  }

  const parsed = DisplayConfigSchema.safeParse({ ...fromEnv, ...omitUndefinedEntries(input) });
  if (!parsed.success) {
    throw new InvalidDisplayConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return parsed.data;
}
