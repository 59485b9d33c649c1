import { z, type ZodIssue } from "zod";

import { InvalidAttributeError } from "./errors.js";
import type { AttributeBag, AttributeValue, NodeId } from "./types.js";

/**
 * Recursive schema for the value kinds allowed inside attribute bags. Numbers
 * must be finite because the payload is embedded as JSON, which has no literal
 * for `NaN` or `Infinity`.
 */
export const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.array(AttributeValueSchema),
    z.record(AttributeValueSchema),
  ]),
);

export const AttributeBagSchema = z.record(AttributeValueSchema);

export const NodeIdSchema = z.union([z.string(), z.number().finite()]);

function issuePath(issue: ZodIssue, prefix: string): string {
  return issue.path.length > 0 ? `${prefix}.${issue.path.join(".")}` : prefix;
}

/**
 * Validates an attribute bag and returns a detached copy. Values outside the
 * closed set of kinds (null, undefined, functions, non-finite numbers, ...)
 * raise {@link InvalidAttributeError} naming the first offending path.
 */
export function parseAttributeBag(input: unknown, context: string): AttributeBag {
  const parsed = AttributeBagSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    if (!issue) {
      throw new InvalidAttributeError(context, "unrecognised value");
    }
    throw new InvalidAttributeError(issuePath(issue, context), issue.message);
  }
  return parsed.data;
}

/** Validates a single attribute value (used for bulk sequences). */
export function parseAttributeValue(input: unknown, context: string): AttributeValue {
  const parsed = AttributeValueSchema.safeParse(input);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new InvalidAttributeError(
      issue ? issuePath(issue, context) : context,
      issue?.message ?? "unrecognised value",
    );
  }
  return parsed.data;
}

/** Ensures node identities are strings or finite numbers. */
export function assertNodeId(value: unknown, context: string): asserts value is NodeId {
  if (!NodeIdSchema.safeParse(value).success) {
    throw new InvalidAttributeError(context, "node ids must be strings or finite numbers");
  }
}
