import { z } from "zod";

/**
 * ABAC condition grammar.
 *
 * A closed set of predicates combined with and/or/not. Attributes are dotted
 * paths rooted at `subject`, `resource` or `environment`, e.g.
 * `resource.ownerId`.
 */

export type AttributeScalar = string | number | boolean | null;

export type AttributeValue = AttributeScalar | AttributeScalar[];

export interface AttributeMap {
  [key: string]: AttributeValue | AttributeMap;
}

export const ATTRIBUTE_ROOTS = ["subject", "resource", "environment"] as const;

export type AttributeRoot = (typeof ATTRIBUTE_ROOTS)[number];

export interface TimeWindowCondition {
  kind: "timeWindow";
  /** Inclusive lower bound (ISO-8601) */
  from?: string;
  /** Exclusive upper bound (ISO-8601) */
  until?: string;
}

/**
 * Compared against either a literal `value` or another attribute `ref`.
 */
export interface AttributeEqualsCondition {
  kind: "attributeEquals";
  attribute: string;
  value?: AttributeScalar;
  ref?: string;
}

export interface AttributeNotEqualsCondition {
  kind: "attributeNotEquals";
  attribute: string;
  value?: AttributeScalar;
  ref?: string;
}

export interface AttributeInCondition {
  kind: "attributeIn";
  attribute: string;
  values: AttributeScalar[];
}

export interface IpInRangeCondition {
  kind: "ipInRange";
  attribute: string;
  cidrs: string[];
}

export interface AndCondition {
  kind: "and";
  conditions: Condition[];
}

export interface OrCondition {
  kind: "or";
  conditions: Condition[];
}

export interface NotCondition {
  kind: "not";
  condition: Condition;
}

export type Condition =
  | TimeWindowCondition
  | AttributeEqualsCondition
  | AttributeNotEqualsCondition
  | AttributeInCondition
  | IpInRangeCondition
  | AndCondition
  | OrCondition
  | NotCondition;

// ============================================================================
// Validation
// ============================================================================

const attributePathSchema = z
  .string()
  .regex(
    /^(subject|resource|environment)\.[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/,
    "attribute must be a dotted path rooted at subject, resource or environment",
  );

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const isoDateSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "invalid ISO-8601 date");

const comparisonShape = {
  attribute: attributePathSchema,
  value: scalarSchema.optional(),
  ref: attributePathSchema.optional(),
};

const hasSingleOperand = (c: { value?: AttributeScalar; ref?: string }) =>
  (c.value !== undefined) !== (c.ref !== undefined);

export const conditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.union([
    z.object({
      kind: z.literal("timeWindow"),
      from: isoDateSchema.optional(),
      until: isoDateSchema.optional(),
    }),
    z
      .object({ kind: z.literal("attributeEquals"), ...comparisonShape })
      .refine(hasSingleOperand, "exactly one of value or ref is required"),
    z
      .object({ kind: z.literal("attributeNotEquals"), ...comparisonShape })
      .refine(hasSingleOperand, "exactly one of value or ref is required"),
    z.object({
      kind: z.literal("attributeIn"),
      attribute: attributePathSchema,
      values: z.array(scalarSchema),
    }),
    z.object({
      kind: z.literal("ipInRange"),
      attribute: attributePathSchema,
      cidrs: z.array(z.string()).min(1),
    }),
    z.object({
      kind: z.literal("and"),
      conditions: z.array(conditionSchema),
    }),
    z.object({
      kind: z.literal("or"),
      conditions: z.array(conditionSchema),
    }),
    z.object({
      kind: z.literal("not"),
      condition: conditionSchema,
    }),
  ]),
);

export type ConditionParseResult =
  | { ok: true; condition: Condition | undefined }
  | { ok: false; error: string };

/**
 * Parse a stored condition document. `null`/`undefined` and an empty object
 * mean "no conditions".
 */
export function parseCondition(raw: unknown): ConditionParseResult {
  if (
    raw === null ||
    raw === undefined ||
    (typeof raw === "object" && Object.keys(raw).length === 0)
  ) {
    return { ok: true, condition: undefined };
  }

  const result = conditionSchema.safeParse(raw);
  if (!result.success) {
    return {
      ok: false,
      error: result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; "),
    };
  }
  return { ok: true, condition: result.data };
}
