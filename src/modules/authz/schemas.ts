import { z } from "zod";
import type { AttributeMap } from "../../domain/value-objects/Condition";
import { SCOPES } from "../../domain/value-objects/Scope";
import { WILDCARD } from "../../domain/entities/Permission";
import type {
  AuthorizationRequest,
  InvalidationTarget,
} from "./types/authorization";

const identifier = z
  .string()
  .regex(/\S/, "must not be blank")
  .max(256);

/** Requests name a concrete resource and action, never the wildcard */
const concreteName = identifier.refine(
  (value) => value !== WILDCARD,
  "wildcard is only valid in stored permissions",
);

const attributeScalarSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export const attributeMapSchema: z.ZodType<AttributeMap> = z.lazy(() =>
  z.record(
    z.union([
      attributeScalarSchema,
      z.array(attributeScalarSchema),
      attributeMapSchema,
    ]),
  ),
);

export const authorizationContextSchema = z.object({
  now: z.coerce.date().optional(),
  subject: attributeMapSchema.optional(),
  resource: attributeMapSchema.optional(),
  environment: attributeMapSchema.optional(),
});

export const authorizationRequestSchema: z.ZodType<AuthorizationRequest> =
  z.object({
    subjectId: identifier,
    resource: concreteName,
    action: concreteName,
    scope: z.enum(SCOPES),
    context: authorizationContextSchema.optional(),
  });

export const invalidationTargetSchema: z.ZodType<InvalidationTarget> = z
  .object({
    subjectId: identifier.optional(),
    roleId: identifier.optional(),
    permissionId: identifier.optional(),
  })
  .strict();

// HTTP request shapes

export const authorizeSchema = z.object({
  body: authorizationRequestSchema,
});

export const invalidateSchema = z.object({
  body: invalidationTargetSchema,
});
