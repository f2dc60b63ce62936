/**
 * Condition Evaluator
 *
 * Evaluates ABAC condition trees against the request context. Evaluation is
 * total and side-effect free. A predicate over an attribute the context does
 * not carry is false, so `not` over it is true: a conditional deny keeps
 * applying when the attribute it tests is absent.
 */

import ipaddr from "ipaddr.js";
import {
  AttributeMap,
  AttributeRoot,
  AttributeScalar,
  AttributeValue,
  Condition,
} from "../../../domain/value-objects/Condition";

/**
 * Fully populated context the evaluator reads from
 */
export interface EvaluationContext {
  now: Date;
  subject: AttributeMap;
  resource: AttributeMap;
  environment: AttributeMap;
}

export interface ConditionResult {
  satisfied: boolean;
  /** Attribute paths referenced by the tree but absent from the context */
  missingAttributes: string[];
}

type Resolved =
  | { found: true; value: AttributeValue | AttributeMap }
  | { found: false };

export class ConditionEvaluator {
  evaluate(
    condition: Condition | undefined,
    context: EvaluationContext,
  ): ConditionResult {
    if (condition === undefined) {
      return { satisfied: true, missingAttributes: [] };
    }

    const missing = new Set<string>();
    const satisfied = this.evaluateNode(condition, context, missing);

    return { satisfied, missingAttributes: [...missing] };
  }

  private evaluateNode(
    condition: Condition,
    context: EvaluationContext,
    missing: Set<string>,
  ): boolean {
    switch (condition.kind) {
      case "timeWindow": {
        const now = context.now.getTime();
        if (condition.from !== undefined && now < Date.parse(condition.from)) {
          return false;
        }
        return !(
          condition.until !== undefined && now >= Date.parse(condition.until)
        );
      }

      case "attributeEquals":
      case "attributeNotEquals": {
        const left = this.lookup(condition.attribute, context, missing);
        const right =
          condition.ref !== undefined
            ? this.lookup(condition.ref, context, missing)
            : { found: true as const, value: condition.value ?? null };
        if (!left.found || !right.found) {
          return false;
        }
        const equal = left.value === right.value;
        return condition.kind === "attributeEquals" ? equal : !equal;
      }

      case "attributeIn": {
        const resolved = this.lookup(condition.attribute, context, missing);
        return resolved.found && isMember(resolved.value, condition.values);
      }

      case "ipInRange": {
        const resolved = this.lookup(condition.attribute, context, missing);
        return (
          resolved.found &&
          typeof resolved.value === "string" &&
          ipInAnyRange(resolved.value, condition.cidrs)
        );
      }

      // Every child is evaluated so all missing attributes are reported
      case "and":
        return condition.conditions
          .map((child) => this.evaluateNode(child, context, missing))
          .every(Boolean);

      case "or":
        return condition.conditions
          .map((child) => this.evaluateNode(child, context, missing))
          .some(Boolean);

      case "not":
        return !this.evaluateNode(condition.condition, context, missing);
    }
  }

  private lookup(
    path: string,
    context: EvaluationContext,
    missing: Set<string>,
  ): Resolved {
    const resolved = resolvePath(path, context);
    if (!resolved.found) {
      missing.add(path);
    }
    return resolved;
  }
}

/**
 * Resolve a dotted path such as `resource.owner.id`. `null` is a present
 * value; `undefined` and paths through non-objects are absent.
 */
export function resolvePath(path: string, context: EvaluationContext): Resolved {
  const [root, ...segments] = path.split(".");
  let current: AttributeValue | AttributeMap | undefined = rootOf(root, context);

  for (const segment of segments) {
    if (!isAttributeMap(current)) {
      return { found: false };
    }
    current = current[segment];
  }

  return current === undefined ? { found: false } : { found: true, value: current };
}

function rootOf(
  root: string | undefined,
  context: EvaluationContext,
): AttributeMap | undefined {
  const roots: Record<AttributeRoot, AttributeMap> = {
    subject: context.subject,
    resource: context.resource,
    environment: context.environment,
  };
  switch (root) {
    case "subject":
    case "resource":
    case "environment":
      return roots[root];
    default:
      return undefined;
  }
}

function isAttributeMap(
  value: AttributeValue | AttributeMap | undefined,
): value is AttributeMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Scalar membership; a list attribute matches when any element is listed.
 */
function isMember(
  value: AttributeValue | AttributeMap,
  allowed: AttributeScalar[],
): boolean {
  if (Array.isArray(value)) {
    return value.some((element) => allowed.includes(element));
  }
  if (isAttributeMap(value)) {
    return false;
  }
  return allowed.includes(value);
}

/**
 * IPv4 and IPv6 CIDR membership. IPv4-mapped IPv6 addresses are matched as
 * IPv4. Unparseable addresses match nothing; unparseable ranges are skipped.
 */
export function ipInAnyRange(address: string, cidrs: string[]): boolean {
  let parsed: ipaddr.IPv4 | ipaddr.IPv6;
  try {
    parsed = ipaddr.process(address);
  } catch {
    return false;
  }

  return cidrs.some((cidr) => {
    let range: [ipaddr.IPv4 | ipaddr.IPv6, number];
    try {
      range = ipaddr.parseCIDR(cidr);
    } catch {
      return false;
    }
    const [network, bits] = range;
    if (parsed instanceof ipaddr.IPv4 && network instanceof ipaddr.IPv4) {
      return parsed.match(network, bits);
    }
    if (parsed instanceof ipaddr.IPv6 && network instanceof ipaddr.IPv6) {
      return parsed.match(network, bits);
    }
    return false;
  });
}
