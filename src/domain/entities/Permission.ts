import { Condition } from "../value-objects/Condition";
import { Scope, isScope, scopeCovers } from "../value-objects/Scope";

export type Effect = "allow" | "deny";

export const WILDCARD = "*";

/**
 * Plain form of a permission, used in decisions and cache payloads.
 */
export interface PermissionSnapshot {
  id: string;
  resource: string;
  action: string;
  scope: Scope;
  effect: Effect;
  priority: number;
  conditions?: Condition;
  description?: string;
}

class Permission {
  private _id: string;
  private _resource: string;
  private _action: string;
  private _scope: Scope;
  private _effect: Effect;
  private _priority: number;
  private _conditions: Condition | undefined;
  private _description: string;

  constructor(
    id: string,
    resource: string,
    action: string,
    scope: Scope,
    effect: Effect = "allow",
    priority: number = 0,
    conditions?: Condition,
    description: string = "",
  ) {
    // Invariants
    if (!id) throw new Error("Permission ID is required");
    if (!resource.trim()) throw new Error("Resource is required");
    if (!action.trim()) throw new Error("Action is required");
    if (!isScope(scope)) throw new Error(`Unknown scope: ${scope}`);

    this._id = id;
    this._resource = resource;
    this._action = action;
    this._scope = scope;
    this._effect = effect;
    this._priority = priority;
    this._conditions = conditions;
    this._description = description;
  }

  static fromSnapshot(snapshot: PermissionSnapshot): Permission {
    return new Permission(
      snapshot.id,
      snapshot.resource,
      snapshot.action,
      snapshot.scope,
      snapshot.effect,
      snapshot.priority,
      snapshot.conditions,
      snapshot.description,
    );
  }

  // Getters
  get id(): string {
    return this._id;
  }
  get resource(): string {
    return this._resource;
  }
  get action(): string {
    return this._action;
  }
  get scope(): Scope {
    return this._scope;
  }
  get effect(): Effect {
    return this._effect;
  }
  get priority(): number {
    return this._priority;
  }
  get conditions(): Condition | undefined {
    return this._conditions;
  }
  get description(): string {
    return this._description;
  }

  hasConditions(): boolean {
    return this._conditions !== undefined;
  }

  isWildcard(): boolean {
    return this._resource === WILDCARD || this._action === WILDCARD;
  }

  // Business logic methods
  matches(resource: string, action: string): boolean {
    return (
      (this._resource === WILDCARD || this._resource === resource) &&
      (this._action === WILDCARD || this._action === action)
    );
  }

  covers(scope: Scope): boolean {
    return scopeCovers(this._scope, scope);
  }

  toSnapshot(): PermissionSnapshot {
    return {
      id: this._id,
      resource: this._resource,
      action: this._action,
      scope: this._scope,
      effect: this._effect,
      priority: this._priority,
      ...(this._conditions !== undefined
        ? { conditions: this._conditions }
        : {}),
      ...(this._description ? { description: this._description } : {}),
    };
  }
}

export { Permission };
