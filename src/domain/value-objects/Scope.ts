/**
 * Permission scope, ordered by breadth:
 * global > organization > channel > self > public.
 */
export const SCOPES = [
  "global",
  "organization",
  "channel",
  "self",
  "public",
] as const;

export type Scope = (typeof SCOPES)[number];

const BREADTH: Record<Scope, number> = {
  global: 4,
  organization: 3,
  channel: 2,
  self: 1,
  public: 0,
};

export function isScope(value: string): value is Scope {
  return (SCOPES as readonly string[]).includes(value);
}

/**
 * A grant at `granted` applies to a request at `requested` when it is at
 * least as broad.
 */
export function scopeCovers(granted: Scope, requested: Scope): boolean {
  return BREADTH[granted] >= BREADTH[requested];
}

/**
 * Sort comparator: most specific (narrowest) scope first.
 */
export function compareSpecificity(a: Scope, b: Scope): number {
  return BREADTH[a] - BREADTH[b];
}
