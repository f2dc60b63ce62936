class Role {
  private _id: string;
  private _name: string;
  private _description: string;
  private _parentId: string | null;
  private _level: number;
  private _isSystem: boolean;

  constructor(
    id: string,
    name: string,
    parentId: string | null = null,
    level: number = 0,
    isSystem: boolean = false,
    description: string = "",
  ) {
    // Invariants
    if (!id) throw new Error("Role ID is required");
    if (!name.trim()) throw new Error("Role name is required");
    if (parentId === id) throw new Error("Role cannot be its own parent");
    if (!Number.isInteger(level) || level < 0) {
      throw new Error("Role level must be a non-negative integer");
    }

    this._id = id;
    this._name = name;
    this._description = description;
    this._parentId = parentId;
    this._level = level;
    this._isSystem = isSystem;
  }

  // Getters
  get id(): string {
    return this._id;
  }
  get name(): string {
    return this._name;
  }
  get description(): string {
    return this._description;
  }
  get parentId(): string | null {
    return this._parentId;
  }
  /** Depth in the hierarchy; 0 for a root role. */
  get level(): number {
    return this._level;
  }
  get isSystem(): boolean {
    return this._isSystem;
  }

  isRoot(): boolean {
    return this._parentId === null;
  }

  /** System roles cannot be deleted. */
  canDelete(): boolean {
    return !this._isSystem;
  }

  /**
   * Whether `parent` sits above this role as the level invariant requires.
   */
  isBelow(parent: Role): boolean {
    return parent.level < this._level;
  }
}

export { Role };
