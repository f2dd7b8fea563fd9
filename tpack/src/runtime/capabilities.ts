export type Capability = (...args: unknown[]) => unknown;

export interface CapabilityTree {
  [segment: string]: CapabilityTree | Capability;
}

/** Raised when a dotted capability path has no registered action. */
export class ActionNotDeclaredError extends Error {
  constructor(
    readonly actionPath: string,
    readonly missingSegment: string,
  ) {
    super(`action not declared: ${actionPath} (no '${missingSegment}')`);
    this.name = "ActionNotDeclaredError";
  }
}

/** Actions keyed by dotted path, e.g. `user.q_version`. */
export class CapabilityRegistry {
  private readonly root: CapabilityTree = {};

  register(actionPath: string, action: Capability): void {
    const segments = actionPath.split(".");
    const last = segments.pop();
    if (!last) throw new Error(`invalid action path: '${actionPath}'`);
    let node = this.root;
    for (const segment of segments) {
      const next = node[segment];
      if (typeof next === "function") throw new Error(`'${segment}' in ${actionPath} is already an action`);
      if (next) {
        node = next;
      } else {
        const created: CapabilityTree = {};
        node[segment] = created;
        node = created;
      }
    }
    node[last] = action;
  }

  lookup(actionPath: string): Capability {
    let node: CapabilityTree | Capability = this.root;
    for (const segment of actionPath.split(".")) {
      if (typeof node === "function" || !Object.hasOwn(node, segment)) {
        throw new ActionNotDeclaredError(actionPath, segment);
      }
      node = node[segment];
    }
    if (typeof node !== "function") throw new ActionNotDeclaredError(actionPath, actionPath.split(".").pop() ?? actionPath);
    return node;
  }

  has(actionPath: string): boolean {
    try {
      this.lookup(actionPath);
      return true;
    } catch (err) {
      if (err instanceof ActionNotDeclaredError) return false;
      throw err;
    }
  }
}
