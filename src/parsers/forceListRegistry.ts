import { DEFAULT_FORCE_LIST } from "../constants/OperationConstant";

export type ForceListEntries = Readonly<Record<string, readonly string[]>>;

/**
 * Parent local name -> child local names that always decode to a list.
 *
 * XML cannot tell "one repeatable child" from "a singleton" without a schema,
 * so known repeatable containers are listed here. Instances are immutable;
 * `extend` returns a new registry.
 */
export class ForceListRegistry {
  private readonly rules: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(entries: ForceListEntries = {}) {
    const rules = new Map<string, ReadonlySet<string>>();
    for (const [parent, children] of Object.entries(entries)) {
      rules.set(parent, new Set(children));
    }
    this.rules = rules;
  }

  static defaults(): ForceListRegistry {
    return new ForceListRegistry(DEFAULT_FORCE_LIST);
  }

  /**
   * Forced children for a parent, empty when none are registered
   */
  childrenOf(parent: string): ReadonlySet<string> {
    return this.rules.get(parent) ?? new Set<string>();
  }

  extend(entries: ForceListEntries): ForceListRegistry {
    const merged: Record<string, string[]> = {};
    for (const [parent, children] of this.rules) {
      merged[parent] = [...children];
    }
    for (const [parent, children] of Object.entries(entries)) {
      merged[parent] = [...(merged[parent] ?? []), ...children];
    }
    return new ForceListRegistry(merged);
  }

  toJSON(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [parent, children] of this.rules) {
      out[parent] = [...children];
    }
    return out;
  }
}
