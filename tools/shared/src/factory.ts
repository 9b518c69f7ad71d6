/**
 * Create-or-fetch registries keyed by declared name.
 */

/**
 * A registry holding at most one object per name.
 */
export interface NamedFactory<T extends { name: string }, A> {
  /**
   * Return the object registered under `name`, constructing it from `args`
   * on first use. `args` are ignored once the name is known.
   */
  getOrCreate(name: string, args: A): T;
  /** Non-creating lookup. */
  lookup(name: string): T | undefined;
  /** All objects ordered by name. */
  sorted(): T[];
  readonly size: number;
}

/**
 * Compare names by UTF-16 code units so ordering never depends on locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Create a named factory around a constructor function.
 */
export function createNamedFactory<T extends { name: string }, A>(
  construct: (name: string, args: A) => T
): NamedFactory<T, A> {
  const registry = new Map<string, T>();

  return {
    getOrCreate(name, args) {
      const existing = registry.get(name);
      if (existing !== undefined) {
        return existing;
      }
      const created = construct(name, args);
      registry.set(name, created);
      return created;
    },

    lookup(name) {
      return registry.get(name);
    },

    sorted() {
      return Array.from(registry.values()).sort((a, b) => compareNames(a.name, b.name));
    },

    get size() {
      return registry.size;
    },
  };
}
