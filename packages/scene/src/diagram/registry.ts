import type { ElementHandle } from "../elements";

/**
 * Caller-keyed map of node handles, owned by one builder.
 *
 * Registering an existing key replaces the entry. The element behind the
 * previous handle stays in the document; it is only unreachable by key.
 */
export class NodeRegistry {
  private handles: Map<string, ElementHandle> = new Map();

  register(key: string, handle: ElementHandle): void {
    this.handles.set(key, handle);
  }

  /**
   * Get a handle by key. Returns undefined if not registered.
   */
  lookup(key: string): ElementHandle | undefined {
    return this.handles.get(key);
  }

  /**
   * Look up both ends of a connection. Returns the missing keys when either is absent.
   */
  lookupPair(
    fromKey: string,
    toKey: string,
  ):
    | { found: true; source: ElementHandle; target: ElementHandle }
    | { found: false; missingKeys: string[] } {
    const source = this.handles.get(fromKey);
    const target = this.handles.get(toKey);
    if (source && target) {
      return { found: true, source, target };
    }
    const missingKeys = [fromKey, toKey].filter((key) => !this.handles.has(key));
    return { found: false, missingKeys: [...new Set(missingKeys)] };
  }

  keys(): string[] {
    return Array.from(this.handles.keys());
  }

  size(): number {
    return this.handles.size;
  }
}
