import { norm } from "./utils";

/**
 * `first-wins`: once a label holds a non-blank value, later writes are ignored.
 * `last-wins`: later non-blank writes replace the value in place.
 */
export type DuplicatePolicy = "first-wins" | "last-wins";

/** Insertion-ordered label → value map that never holds blank keys or values. */
export class AttributeMap {
  private readonly values = new Map<string, string>();

  constructor(readonly policy: DuplicatePolicy = "first-wins") {}

  get size(): number {
    return this.values.size;
  }

  get(key: string): string | undefined {
    return this.values.get(norm(key));
  }

  /** Writes only when the label is missing or blank. Returns whether it wrote. */
  insertIfAbsentOrBlank(key: string, value: string): boolean {
    const k = norm(key);
    const v = norm(value);
    if (!k || !v) return false;
    if (norm(this.values.get(k))) return false;
    this.values.set(k, v);
    return true;
  }

  /** Writes according to the map's duplicate policy. */
  insert(key: string, value: string): boolean {
    if (this.policy === "first-wins") return this.insertIfAbsentOrBlank(key, value);

    const k = norm(key);
    const v = norm(value);
    if (!k || !v) return false;
    this.values.set(k, v);
    return true;
  }

  /** Drops entries whose value became blank. */
  compact(): this {
    for (const [k, v] of this.values) {
      if (!norm(v)) this.values.delete(k);
    }
    return this;
  }

  entries(): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
