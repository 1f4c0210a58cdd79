/**
 * Header storage with a single normalization point: names are lowercased on
 * every insert and lookup, values are kept as received. A repeated name
 * replaces the earlier value.
 */
export class HeaderMap implements Iterable<[string, string]> {
  private readonly entries = new Map<string, string>();

  constructor(init?: Iterable<[string, string]>) {
    if (!init) return;
    for (const [name, value] of init) {
      this.set(name, value);
    }
  }

  set(name: string, value: string): this {
    this.entries.set(name.toLowerCase(), value);
    return this;
  }

  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.entries[Symbol.iterator]();
  }
}
