/**
 * Read-only view over the header settings.
 * Exposes no set/delete/clear, so a report cannot be changed after parsing.
 */
export class FrozenConfig implements ReadonlyMap<string, string> {
  private readonly settings: Map<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.settings = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.settings.size;
  }

  get(key: string): string | undefined {
    return this.settings.get(key);
  }

  has(key: string): boolean {
    return this.settings.has(key);
  }

  forEach(callback: (value: string, key: string, map: ReadonlyMap<string, string>) => void, thisArg?: unknown): void {
    this.settings.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.settings.entries();
  }

  keys() {
    return this.settings.keys();
  }

  values() {
    return this.settings.values();
  }

  [Symbol.iterator]() {
    return this.settings[Symbol.iterator]();
  }
}
