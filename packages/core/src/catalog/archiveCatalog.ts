/**
 * Archive Catalog
 *
 * Shared size registry for binary and source catalogs. Sizes are keyed by
 * name; each underlying file (its dedup key) contributes at most once, no
 * matter how many index documents list it.
 */

export abstract class ArchiveCatalog {
  private readonly sizes = new Map<string, number>();
  private readonly registered = new Set<string>();

  /**
   * Make `name` known without adding any bytes
   */
  protected touch(name: string): void {
    if (!this.sizes.has(name)) {
      this.sizes.set(name, 0);
    }
  }

  /**
   * Add `size` to `name` unless the file behind `key` was already counted.
   * Returns whether the bytes were counted.
   */
  protected register(name: string, key: string, size: number): boolean {
    this.touch(name);
    if (this.registered.has(key)) {
      return false;
    }
    this.registered.add(key);
    this.sizes.set(name, (this.sizes.get(name) ?? 0) + size);
    return true;
  }

  has(name: string): boolean {
    return this.sizes.has(name);
  }

  /** 0 for unknown names */
  sizeOf(name: string): number {
    return this.sizes.get(name) ?? 0;
  }

  totalSizeOf(names: Iterable<string>): number {
    let total = 0;
    for (const name of names) {
      total += this.sizeOf(name);
    }
    return total;
  }

  /** Names in the order they were first seen */
  names(): string[] {
    return [...this.sizes.keys()];
  }

  get count(): number {
    return this.sizes.size;
  }

  get totalSize(): number {
    return this.totalSizeOf(this.sizes.keys());
  }
}
