/**
 * Bounded page cache, evicting in insertion order.
 *
 * Reading an entry never refreshes its position: the oldest inserted URL is
 * the next one to go, however recently it was read.
 */
export class PageCache {
  readonly #pages = new Map<string, string>();

  /**
   * @param capacity Maximum number of pages kept
   */
  constructor(public readonly capacity = 10) {}

  get size(): number {
    return this.#pages.size;
  }

  has(url: string): boolean {
    return this.#pages.has(url);
  }

  get(url: string): string | undefined {
    return this.#pages.get(url);
  }

  /**
   * Store a page and evict the oldest ones past capacity, in the same turn
   *
   * @returns URLs evicted by this insert
   */
  set(url: string, html: string): string[] {
    const evicted: string[] = [];
    this.#pages.set(url, html);
    for (const oldest of this.#pages.keys()) {
      if (this.#pages.size <= this.capacity) break;
      this.#pages.delete(oldest);
      evicted.push(oldest);
    }
    return evicted;
  }

  clear(): void {
    this.#pages.clear();
  }

  keys(): string[] {
    return [...this.#pages.keys()];
  }
}
