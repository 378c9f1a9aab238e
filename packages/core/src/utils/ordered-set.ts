/**
 * Insertion-ordered, de-duplicating collection of strings.
 */
export class OrderedSet {
  private readonly items = new Set<string>();

  add(item: string): void {
    this.items.add(item);
  }

  has(item: string): boolean {
    return this.items.has(item);
  }

  get size(): number {
    return this.items.size;
  }

  toArray(): string[] {
    return [...this.items];
  }
}
