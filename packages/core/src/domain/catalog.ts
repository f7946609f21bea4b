import type { Item } from "./models";

/** Read-only item source keyed by id and grouped by topic. */
export interface ItemCatalog {
  get(itemId: string): Item | undefined;
  byTopic(topic: string): readonly Item[];
  all(): readonly Item[];
  topics(): readonly string[];
}

export class InMemoryCatalog implements ItemCatalog {
  private readonly items = new Map<string, Item>();
  private readonly groups = new Map<string, Item[]>();

  constructor(items: readonly Item[] = []) {
    items.forEach(item => this.add(item));
  }

  public get size(): number {
    return this.items.size;
  }

  /** Adds an item, replacing any earlier item with the same id. */
  public add(item: Item): void {
    const previous = this.items.get(item.id);
    if (previous) {
      const group = this.groups.get(previous.topic) ?? [];
      this.groups.set(
        previous.topic,
        group.filter(entry => entry.id !== item.id)
      );
    }

    this.items.set(item.id, item);
    const group = this.groups.get(item.topic) ?? [];
    group.push(item);
    this.groups.set(item.topic, group);
  }

  public get(itemId: string): Item | undefined {
    return this.items.get(itemId);
  }

  public byTopic(topic: string): readonly Item[] {
    return this.groups.get(topic) ?? [];
  }

  public all(): readonly Item[] {
    return Array.from(this.items.values());
  }

  public topics(): readonly string[] {
    return Array.from(this.groups.entries())
      .filter(([, group]) => group.length > 0)
      .map(([topic]) => topic);
  }
}
