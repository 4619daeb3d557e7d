import type { UrlFilter } from "./url-filter";

export type HandlerEntry<H> = {
  filter: UrlFilter;
  handler: H;
};

/**
 * At most one handler per stage. Setting a stage again replaces the entry,
 * there are no subscriber lists. `M` maps each stage to its handler type.
 */
export class ListenerTable<M extends object> {
  private entries: { [K in keyof M]?: HandlerEntry<M[K]> } = {};
  // Insertion order of the stages that currently hold an entry.
  private order = new Set<keyof M>();

  get size() {
    return this.order.size;
  }

  set<K extends keyof M>(stage: K, entry: HandlerEntry<M[K]>): void {
    this.entries[stage] = entry;
    this.order.add(stage);
  }

  clear<K extends keyof M>(stage: K): boolean {
    const existed = this.order.delete(stage);
    delete this.entries[stage];
    return existed;
  }

  get<K extends keyof M>(stage: K): HandlerEntry<M[K]> | undefined {
    return this.entries[stage];
  }

  has<K extends keyof M>(stage: K) {
    return this.entries[stage] !== undefined;
  }

  stages(): (keyof M)[] {
    return Array.from(this.order);
  }

  reset(): void {
    this.entries = {};
    this.order.clear();
  }
}
