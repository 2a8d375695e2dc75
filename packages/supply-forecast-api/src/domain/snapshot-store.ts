import type { InventoryItem, InventorySnapshot } from "@supply-forecast/contracts";

function snapshotKey(date: string, itemId: string): string {
  return `${date}|${itemId}`;
}

function compareSnapshots(a: InventorySnapshot, b: InventorySnapshot): number {
  return a.date.localeCompare(b.date) || a.itemId.localeCompare(b.itemId);
}

/**
 * Dated stock observations keyed by (date, itemId). A later write for the same
 * key replaces the earlier one.
 */
export class SnapshotStore {
  private readonly snapshots = new Map<string, InventorySnapshot>();

  constructor(initial: InventorySnapshot[] = []) {
    for (const snapshot of initial) {
      this.upsert(snapshot);
    }
  }

  upsert(snapshot: InventorySnapshot): void {
    this.snapshots.set(snapshotKey(snapshot.date, snapshot.itemId), { ...snapshot });
  }

  /** Replaces every snapshot recorded for `date` with `entries`. */
  recordDay(date: string, entries: Array<Omit<InventorySnapshot, "date">>): InventorySnapshot[] {
    for (const [key, snapshot] of this.snapshots) {
      if (snapshot.date === date) {
        this.snapshots.delete(key);
      }
    }

    const recorded = entries.map((entry) => ({ ...entry, date }));
    for (const snapshot of recorded) {
      this.upsert(snapshot);
    }
    return recorded.toSorted(compareSnapshots);
  }

  list(): InventorySnapshot[] {
    return [...this.snapshots.values()].toSorted(compareSnapshots);
  }

  forItem(itemId: string): InventorySnapshot[] {
    return this.list().filter((snapshot) => snapshot.itemId === itemId);
  }

  itemIds(): string[] {
    return [...new Set(this.list().map((snapshot) => snapshot.itemId))].toSorted();
  }

  latestFor(itemId: string): InventorySnapshot | null {
    return this.forItem(itemId).at(-1) ?? null;
  }

  get size(): number {
    return this.snapshots.size;
  }
}

export function syncCurrentStock(items: InventoryItem[], store: SnapshotStore): InventoryItem[] {
  return items.map((item) => {
    const latest = store.latestFor(item.itemId);
    return latest ? { ...item, currentStock: latest.stockLevel } : item;
  });
}
