import type { DeliveryRecord, PurchaseOrder } from "@supply-forecast/contracts";

export type DeliveryLedgerSources = {
  deliveries?: DeliveryRecord[];
  orders?: PurchaseOrder[];
};

/**
 * Received quantities per item and date, drawn from delivered purchase orders
 * and standalone delivery records.
 */
export class DeliveryLedger {
  private readonly entries: DeliveryRecord[];

  constructor(entries: DeliveryRecord[] = []) {
    this.entries = entries
      .map((entry) => ({ ...entry }))
      .toSorted((a, b) => a.date.localeCompare(b.date) || a.itemId.localeCompare(b.itemId));
  }

  static fromSources(sources: DeliveryLedgerSources): DeliveryLedger {
    const fromOrders = deliveriesFromOrders(sources.orders ?? []);
    const representedOrders = new Set(
      fromOrders.flatMap((entry) => (entry.sourceOrderId ? [entry.sourceOrderId] : [])),
    );

    // A delivery record pointing at an order already on file is the same delivery.
    const standalone = (sources.deliveries ?? []).filter(
      (entry) => !entry.sourceOrderId || !representedOrders.has(entry.sourceOrderId),
    );

    return new DeliveryLedger([...fromOrders, ...standalone]);
  }

  /** Sum of deliveries for `itemId` dated in the interval (after, through]. */
  totalBetween(itemId: string, after: string, through: string): number {
    return this.entries
      .filter((entry) => entry.itemId === itemId && entry.date > after && entry.date <= through)
      .reduce((sum, entry) => sum + entry.quantity, 0);
  }

  totalOn(itemId: string, date: string): number {
    return this.entries
      .filter((entry) => entry.itemId === itemId && entry.date === date)
      .reduce((sum, entry) => sum + entry.quantity, 0);
  }

  records(): DeliveryRecord[] {
    return this.entries.map((entry) => ({ ...entry }));
  }
}

export function deliveriesFromOrders(orders: PurchaseOrder[]): DeliveryRecord[] {
  const deliveries: DeliveryRecord[] = [];

  for (const order of orders) {
    if (order.status !== "delivered" || !order.deliveryDate) {
      continue;
    }

    for (const line of order.lineItems) {
      if (line.quantityReceived <= 0) {
        continue;
      }
      deliveries.push({
        date: order.deliveryDate,
        itemId: line.itemId,
        quantity: line.quantityReceived,
        unitCost: line.unitCost,
        notes: `Received on order ${order.orderId}`,
        sourceOrderId: order.orderId,
      });
    }
  }

  return deliveries;
}
