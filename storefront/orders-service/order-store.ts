import type { Order } from '../shared/types';

/** In-memory order table plus the order-id counter. Saved orders are frozen. */
export class OrderStore {
  private readonly orders = new Map<number, Order>();
  private nextOrderId: number;

  constructor(firstOrderId = 1000) {
    this.nextOrderId = firstOrderId;
  }

  /** Hands out the next id. Ids are never reused, even when the order fails. */
  allocateId(): number {
    return this.nextOrderId++;
  }

  save(order: Order): void {
    if (this.orders.has(order.order_id)) {
      throw new Error(`Order ${order.order_id} already exists`);
    }
    for (const item of order.items) Object.freeze(item);
    Object.freeze(order.items);
    this.orders.set(order.order_id, Object.freeze(order));
  }

  get(orderId: number): Order | undefined {
    return this.orders.get(orderId);
  }

  list(): Order[] {
    return [...this.orders.values()];
  }

  get size(): number {
    return this.orders.size;
  }
}
