import { InsufficientStockError, OrderNotFoundError } from '../shared/errors';
import { errorMessage, type Logger } from '../shared/logger';
import { roundCurrency } from '../shared/money';
import type { CallContext, CreateOrderRequest, LineItemRequest, Order, OrderLineItem } from '../shared/types';
import type { InventoryGateway } from './inventory-client';
import type { OrderStore } from './order-store';

export interface OrderOrchestratorDeps {
  inventory: InventoryGateway;
  orders: OrderStore;
  logger: Logger;
  now?: () => Date;
}

/**
 * Turns an order request into a confirmed order by reserving each line item
 * against the inventory service, one at a time and in request order.
 *
 * A failure aborts the request at the failing item. Items reserved before it
 * stay reserved: there is no compensating release, so their stock is gone
 * even though no order records it.
 */
export class OrderOrchestrator {
  private readonly inventory: InventoryGateway;
  private readonly orders: OrderStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor({ inventory, orders, logger, now = () => new Date() }: OrderOrchestratorDeps) {
    this.inventory = inventory;
    this.orders = orders;
    this.logger = logger;
    this.now = now;
  }

  listOrders(): Order[] {
    return this.orders.list();
  }

  getOrder(orderId: number): Order {
    const order = this.orders.get(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    return order;
  }

  async createOrder(request: CreateOrderRequest, context: CallContext = {}): Promise<Order> {
    const orderId = this.orders.allocateId();
    const log = this.logger.child({ requestId: context.requestId, orderId });
    log.info('Creating order', { customerId: request.customer_id, itemCount: request.items.length });

    const items: OrderLineItem[] = [];
    for (const [index, requested] of request.items.entries()) {
      try {
        items.push(await this.reserveLineItem(requested, context, log));
      } catch (err) {
        log.warn(items.length > 0 ? 'Order aborted, earlier reservations left in place' : 'Order aborted', {
          failedItem: index,
          productId: requested.product_id,
          error: errorMessage(err),
          unreleased: items.length > 0 ? items.map((item) => `${item.product_id}:${item.quantity}`).join(',') : undefined,
        });
        throw err;
      }
    }

    const order: Order = {
      order_id: orderId,
      customer_id: request.customer_id,
      items,
      total_value: roundCurrency(items.reduce((sum, item) => sum + item.line_total, 0)),
      status: 'confirmed',
      created_at: this.now().toISOString(),
    };
    this.orders.save(order);

    log.info(`Order created successfully with total value $${order.total_value.toFixed(2)}`);
    return order;
  }

  private async reserveLineItem(
    { product_id, quantity }: LineItemRequest,
    context: CallContext,
    log: Logger,
  ): Promise<OrderLineItem> {
    log.info(`Checking inventory for ${product_id}`);
    const product = await this.inventory.getProduct(product_id, context);
    if (product.stock < quantity) {
      throw new InsufficientStockError(product_id, product.stock, quantity);
    }

    log.info(`Reserving ${quantity} units of ${product_id}`);
    await this.inventory.reserve(product_id, quantity, context);

    return {
      product_id,
      product_name: product.name,
      quantity,
      unit_price: product.price,
      line_total: roundCurrency(product.price * quantity),
    };
  }
}
