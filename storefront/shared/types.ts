import type { z } from 'zod';
import type {
  CreateOrderRequestSchema,
  LineItemRequestSchema,
  OrderLineItemSchema,
  OrderListSchema,
  OrderSchema,
  ProductViewSchema,
  ReservationResultSchema,
} from './schemas';

export interface Product {
  id: string;
  name: string;
  stock: number;
  unitPrice: number;
}

export type ProductView = z.infer<typeof ProductViewSchema>;
export type ReservationResult = z.infer<typeof ReservationResultSchema>;
export type LineItemRequest = z.infer<typeof LineItemRequestSchema>;
export type CreateOrderRequest = z.infer<typeof CreateOrderRequestSchema>;
export type OrderLineItem = z.infer<typeof OrderLineItemSchema>;
export type Order = z.infer<typeof OrderSchema>;
export type OrderList = z.infer<typeof OrderListSchema>;

/** Per-request values carried into outbound calls. */
export type CallContext = {
  requestId?: string;
};
