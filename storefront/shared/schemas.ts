import { z } from 'zod';
import { ERROR_CODES } from './errors';

export const ProductViewSchema = z.object({
  product_id: z.string(),
  name: z.string(),
  stock: z.number().int().nonnegative(),
  price: z.number().nonnegative(),
  available: z.boolean(),
});

export const ReservationResultSchema = z.object({
  success: z.literal(true),
  product_id: z.string(),
  reserved_quantity: z.number().int().positive(),
  remaining_stock: z.number().int().nonnegative(),
});

export const ReserveQuerySchema = z.object({
  quantity: z.coerce.number().int().positive().default(1),
});

export const LineItemRequestSchema = z.object({
  product_id: z.string().min(1),
  quantity: z.number().int().positive(),
});

export const CreateOrderRequestSchema = z.object({
  customer_id: z.string(),
  items: z.array(LineItemRequestSchema),
});

export const OrderLineItemSchema = z.object({
  product_id: z.string(),
  product_name: z.string(),
  quantity: z.number().int().positive(),
  unit_price: z.number().nonnegative(),
  line_total: z.number().nonnegative(),
});

export const OrderSchema = z.object({
  order_id: z.number().int(),
  customer_id: z.string(),
  items: z.array(OrderLineItemSchema),
  total_value: z.number().nonnegative(),
  status: z.literal('confirmed'),
  created_at: z.string(),
});

export const OrderListSchema = z.object({
  orders: z.array(OrderSchema),
  total: z.number().int().nonnegative(),
});

export const OrderIdParamsSchema = z.object({
  id: z
    .string()
    .regex(/^-?\d+$/, 'Order id must be an integer')
    .pipe(z.coerce.number().int()),
});

export const ErrorBodySchema = z.object({
  error: z.enum(ERROR_CODES).catch('UPSTREAM_ERROR'),
  detail: z.string(),
  available: z.number().optional(),
  requested: z.number().optional(),
});

/** Flattens zod issues into one line such as `items.0.quantity: Expected number, received string`. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
