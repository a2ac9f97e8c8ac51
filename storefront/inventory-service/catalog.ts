import type { Product } from '../shared/types';

export const DEFAULT_CATALOG: readonly Product[] = [
  { id: 'laptop', name: 'Laptop Pro', stock: 25, unitPrice: 1299.99 },
  { id: 'mouse', name: 'Wireless Mouse', stock: 150, unitPrice: 29.99 },
  { id: 'keyboard', name: 'Mechanical Keyboard', stock: 75, unitPrice: 89.99 },
  { id: 'monitor', name: '4K Monitor', stock: 40, unitPrice: 449.99 },
  { id: 'headset', name: 'Gaming Headset', stock: 60, unitPrice: 79.99 },
];
