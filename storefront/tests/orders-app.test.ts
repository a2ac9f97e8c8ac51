import axios from 'axios';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { RunningServer } from '../shared/http';
import {
  closedPortUrl,
  startInventory,
  startOrders,
  startStub,
  type RunningInventory,
  type RunningOrders,
} from './support/stack';

const http = axios.create({ validateStatus: () => true });

describe('orders-service HTTP API', () => {
  let inventory: RunningInventory;
  let orders: RunningOrders;

  beforeEach(async () => {
    inventory = await startInventory();
    orders = await startOrders(inventory.url);
  });

  afterEach(async () => {
    await orders.close();
    await inventory.close();
  });

  it('should create an order and reserve its stock in the inventory service', async () => {
    const response = await http.post(`${orders.url}/api/orders`, {
      customer_id: 'c1',
      items: [
        { product_id: 'mouse', quantity: 2 },
        { product_id: 'keyboard', quantity: 1 },
      ],
    });

    expect(response.status).toBe(200);
    expect(response.data.order_id).toBe(1000);
    expect(response.data.total_value).toBe(149.97);
    expect(response.data.status).toBe('confirmed');
    expect(inventory.store.read('mouse').stock).toBe(148);
    expect(inventory.store.read('keyboard').stock).toBe(74);
  });

  it('should return a created order unchanged from get-by-id and the list', async () => {
    const created = await http.post(`${orders.url}/api/orders`, { customer_id: 'c1', items: [{ product_id: 'monitor', quantity: 2 }] });

    const fetched = await http.get(`${orders.url}/api/orders/${created.data.order_id}`);
    const listed = await http.get(`${orders.url}/api/orders`);

    expect(fetched.status).toBe(200);
    expect(fetched.data).toEqual(created.data);
    expect(listed.data).toEqual({ orders: [created.data], total: 1 });
  });

  it('should fail with 404 naming an unknown product and keep earlier items decremented', async () => {
    const response = await http.post(`${orders.url}/api/orders`, {
      customer_id: 'c1',
      items: [
        { product_id: 'headset', quantity: 4 },
        { product_id: 'toaster', quantity: 1 },
      ],
    });

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ error: 'NOT_FOUND', detail: 'Product toaster not found in inventory' });
    expect(inventory.store.read('headset').stock).toBe(56);
    expect(orders.orders.size).toBe(0);
    expect((await http.get(`${orders.url}/api/orders/1000`)).status).toBe(404);
  });

  it('should fail with 400 when an item exceeds the available stock', async () => {
    const response = await http.post(`${orders.url}/api/orders`, { customer_id: 'c1', items: [{ product_id: 'laptop', quantity: 26 }] });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      error: 'INSUFFICIENT_STOCK',
      detail: 'Insufficient stock for laptop. Available: 25, Requested: 26',
      available: 25,
      requested: 26,
    });
  });

  it('should answer 422 for a malformed order request', async () => {
    const response = await http.post(`${orders.url}/api/orders`, { customer_id: 'c1', items: [{ product_id: 'mouse', quantity: 0 }] });

    expect(response.status).toBe(422);
    expect(response.data.error).toBe('VALIDATION_FAILED');
    expect(response.data.detail).toContain('items.0.quantity');
    expect(inventory.store.read('mouse').stock).toBe(150);
  });

  it('should confirm an order with no items and no customer id at zero value', async () => {
    const response = await http.post(`${orders.url}/api/orders`, { customer_id: '', items: [] });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      order_id: 1000,
      customer_id: '',
      items: [],
      total_value: 0,
      status: 'confirmed',
      created_at: '2026-01-15T10:00:00.000Z',
    });
    expect(orders.orders.size).toBe(1);
  });

  it('should answer 400 for a body that is not JSON', async () => {
    const response = await http.post(`${orders.url}/api/orders`, '{"customer_id":', {
      headers: { 'content-type': 'application/json' },
    });

    expect(response.status).toBe(400);
    expect(response.data.error).toBe('BAD_REQUEST');
  });

  it('should answer 422 for a non-integer order id and 404 for a missing one', async () => {
    expect((await http.get(`${orders.url}/api/orders/abc`)).status).toBe(422);

    const missing = await http.get(`${orders.url}/api/orders/999`);
    expect(missing.status).toBe(404);
    expect(missing.data).toEqual({ error: 'NOT_FOUND', detail: 'Order 999 not found' });
  });

  it.each(['0x3E8', '1e3', '1000.0', '+1000'])('should answer 422 for the non-decimal order id %s', async (orderId) => {
    await http.post(`${orders.url}/api/orders`, { customer_id: 'c1', items: [{ product_id: 'mouse', quantity: 1 }] });

    const response = await http.get(`${orders.url}/api/orders/${orderId}`);

    expect(response.status).toBe(422);
    expect(response.data).toEqual({ error: 'VALIDATION_FAILED', detail: 'id: Order id must be an integer' });
  });

  it('should describe itself on the root path', async () => {
    const response = await http.get(`${orders.url}/`);

    expect(response.data.service).toBe('orders-service');
    expect(response.data.inventory_api).toBe(inventory.url);
  });
});

describe('orders-service upstream failures', () => {
  const servers: RunningServer[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.close()));
  });

  async function ordersAgainst(inventoryUrl: string, timeoutMs?: number): Promise<RunningOrders> {
    const orders = await startOrders(inventoryUrl, timeoutMs);
    servers.push(orders);
    return orders;
  }

  const request = { customer_id: 'c1', items: [{ product_id: 'mouse', quantity: 1 }] };

  it('should answer 503 when the inventory service is unreachable', async () => {
    const orders = await ordersAgainst(await closedPortUrl());

    const response = await http.post(`${orders.url}/api/orders`, request);

    expect(response.status).toBe(503);
    expect(response.data.error).toBe('UPSTREAM_UNAVAILABLE');
    expect(response.data.detail).toMatch(/^Unable to reach inventory-service: GET http:\/\/127\.0\.0\.1:\d+\/api\/inventory\/mouse: /);
  });

  it('should answer 503 when the inventory service times out', async () => {
    const stub = await startStub((app) => {
      app.get('/api/inventory/:id', () => undefined);
    });
    servers.push(stub);
    const orders = await ordersAgainst(stub.url, 50);

    const response = await http.post(`${orders.url}/api/orders`, request);

    expect(response.status).toBe(503);
    expect(response.data.detail).toContain('timeout of 50ms exceeded');
  });

  it('should answer 502 when the inventory service sends something other than JSON', async () => {
    const stub = await startStub((app) => {
      app.get('/api/inventory/:id', (req, res) => {
        res.status(200).type('text/html').send('<html>maintenance</html>');
      });
    });
    servers.push(stub);
    const orders = await ordersAgainst(stub.url);

    const response = await http.post(`${orders.url}/api/orders`, request);

    expect(response.status).toBe(502);
    expect(response.data).toEqual({
      error: 'MALFORMED_UPSTREAM_RESPONSE',
      detail: 'Invalid response from inventory-service: body is not JSON: <html>maintenance</html>',
    });
  });

  it('should answer 503 when a product read fails with a server error', async () => {
    const stub = await startStub((app) => {
      app.get('/api/inventory/:id', (req, res) => {
        res.status(500).json({ error: 'INTERNAL', detail: 'Internal Server Error' });
      });
    });
    servers.push(stub);
    const orders = await ordersAgainst(stub.url);

    const response = await http.post(`${orders.url}/api/orders`, request);

    expect(response.status).toBe(503);
    expect(response.data).toEqual({
      error: 'UPSTREAM_UNAVAILABLE',
      detail: 'Unable to reach inventory-service: HTTP 500 reading mouse',
    });
  });

  it('should answer 502 when a product read answers an unexpected status', async () => {
    const stub = await startStub((app) => {
      app.get('/api/inventory/:id', (req, res) => {
        res.status(409).json({ error: 'BAD_REQUEST', detail: 'conflict' });
      });
    });
    servers.push(stub);
    const orders = await ordersAgainst(stub.url);

    const response = await http.post(`${orders.url}/api/orders`, request);

    expect(response.status).toBe(502);
    expect(response.data).toEqual({
      error: 'MALFORMED_UPSTREAM_RESPONSE',
      detail: 'Invalid response from inventory-service: unexpected HTTP 409 reading mouse',
    });
  });

  it('should answer 502 when a product view is missing fields', async () => {
    const stub = await startStub((app) => {
      app.get('/api/inventory/:id', (req, res) => {
        res.json({ product_id: req.params.id, name: 'Wireless Mouse' });
      });
    });
    servers.push(stub);
    const orders = await ordersAgainst(stub.url);

    const response = await http.post(`${orders.url}/api/orders`, request);

    expect(response.status).toBe(502);
    expect(response.data.detail).toContain('stock: Required');
  });

  it('should answer 500 when the reservation is refused after a successful check', async () => {
    const stub = await startStub((app) => {
      app.get('/api/inventory/:id', (req, res) => {
        res.json({ product_id: req.params.id, name: 'Wireless Mouse', stock: 3, price: 29.99, available: true });
      });
      app.post('/api/inventory/:id/reserve', (req, res) => {
        res.status(400).json({ error: 'INSUFFICIENT_STOCK', detail: 'Insufficient stock for mouse. Available: 0, Requested: 1' });
      });
    });
    servers.push(stub);
    const orders = await ordersAgainst(stub.url);

    const response = await http.post(`${orders.url}/api/orders`, request);

    expect(response.status).toBe(500);
    expect(response.data).toEqual({
      error: 'RESERVATION_FAILED',
      detail: 'Failed to reserve inventory for mouse: Insufficient stock for mouse. Available: 0, Requested: 1',
    });
  });

  it('should propagate the request id to the inventory service', async () => {
    const seen: (string | undefined)[] = [];
    const stub = await startStub((app) => {
      app.get('/api/inventory/:id', (req, res) => {
        seen.push(req.get('x-request-id'));
        res.status(404).json({ error: 'NOT_FOUND', detail: 'nope' });
      });
    });
    servers.push(stub);
    const orders = await ordersAgainst(stub.url);

    await http.post(`${orders.url}/api/orders`, request, { headers: { 'x-request-id': 'trace-1' } });

    expect(seen).toEqual(['trace-1']);
  });
});
