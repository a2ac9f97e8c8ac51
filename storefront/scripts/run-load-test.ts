import { runLoadTest } from './load-test';

const API_URL = process.env.API_URL || 'http://localhost:8080';
const NUM_ORDERS = Number(process.env.NUM_ORDERS || 50);

console.log(`Starting load test with ${NUM_ORDERS} orders against ${API_URL}...`);

runLoadTest({
  apiUrl: API_URL,
  numOrders: NUM_ORDERS,
  items: [
    { product_id: 'mouse', quantity: 1 },
    { product_id: 'keyboard', quantity: 2 },
  ],
}).then(
  (summary) => {
    console.log(`Finished load test in ${summary.durationMs}ms`);
    console.log(`Succeeded: ${summary.succeeded}, Failed: ${summary.failed}`, summary.statuses);
  },
  (err: unknown) => {
    console.error('Load test failed:', err);
    process.exitCode = 1;
  },
);
