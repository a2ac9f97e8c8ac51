import axios from 'axios';
import type { LineItemRequest } from '../shared/types';

export interface LoadTestOptions {
  apiUrl: string;
  numOrders: number;
  items: LineItemRequest[];
  timeoutMs?: number;
}

export interface LoadTestSummary {
  succeeded: number;
  failed: number;
  /** Response count per HTTP status; `0` counts requests that got no response. */
  statuses: Record<number, number>;
  durationMs: number;
}

async function sendOrder(apiUrl: string, orderNumber: number, items: LineItemRequest[], timeoutMs: number): Promise<number> {
  try {
    const response = await axios.post(
      `${apiUrl}/api/orders`,
      { customer_id: `cust-${orderNumber}`, items },
      { timeout: timeoutMs, validateStatus: () => true },
    );
    return response.status;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      console.error(`Order ${orderNumber} Error:`, error.message);
      return 0;
    }
    throw error;
  }
}

/** Fires `numOrders` create-order requests at once and tallies the outcomes. */
export async function runLoadTest({ apiUrl, numOrders, items, timeoutMs = 30_000 }: LoadTestOptions): Promise<LoadTestSummary> {
  const startTime = Date.now();

  const promises: Promise<number>[] = [];
  for (let i = 0; i < numOrders; i++) {
    promises.push(sendOrder(apiUrl, i, items, timeoutMs));
  }
  const statuses = await Promise.all(promises);

  const summary: LoadTestSummary = { succeeded: 0, failed: 0, statuses: {}, durationMs: Date.now() - startTime };
  for (const status of statuses) {
    summary.statuses[status] = (summary.statuses[status] ?? 0) + 1;
    if (status >= 200 && status < 300) summary.succeeded++;
    else summary.failed++;
  }
  return summary;
}
