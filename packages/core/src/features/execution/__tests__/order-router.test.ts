import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OrderRouter } from '../order-router.js';
import type { VenueClient } from '../venue-client.js';
import { SimulatorVenueClient } from '../../simulator/simulator.js';
import type { OrderRequest, VenueAsset, VenueOrder, VenueOrderParams } from '../../../shared/protocol.js';
import {
  InvalidOrderError,
  NotFoundError,
  RoutingError,
  SubmissionRejectedError,
  UnknownInstrumentError,
  UnsupportedOrderTypeError,
} from '../../../shared/errors.js';

// ============================================================
// Helpers
// ============================================================

const NOW = new Date('2026-01-02T15:00:00.000Z');
const clock = () => NOW;

function makeRequest(overrides: Partial<OrderRequest> = {}): OrderRequest {
  return {
    clientOrderId: 'ord-1',
    instrument: 'AAPL',
    direction: 1,
    size: 10,
    orderType: 'market',
    ...overrides,
  };
}

function venueOrder(sim: SimulatorVenueClient, id: string): VenueOrder {
  const order = sim.getOrder(id);
  if (!order) {
    throw new Error(`simulator has no order ${id}`);
  }
  return order;
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function createMockClient(venue = 'mock') {
  return {
    venue,
    submitOrder: vi.fn<(params: VenueOrderParams) => Promise<string>>().mockResolvedValue('mock-1'),
    cancelOrder: vi.fn<(venueOrderId: string) => Promise<void>>().mockResolvedValue(undefined),
    listOrders: vi.fn().mockResolvedValue([]),
    listPositions: vi.fn().mockResolvedValue([]),
    getAccount: vi.fn().mockResolvedValue({ equity: '0', cash: '0', portfolio_value: '0' }),
    getAsset: vi.fn(async (instrument: string): Promise<VenueAsset | null> => ({
      symbol: instrument,
      fractionable: true,
      min_increment: '0.01',
    })),
  } satisfies VenueClient;
}

function mockVenueOrder(overrides: Partial<VenueOrder> = {}): VenueOrder {
  return {
    id: 'mock-1',
    client_order_id: 'ord-1',
    symbol: 'AAPL',
    side: 'buy',
    type: 'limit',
    qty: '10',
    filled_qty: '0',
    limit_price: '150',
    time_in_force: 'day',
    status: 'accepted',
    ...overrides,
  };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

// ============================================================
// Placement
// ============================================================

describe('Order placement', () => {
  let sim: SimulatorVenueClient;
  let router: OrderRouter;

  beforeEach(() => {
    sim = new SimulatorVenueClient({ clock });
    router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);
  });

  it('Market buy is submitted and acknowledged', async () => {
    const handle = await router.place(makeRequest());

    expect(handle.replayed).toBe(false);
    expect(handle.clientOrderId).toBe('ord-1');
    expect(handle.order).toMatchObject({
      venue: 'paper',
      venueOrderId: 'paper-0001',
      instrument: 'AAPL',
      size: '10',
      status: 'submitted',
      external: false,
      createdAt: '2026-01-02T15:00:00.000Z',
    });
    expect(venueOrder(sim, 'paper-0001')).toMatchObject({
      client_order_id: 'ord-1',
      side: 'buy',
      type: 'market',
      qty: '10',
    });
  });

  it('Generates a client order id when none is given', async () => {
    const handle = await router.place(makeRequest({ clientOrderId: undefined }));

    expect(handle.clientOrderId).toMatch(/^[0-9a-f-]{36}$/);
    expect(router.getOrder(handle.clientOrderId).status).toBe('submitted');
  });

  it('Placing the same client order id twice submits once', async () => {
    const first = await router.place(makeRequest());
    const second = await router.place(makeRequest({ size: 99 }));

    expect(sim.getSubmissionCount()).toBe(1);
    expect(second.replayed).toBe(true);
    expect(second.order).toBe(first.order);
  });

  it('Concurrent placements of one id submit once', async () => {
    const [a, b] = await Promise.all([router.place(makeRequest()), router.place(makeRequest())]);

    expect(sim.getSubmissionCount()).toBe(1);
    expect([a.replayed, b.replayed].sort()).toEqual([false, true]);
    expect(a.order.venueOrderId).toBe('paper-0001');
    expect(b.order.venueOrderId).toBe('paper-0001');
  });

  it('10.456 units of a whole-unit instrument are submitted as "10"', async () => {
    const handle = await router.place(makeRequest({ instrument: 'BRK.A', size: 10.456 }));

    expect(handle.order.size).toBe('10');
    expect(venueOrder(sim, 'paper-0001').qty).toBe('10');
  });

  it('Fractional size is rounded to the instrument increment', async () => {
    const handle = await router.place(makeRequest({ size: '1.23456' }));
    expect(handle.order.size).toBe('1.235');
  });

  it('Metadata is kept on the record', async () => {
    const handle = await router.place(makeRequest({
      orderType: 'limit',
      limitPrice: 150,
      takeProfit: 170,
      stopLoss: 140,
      timeInForce: 'gtc',
      strategyTag: 'breakout',
    }));

    expect(handle.order).toMatchObject({
      orderType: 'limit',
      limitPrice: 150,
      takeProfit: 170,
      stopLoss: 140,
      timeInForce: 'gtc',
      strategyTag: 'breakout',
    });
    expect(Object.isFrozen(handle.order)).toBe(true);
  });
});

// ============================================================
// Validation
// ============================================================

describe('Placement validation', () => {
  let sim: SimulatorVenueClient;
  let router: OrderRouter;

  beforeEach(() => {
    sim = new SimulatorVenueClient({ clock });
    router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);
  });

  it('Unknown instrument fails before anything is recorded or sent', async () => {
    await expect(router.place(makeRequest({ instrument: 'TSLA' }))).rejects.toThrow(UnknownInstrumentError);

    expect(router.listOrders()).toHaveLength(0);
    expect(sim.getSubmissionCount()).toBe(0);
  });

  it('Unrecognised order type fails with UnsupportedOrderTypeError', async () => {
    await expect(router.place(makeRequest({ orderType: 'trailing-stop' }))).rejects.toThrow(
      'Order type not recognised: trailing-stop',
    );
    expect(router.listOrders()).toHaveLength(0);
  });

  it('A racing replay of a failed placement sees the same error', async () => {
    const results = await Promise.allSettled([
      router.place(makeRequest({ orderType: 'iceberg' })),
      router.place(makeRequest({ orderType: 'iceberg' })),
    ]);

    expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
    for (const result of results) {
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(UnsupportedOrderTypeError);
      }
    }
  });

  it.each([0, -5, 'abc'])('Size %s is refused', async (size) => {
    await expect(router.place(makeRequest({ size }))).rejects.toThrow(InvalidOrderError);
    expect(sim.getSubmissionCount()).toBe(0);
  });

  it('Size that rounds to zero is refused', async () => {
    await expect(router.place(makeRequest({ instrument: 'BRK.A', size: 0.0001 }))).rejects.toThrow(
      'Size 0.0001 rounds to zero for BRK.A',
    );
  });

  it('Limit order without a price is refused', async () => {
    await expect(router.place(makeRequest({ orderType: 'limit' }))).rejects.toThrow(
      'limit orders require a positive limitPrice',
    );
    expect(router.listOrders()).toHaveLength(0);
  });

  it('Direction other than 1 or -1 is refused', async () => {
    // Untyped input, as it would arrive over the wire
    const request: OrderRequest = JSON.parse('{"clientOrderId":"ord-1","instrument":"AAPL","direction":0,"size":10,"orderType":"market"}');
    await expect(router.place(request)).rejects.toThrow('direction must be 1 or -1, got 0');
  });
});

// ============================================================
// Venue refusals and transport failures
// ============================================================

describe('Submission failures', () => {
  let sim: SimulatorVenueClient;
  let router: OrderRouter;

  beforeEach(() => {
    sim = new SimulatorVenueClient({ clock });
    router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);
  });

  it('Venue rejection records the order as rejected and rethrows', async () => {
    sim.rejectNext('insufficient buying power');

    await expect(router.place(makeRequest())).rejects.toThrow(SubmissionRejectedError);

    const order = router.getOrder('ord-1');
    expect(order.status).toBe('rejected');
    expect(order.rejectReason).toBe('insufficient buying power');
  });

  it('Replaying a rejected order does not resubmit', async () => {
    sim.rejectNext('market closed');
    await expect(router.place(makeRequest())).rejects.toThrow('Venue rejected request: market closed');

    const handle = await router.place(makeRequest());
    expect(handle.replayed).toBe(true);
    expect(handle.order.status).toBe('rejected');
    expect(sim.getSubmissionCount()).toBe(1);
  });

  it('Transport failure leaves the order submitted for reconciliation', async () => {
    sim.failNext('connection reset');

    await expect(router.place(makeRequest())).rejects.toMatchObject({
      code: 'TRANSPORT',
      venue: 'paper',
      message: 'submitOrder on paper failed: connection reset',
    });

    const order = router.getOrder('ord-1');
    expect(order.status).toBe('submitted');
    expect(order.venueOrderId).toBeNull();
  });

  it('Cancelling an unacknowledged order fails with UNACKNOWLEDGED', async () => {
    sim.failNext('connection reset');
    await expect(router.place(makeRequest())).rejects.toThrow(RoutingError);

    await expect(router.cancel('ord-1')).rejects.toMatchObject({ code: 'UNACKNOWLEDGED' });
  });
});

describe('Submission timeout', () => {
  it('Times out, then applies the late acknowledgement', async () => {
    const client = createMockClient();
    const answer = deferred<string>();
    client.submitOrder.mockReturnValueOnce(answer.promise);
    const router = new OrderRouter({ venueTimeoutMs: 20, clock });
    router.registerVenue(client);

    await expect(router.place(makeRequest())).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'submitOrder on mock timed out after 20ms',
    });
    expect(router.getOrder('ord-1')).toMatchObject({ status: 'submitted', venueOrderId: null });

    answer.resolve('mock-77');
    await flush();

    expect(router.getOrder('ord-1')).toMatchObject({ status: 'submitted', venueOrderId: 'mock-77' });
    expect(client.submitOrder).toHaveBeenCalledTimes(1);
  });

  it('A late rejection marks the order rejected', async () => {
    const client = createMockClient();
    const answer = deferred<string>();
    client.submitOrder.mockReturnValueOnce(answer.promise);
    const router = new OrderRouter({ venueTimeoutMs: 20, clock });
    router.registerVenue(client);

    await expect(router.place(makeRequest())).rejects.toThrow(RoutingError);

    answer.reject(new SubmissionRejectedError('order size too large'));
    await flush();

    expect(router.getOrder('ord-1')).toMatchObject({ status: 'rejected', rejectReason: 'order size too large' });
  });

  it('An acknowledgement after expiry leaves the venue order to be adopted', async () => {
    const client = createMockClient();
    const answer = deferred<string>();
    client.submitOrder.mockReturnValueOnce(answer.promise);
    const router = new OrderRouter({ venueTimeoutMs: 20, clock });
    router.registerVenue(client);

    await expect(router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }))).rejects.toThrow(RoutingError);
    await router.expireUnacknowledged('ord-1', 'not acknowledged by venue');
    answer.resolve('mock-77');
    await flush();

    expect(router.getOrder('ord-1')).toMatchObject({ status: 'rejected', venueOrderId: null });

    const live = mockVenueOrder({ id: 'mock-77', status: 'partially_filled', filled_qty: '4', filled_avg_price: '150' });
    const adopted = await router.applyVenueOrder('mock', live);

    expect(adopted.outcome).toBe('created');
    expect(adopted.order).toMatchObject({
      clientOrderId: 'ext-mock-mock-77',
      venueOrderId: 'mock-77',
      external: true,
      status: 'partially_filled',
      filledSize: '4',
    });
    expect(adopted.trades.map((trade) => trade.id)).toEqual(['ext-mock-mock-77-1']);

    const again = await router.applyVenueOrder('mock', live);
    expect(again.outcome).toBe('unchanged');
    expect(router.listOrders()).toHaveLength(2);
  });
});

// ============================================================
// Cancellation
// ============================================================

describe('Order cancellation', () => {
  let sim: SimulatorVenueClient;
  let router: OrderRouter;

  beforeEach(() => {
    sim = new SimulatorVenueClient({ clock });
    router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);
  });

  it('Cancels a working order on the venue', async () => {
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));

    const order = await router.cancel('ord-1');

    expect(order.status).toBe('cancelled');
    expect(venueOrder(sim, 'paper-0001').status).toBe('canceled');
  });

  it('Cancelling twice is a no-op the second time', async () => {
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));
    const first = await router.cancel('ord-1');
    const spy = vi.spyOn(sim, 'cancelOrder');

    const second = await router.cancel('ord-1');

    expect(second).toBe(first);
    expect(spy).not.toHaveBeenCalled();
  });

  it('Cancelling a filled order returns it unchanged', async () => {
    await router.place(makeRequest());
    sim.fill('paper-0001', undefined, 190);
    await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));
    const spy = vi.spyOn(sim, 'cancelOrder');

    const order = await router.cancel('ord-1');

    expect(order.status).toBe('filled');
    expect(spy).not.toHaveBeenCalled();
  });

  it('Concurrent cancels reach the venue once', async () => {
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));
    const spy = vi.spyOn(sim, 'cancelOrder');

    const [a, b] = await Promise.all([router.cancel('ord-1'), router.cancel('ord-1')]);

    expect(spy).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
  });

  it('Cancel during placement waits for the venue acknowledgement', async () => {
    const client = createMockClient();
    const answer = deferred<string>();
    client.submitOrder.mockReturnValueOnce(answer.promise);
    const mockRouter = new OrderRouter({ venueTimeoutMs: 1000, clock });
    mockRouter.registerVenue(client);

    const placing = mockRouter.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));
    const cancelling = mockRouter.cancel('ord-1');
    answer.resolve('mock-9');

    await expect(placing).resolves.toMatchObject({ order: { status: 'submitted', venueOrderId: 'mock-9' } });
    await expect(cancelling).resolves.toMatchObject({ status: 'cancelled' });
    expect(client.cancelOrder).toHaveBeenCalledWith('mock-9');
  });

  it('A fill merged while the cancel is on the venue is kept', async () => {
    const client = createMockClient();
    const confirmation = deferred<void>();
    client.cancelOrder.mockReturnValueOnce(confirmation.promise);
    const mockRouter = new OrderRouter({ venueTimeoutMs: 1000, clock });
    mockRouter.registerVenue(client);
    await mockRouter.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));

    const cancelling = mockRouter.cancel('ord-1');
    await flush();
    expect(client.cancelOrder).toHaveBeenCalledWith('mock-1');

    const merged = await mockRouter.applyVenueOrder(
      'mock',
      mockVenueOrder({ status: 'filled', filled_qty: '10', filled_avg_price: '150' }),
    );
    expect(merged.order?.status).toBe('filled');

    confirmation.resolve();
    const order = await cancelling;

    expect(order.status).toBe('filled');
    expect(mockRouter.getOrder('ord-1')).toMatchObject({ status: 'filled', filledSize: '10', avgFillPrice: 150 });
    expect(mockRouter.listTrades().map((trade) => trade.id)).toEqual(['ord-1-1']);
  });

  it('Unknown order throws NotFoundError', async () => {
    await expect(router.cancel('nope')).rejects.toThrow(NotFoundError);
    await expect(router.cancel('nope')).rejects.toThrow('Order not found: nope');
  });

  it('cancelAll cancels open orders of one instrument', async () => {
    await router.place(makeRequest({ clientOrderId: 'a', orderType: 'limit', limitPrice: 150 }));
    await router.place(makeRequest({ clientOrderId: 'b', orderType: 'limit', limitPrice: 149 }));
    await router.place(makeRequest({ clientOrderId: 'c', instrument: 'MSFT', orderType: 'limit', limitPrice: 400 }));

    const result = await router.cancelAll('AAPL');

    expect(result.cancelled.map((o) => o.clientOrderId)).toEqual(['a', 'b']);
    expect(result.failed).toEqual([]);
    expect(router.getOrder('c').status).toBe('submitted');
  });

  it('cancelAll reports orders it could not cancel', async () => {
    sim.failNext('connection reset');
    await expect(router.place(makeRequest({ clientOrderId: 'lost' }))).rejects.toThrow(RoutingError);
    await router.place(makeRequest({ clientOrderId: 'ok', orderType: 'limit', limitPrice: 150 }));

    const result = await router.cancelAll();

    expect(result.cancelled.map((o) => o.clientOrderId)).toEqual(['ok']);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0].clientOrderId).toBe('lost');
    expect(result.failed[0].error).toBeInstanceOf(RoutingError);
  });
});

// ============================================================
// Merging venue state
// ============================================================

describe('Venue order merge', () => {
  let sim: SimulatorVenueClient;
  let router: OrderRouter;

  beforeEach(() => {
    sim = new SimulatorVenueClient({ clock });
    router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);
  });

  it('Partial then full fill records one trade per increment', async () => {
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));

    sim.fill('paper-0001', 4, 150);
    const partial = await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    expect(partial.outcome).toBe('updated');
    expect(partial.order).toMatchObject({ status: 'partially_filled', filledSize: '4', avgFillPrice: 150 });
    expect(partial.trades).toHaveLength(1);
    expect(partial.trades[0]).toMatchObject({ id: 'ord-1-1', size: '4', fillPrice: 150, direction: 1 });

    sim.fill('paper-0001', 6, 151);
    const full = await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    expect(full.order).toMatchObject({ status: 'filled', filledSize: '10', avgFillPrice: 150.6 });
    expect(full.trades[0]).toMatchObject({ id: 'ord-1-2', size: '6', fillPrice: 151 });
    expect(router.listTrades().map((t) => t.id)).toEqual(['ord-1-1', 'ord-1-2']);
    expect(router.getTrade('ord-1-2').orderId).toBe('ord-1');
  });

  it('Applying the same venue state twice changes nothing', async () => {
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));
    sim.fill('paper-0001', 4, 150);
    await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));
    const before = router.getOrder('ord-1');

    const again = await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    expect(again.outcome).toBe('unchanged');
    expect(again.trades).toEqual([]);
    expect(router.getOrder('ord-1')).toBe(before);
    expect(router.listTrades()).toHaveLength(1);
  });

  it('Terminal orders ignore later venue reports', async () => {
    await router.place(makeRequest());
    sim.fill('paper-0001', undefined, 190);
    await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    const result = await router.applyVenueOrder('paper', { ...venueOrder(sim, 'paper-0001'), status: 'canceled' });

    expect(result.outcome).toBe('unchanged');
    expect(router.getOrder('ord-1').status).toBe('filled');
  });

  it('A status that would move backwards is ignored', async () => {
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));
    sim.fill('paper-0001', 4, 150);
    await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    const result = await router.applyVenueOrder('paper', { ...venueOrder(sim, 'paper-0001'), status: 'accepted' });

    expect(result.outcome).toBe('unchanged');
    expect(router.getOrder('ord-1').status).toBe('partially_filled');
  });

  it('Venue rejection after acknowledgement records a reason', async () => {
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));

    await router.applyVenueOrder('paper', { ...venueOrder(sim, 'paper-0001'), status: 'rejected' });

    expect(router.getOrder('ord-1')).toMatchObject({ status: 'rejected', rejectReason: 'rejected by venue' });
  });

  it('Trade P&L uses the position mark', async () => {
    router.replacePositions('paper', [{ symbol: 'AAPL', qty: '10', current_price: '195' }]);
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));
    sim.fill('paper-0001', 4, 150);

    const result = await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    expect(result.trades[0].unrealizedPl).toBe(180);
  });

  it('Venue order with no local counterpart becomes an external order', async () => {
    const id = sim.placeExternalOrder({ symbol: 'MSFT', side: 'sell', type: 'limit', qty: '5', limit_price: 420, time_in_force: 'gtc' });

    const result = await router.applyVenueOrder('paper', venueOrder(sim, id));

    expect(result.outcome).toBe('created');
    expect(result.order).toMatchObject({
      clientOrderId: 'ext-paper-0001',
      venueOrderId: 'paper-0001',
      instrument: 'MSFT',
      direction: -1,
      orderType: 'limit',
      limitPrice: 420,
      status: 'submitted',
      external: true,
    });

    const again = await router.applyVenueOrder('paper', venueOrder(sim, id));
    expect(again.outcome).toBe('unchanged');
    expect(router.listOrders()).toHaveLength(1);
  });

  it('Filled external order records its trade', async () => {
    const id = sim.placeExternalOrder({ symbol: 'AAPL', side: 'buy', type: 'market', qty: '3', time_in_force: 'day' });
    sim.fill(id, undefined, 190);

    const result = await router.applyVenueOrder('paper', venueOrder(sim, id));

    expect(result.outcome).toBe('created');
    expect(result.order?.status).toBe('filled');
    expect(result.trades).toHaveLength(1);
    expect(result.trades[0]).toMatchObject({ id: 'ext-paper-0001-1', size: '3', fillPrice: 190 });
  });

  it('Unacknowledged order found by client id is adopted, not duplicated', async () => {
    const client = createMockClient('paper');
    client.submitOrder.mockRejectedValueOnce(new Error('socket hang up'));
    const local = new OrderRouter({ venueTimeoutMs: 1000, clock });
    local.registerVenue(client);
    await expect(local.place(makeRequest())).rejects.toThrow(RoutingError);

    const result = await local.applyVenueOrder('paper', {
      id: 'paper-0042',
      client_order_id: 'ord-1',
      symbol: 'AAPL',
      side: 'buy',
      type: 'market',
      qty: '10',
      filled_qty: '0',
      status: 'accepted',
    });

    expect(result.outcome).toBe('updated');
    expect(local.listOrders()).toHaveLength(1);
    expect(local.getOrder('ord-1').venueOrderId).toBe('paper-0042');
  });

  it('expireUnacknowledged rejects an order with no venue id', async () => {
    sim.failNext('connection reset');
    await expect(router.place(makeRequest())).rejects.toThrow(RoutingError);

    const expired = await router.expireUnacknowledged('ord-1', 'not acknowledged by venue');

    expect(expired).toMatchObject({ status: 'rejected', rejectReason: 'not acknowledged by venue' });
  });

  it('expireUnacknowledged leaves acknowledged orders alone', async () => {
    await router.place(makeRequest({ orderType: 'limit', limitPrice: 150 }));
    await expect(router.expireUnacknowledged('ord-1', 'late')).resolves.toBeNull();
  });

  it('Unknown trade id throws NotFoundError', () => {
    expect(() => router.getTrade('missing-1')).toThrow('Trade not found: missing-1');
  });
});

// ============================================================
// Related orders (one-cancels-other)
// ============================================================

describe('Related orders', () => {
  let sim: SimulatorVenueClient;

  beforeEach(() => {
    sim = new SimulatorVenueClient({ clock });
  });

  it('Linkage is made symmetric on placement', async () => {
    const router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);

    await router.place(makeRequest({ clientOrderId: 'a', orderType: 'limit', limitPrice: 150 }));
    await router.place(makeRequest({ clientOrderId: 'b', orderType: 'limit', limitPrice: 140, relatedOrders: ['a'] }));

    expect(router.getOrder('a').relatedOrders).toEqual(['b']);
    expect(router.getOrder('b').relatedOrders).toEqual(['a']);
  });

  it('A fill cancels the related orders', async () => {
    const router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);
    await router.place(makeRequest({ clientOrderId: 'a', orderType: 'limit', limitPrice: 150 }));
    await router.place(makeRequest({ clientOrderId: 'b', orderType: 'limit', limitPrice: 140, relatedOrders: ['a'] }));

    sim.fill('paper-0001');
    await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    expect(router.getOrder('a').status).toBe('filled');
    expect(router.getOrder('b').status).toBe('cancelled');
    expect(venueOrder(sim, 'paper-0002').status).toBe('canceled');
  });

  it('Related orders are kept when OCO cancellation is off', async () => {
    const router = new OrderRouter({ venueTimeoutMs: 1000, clock, cancelRelatedOnFill: false });
    router.registerVenue(sim);
    await router.place(makeRequest({ clientOrderId: 'a', orderType: 'limit', limitPrice: 150 }));
    await router.place(makeRequest({ clientOrderId: 'b', orderType: 'limit', limitPrice: 140, relatedOrders: ['a'] }));

    sim.fill('paper-0001');
    await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    expect(router.getOrder('b').status).toBe('submitted');
  });
});

// ============================================================
// Venue routing
// ============================================================

describe('Venue routing', () => {
  let paper: SimulatorVenueClient;
  let alt: SimulatorVenueClient;
  let router: OrderRouter;

  beforeEach(() => {
    paper = new SimulatorVenueClient({ clock });
    alt = new SimulatorVenueClient({ clock, venue: 'alt' });
    router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(paper);
    router.registerVenue(alt);
  });

  it('Bare instrument goes to the first registered venue', async () => {
    const handle = await router.place(makeRequest());
    expect(handle.order.venue).toBe('paper');
  });

  it('Qualified instrument goes to its venue', async () => {
    const handle = await router.place(makeRequest({ instrument: 'alt:AAPL' }));

    expect(handle.order).toMatchObject({ venue: 'alt', instrument: 'AAPL', venueOrderId: 'alt-0001' });
    expect(paper.getSubmissionCount()).toBe(0);
  });

  it('Configured default venue wins over registration order', async () => {
    const routed = new OrderRouter({ venueTimeoutMs: 1000, clock, defaultVenue: 'ALT' });
    routed.registerVenue(paper);
    routed.registerVenue(alt);

    const handle = await routed.place(makeRequest());
    expect(handle.order.venue).toBe('alt');
  });

  it('Instrument and venue that disagree are refused', async () => {
    await expect(router.place(makeRequest({ instrument: 'alt:AAPL', venue: 'paper' }))).rejects.toThrow(InvalidOrderError);
  });

  it('Unregistered venue fails with VENUE_NOT_FOUND', async () => {
    await expect(router.place(makeRequest({ instrument: 'nyse:AAPL' }))).rejects.toMatchObject({ code: 'VENUE_NOT_FOUND' });
  });

  it('No venues at all fails with VENUE_NOT_FOUND', async () => {
    const empty = new OrderRouter({ venueTimeoutMs: 1000, clock });
    await expect(empty.place(makeRequest())).rejects.toMatchObject({ code: 'VENUE_NOT_FOUND' });
    expect(() => empty.getVenue()).toThrow('No venue registered');
  });

  it('listOrders filters by venue and status', async () => {
    await router.place(makeRequest({ clientOrderId: 'p1', orderType: 'limit', limitPrice: 150 }));
    await router.place(makeRequest({ clientOrderId: 'a1', instrument: 'alt:AAPL', orderType: 'limit', limitPrice: 150 }));
    await router.cancel('p1');

    expect(router.listOrders({ venue: 'ALT' }).map((o) => o.clientOrderId)).toEqual(['a1']);
    expect(router.listOrders({ status: 'cancelled' }).map((o) => o.clientOrderId)).toEqual(['p1']);
    expect(router.listOrders({ status: ['submitted', 'cancelled'] })).toHaveLength(2);
  });

  it('Venue-qualified instruments filter orders, trades and positions', async () => {
    await router.place(makeRequest({ clientOrderId: 'p1', orderType: 'limit', limitPrice: 150 }));
    await router.place(makeRequest({ clientOrderId: 'a1', instrument: 'alt:AAPL', orderType: 'limit', limitPrice: 150 }));
    alt.fill('alt-0001', undefined, 150);
    await router.applyVenueOrder('alt', venueOrder(alt, 'alt-0001'));
    router.replacePositions('alt', await alt.listPositions());

    expect(router.listOrders({ instrument: 'ALT:AAPL' }).map((o) => o.clientOrderId)).toEqual(['a1']);
    expect(router.listOrders({ instrument: 'paper:AAPL' }).map((o) => o.clientOrderId)).toEqual(['p1']);
    expect(router.listOrders({ instrument: 'AAPL' })).toHaveLength(2);
    expect(router.listTrades('alt:AAPL').map((t) => t.id)).toEqual(['a1-1']);
    expect(router.listTrades('paper:AAPL')).toEqual([]);
    expect(router.listPositions('alt:AAPL').map((p) => p.venue)).toEqual(['alt']);
    expect(router.listPositions('paper:AAPL')).toEqual([]);
  });

  it('A refreshed precision entry is looked up again', async () => {
    await router.place(makeRequest({ clientOrderId: 'p1', orderType: 'limit', limitPrice: 150 }));
    const resolver = router.getPrecisionResolver('paper');
    const lookups = vi.spyOn(paper, 'getAsset');
    expect(resolver.has('AAPL')).toBe(true);

    await router.place(makeRequest({ clientOrderId: 'p2', orderType: 'limit', limitPrice: 150 }));
    expect(lookups).not.toHaveBeenCalled();

    resolver.refresh('AAPL');
    expect(resolver.has('AAPL')).toBe(false);
    await router.place(makeRequest({ clientOrderId: 'p3', orderType: 'limit', limitPrice: 150 }));
    expect(lookups).toHaveBeenCalledTimes(1);
  });
});

// ============================================================
// Close orders
// ============================================================

describe('Close orders', () => {
  it('Closing a long sends a reduce-only sell', async () => {
    const sim = new SimulatorVenueClient({ clock });
    const router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);

    await router.place(makeRequest({ clientOrderId: 'open', size: 5 }));
    sim.fill('paper-0001', undefined, 190);
    await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0001'));

    const handle = await router.place(makeRequest({ clientOrderId: 'close', orderType: 'close', size: 5 }));

    expect(handle.order.orderType).toBe('close');
    expect(venueOrder(sim, 'paper-0002')).toMatchObject({ side: 'sell', reduce_only: true, qty: '5' });

    sim.fill('paper-0002', undefined, 192);
    const result = await router.applyVenueOrder('paper', venueOrder(sim, 'paper-0002'));
    expect(result.trades[0].direction).toBe(-1);
  });

  it('Closing with no position is rejected by the venue', async () => {
    const sim = new SimulatorVenueClient({ clock });
    const router = new OrderRouter({ venueTimeoutMs: 1000, clock });
    router.registerVenue(sim);

    await expect(router.place(makeRequest({ orderType: 'close' }))).rejects.toThrow('Venue rejected request: no position in AAPL to reduce');
    expect(router.getOrder('ord-1').status).toBe('rejected');
  });
});
