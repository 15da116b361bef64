// ============================================================
// Simulator: in-memory paper venue
// Implements the VenueClient capability with deterministic fills,
// plus hooks for driving venue-side events from tests
// ============================================================

import Decimal from 'decimal.js';
import type { VenueClient } from '../execution/venue-client.js';
import type {
  VenueAccount,
  VenueAsset,
  VenueOrder,
  VenueOrderParams,
  VenueOrderQuery,
  VenueOrderStatus,
  VenuePosition,
} from '../../shared/protocol.js';
import { SubmissionRejectedError } from '../../shared/errors.js';

// ============================================================
// Configuration
// ============================================================

export interface SimulatorConfig {
  /** Venue name the client registers under (default: 'paper') */
  venue: string;
  /** Tradable assets */
  assets: VenueAsset[];
  /** Mark prices used for market fills and P&L */
  marks: Record<string, number>;
  /** Starting cash (default: 100000) */
  cash: number;
  /** Fill market orders as soon as they are accepted (default: false) */
  autoFillMarket: boolean;
  /** Simulated venue latency in milliseconds (default: 0) */
  latencyMs: number;
  clock: () => Date;
}

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
  venue: 'paper',
  assets: [
    { symbol: 'AAPL', fractionable: true, min_increment: '0.001', tradable: true },
    { symbol: 'MSFT', fractionable: true, min_increment: '0.001', tradable: true },
    { symbol: 'BRK.A', fractionable: false, tradable: true },
    { symbol: 'EURUSD', fractionable: true, min_increment: '1', tradable: true },
  ],
  marks: { AAPL: 190, MSFT: 410, 'BRK.A': 620000, EURUSD: 1.08 },
  cash: 100_000,
  autoFillMarket: false,
  latencyMs: 0,
  clock: () => new Date(),
};

const OPEN_STATUSES: ReadonlySet<VenueOrderStatus> = new Set(['new', 'pending_new', 'accepted', 'partially_filled']);

interface SimPosition {
  qty: Decimal;
  avgEntry: Decimal;
}

// ============================================================
// SimulatorVenueClient
// ============================================================

export class SimulatorVenueClient implements VenueClient {
  readonly venue: string;
  private config: SimulatorConfig;
  private orders = new Map<string, VenueOrder>();
  private positions = new Map<string, SimPosition>();
  private marks: Map<string, number>;
  private cash: Decimal;
  private orderCounter = 0;
  private submissions = 0;
  private pendingRejection: string | null = null;
  private pendingFailure: string | null = null;

  constructor(config: Partial<SimulatorConfig> = {}) {
    this.config = { ...DEFAULT_SIMULATOR_CONFIG, ...config };
    this.venue = this.config.venue;
    this.marks = new Map(Object.entries(this.config.marks));
    this.cash = new Decimal(this.config.cash);
  }

  async submitOrder(params: VenueOrderParams): Promise<string> {
    await this.delay();
    this.submissions++;

    if (this.pendingFailure !== null) {
      const message = this.pendingFailure;
      this.pendingFailure = null;
      throw new Error(message);
    }
    if (this.pendingRejection !== null) {
      const reason = this.pendingRejection;
      this.pendingRejection = null;
      throw new SubmissionRejectedError(reason, '422');
    }

    const asset = this.findAsset(params.symbol);
    if (!asset || asset.tradable === false) {
      throw new SubmissionRejectedError(`asset ${params.symbol} is not tradable`, '422');
    }
    if (this.findByClientId(params.client_order_id)) {
      throw new SubmissionRejectedError('client_order_id must be unique', '422');
    }
    if (params.reduce_only && this.positionQty(params.symbol).isZero()) {
      throw new SubmissionRejectedError(`no position in ${params.symbol} to reduce`, '403');
    }

    this.orderCounter++;
    const id = `${this.venue}-${String(this.orderCounter).padStart(4, '0')}`;
    const now = this.now();
    this.orders.set(id, {
      id,
      client_order_id: params.client_order_id,
      symbol: params.symbol,
      side: params.side,
      type: params.type,
      qty: params.qty,
      filled_qty: '0',
      filled_avg_price: null,
      limit_price: params.limit_price !== undefined ? String(params.limit_price) : null,
      stop_price: params.stop_price !== undefined ? String(params.stop_price) : null,
      time_in_force: params.time_in_force,
      reduce_only: params.reduce_only ?? false,
      status: 'accepted',
      submitted_at: now,
      filled_at: null,
      updated_at: now,
    });

    if (this.config.autoFillMarket && params.type === 'market') {
      this.fill(id);
    }
    return id;
  }

  async cancelOrder(venueOrderId: string): Promise<void> {
    await this.delay();
    const order = this.orders.get(venueOrderId);
    if (!order) {
      throw new SubmissionRejectedError(`order ${venueOrderId} not found`, '404');
    }
    if (!OPEN_STATUSES.has(order.status)) {
      throw new SubmissionRejectedError(`order ${venueOrderId} is ${order.status} and cannot be cancelled`, '422');
    }
    this.orders.set(venueOrderId, { ...order, status: 'canceled', updated_at: this.now() });
  }

  async listOrders(status: VenueOrderQuery, instrument?: string): Promise<VenueOrder[]> {
    await this.delay();
    return Array.from(this.orders.values())
      .filter((order) => instrument === undefined || order.symbol === instrument)
      .filter((order) => {
        if (status === 'all') return true;
        return status === 'open' ? OPEN_STATUSES.has(order.status) : !OPEN_STATUSES.has(order.status);
      })
      .map((order) => ({ ...order }));
  }

  async listPositions(instrument?: string): Promise<VenuePosition[]> {
    await this.delay();
    const rows: VenuePosition[] = [];
    for (const [symbol, position] of this.positions) {
      if (position.qty.isZero() || (instrument !== undefined && symbol !== instrument)) {
        continue;
      }
      const mark = this.marks.get(symbol);
      rows.push({
        symbol,
        qty: position.qty.toFixed(),
        avg_entry_price: position.avgEntry.toFixed(),
        current_price: mark !== undefined ? String(mark) : null,
        unrealized_pl: mark !== undefined
          ? new Decimal(mark).minus(position.avgEntry).times(position.qty).toFixed()
          : null,
      });
    }
    return rows;
  }

  async getAccount(): Promise<VenueAccount> {
    await this.delay();
    let marketValue = new Decimal(0);
    for (const [symbol, position] of this.positions) {
      const mark = this.marks.get(symbol) ?? position.avgEntry.toNumber();
      marketValue = marketValue.plus(position.qty.times(mark));
    }
    const equity = this.cash.plus(marketValue);
    return {
      equity: equity.toFixed(),
      cash: this.cash.toFixed(),
      portfolio_value: equity.toFixed(),
      buying_power: Decimal.max(this.cash, 0).toFixed(),
    };
  }

  async getAsset(instrument: string): Promise<VenueAsset | null> {
    await this.delay();
    const asset = this.findAsset(instrument);
    return asset ? { ...asset } : null;
  }

  // --- Simulation hooks ---

  /**
   * Fill `qty` (default: the remainder) of an open order at `price`
   * (default: limit price, then mark). Updates position and cash.
   */
  fill(venueOrderId: string, qty?: string | number, price?: number): VenueOrder {
    const order = this.orders.get(venueOrderId);
    if (!order || !OPEN_STATUSES.has(order.status)) {
      throw new Error(`Order ${venueOrderId} is not open`);
    }

    const filled = new Decimal(order.filled_qty);
    const remaining = new Decimal(order.qty).minus(filled);
    const quantity = qty === undefined ? remaining : Decimal.min(new Decimal(qty), remaining);
    const fillPrice = new Decimal(price ?? Number(order.limit_price ?? this.marks.get(order.symbol) ?? 0));

    const previousAvg = order.filled_avg_price ? new Decimal(order.filled_avg_price) : new Decimal(0);
    const totalFilled = filled.plus(quantity);
    const avg = previousAvg.times(filled).plus(fillPrice.times(quantity)).dividedBy(totalFilled);

    const signed = order.side === 'buy' ? quantity : quantity.negated();
    this.applyToPosition(order.symbol, signed, fillPrice);
    this.cash = this.cash.minus(signed.times(fillPrice));

    const now = this.now();
    const complete = totalFilled.gte(order.qty);
    const updated: VenueOrder = {
      ...order,
      filled_qty: totalFilled.toFixed(),
      filled_avg_price: avg.toFixed(),
      status: complete ? 'filled' : 'partially_filled',
      filled_at: now,
      updated_at: now,
    };
    this.orders.set(venueOrderId, updated);
    return { ...updated };
  }

  /**
   * End an open order without further fills (day order expiry).
   */
  expire(venueOrderId: string): void {
    const order = this.orders.get(venueOrderId);
    if (!order || !OPEN_STATUSES.has(order.status)) {
      throw new Error(`Order ${venueOrderId} is not open`);
    }
    this.orders.set(venueOrderId, { ...order, status: 'expired', updated_at: this.now() });
  }

  /**
   * Place an order directly on the venue, bypassing the gateway.
   */
  placeExternalOrder(params: Omit<VenueOrderParams, 'client_order_id'> & { client_order_id?: string }): string {
    this.orderCounter++;
    const id = `${this.venue}-${String(this.orderCounter).padStart(4, '0')}`;
    const now = this.now();
    this.orders.set(id, {
      id,
      client_order_id: params.client_order_id ?? null,
      symbol: params.symbol,
      side: params.side,
      type: params.type,
      qty: params.qty,
      filled_qty: '0',
      filled_avg_price: null,
      limit_price: params.limit_price !== undefined ? String(params.limit_price) : null,
      stop_price: params.stop_price !== undefined ? String(params.stop_price) : null,
      time_in_force: params.time_in_force,
      reduce_only: params.reduce_only ?? false,
      status: 'accepted',
      submitted_at: now,
      filled_at: null,
      updated_at: now,
    });
    return id;
  }

  setMark(symbol: string, price: number): void {
    this.marks.set(symbol, price);
  }

  /** Decline the next submission with `reason` */
  rejectNext(reason: string): void {
    this.pendingRejection = reason;
  }

  /** Fail the next submission as a transport error */
  failNext(message: string): void {
    this.pendingFailure = message;
  }

  setLatency(ms: number): void {
    this.config.latencyMs = ms;
  }

  getOrder(venueOrderId: string): VenueOrder | undefined {
    const order = this.orders.get(venueOrderId);
    return order ? { ...order } : undefined;
  }

  /** Number of submitOrder calls received, accepted or not */
  getSubmissionCount(): number {
    return this.submissions;
  }

  // --- Private helpers ---

  private applyToPosition(symbol: string, signedQty: Decimal, price: Decimal): void {
    const current = this.positions.get(symbol) ?? { qty: new Decimal(0), avgEntry: new Decimal(0) };
    const nextQty = current.qty.plus(signedQty);

    let avgEntry: Decimal;
    if (current.qty.isZero() || current.qty.isNegative() === signedQty.isNegative()) {
      // Opening or adding: weighted average entry
      avgEntry = current.avgEntry.times(current.qty.abs()).plus(price.times(signedQty.abs())).dividedBy(nextQty.abs());
    } else if (nextQty.isZero() || nextQty.isNegative() === current.qty.isNegative()) {
      // Reducing: entry unchanged
      avgEntry = current.avgEntry;
    } else {
      // Flipped through flat: the remainder opened at this price
      avgEntry = price;
    }

    this.positions.set(symbol, { qty: nextQty, avgEntry });
  }

  private positionQty(symbol: string): Decimal {
    return this.positions.get(symbol)?.qty ?? new Decimal(0);
  }

  private findAsset(symbol: string): VenueAsset | undefined {
    return this.config.assets.find((asset) => asset.symbol === symbol);
  }

  private findByClientId(clientOrderId: string): VenueOrder | undefined {
    for (const order of this.orders.values()) {
      if (order.client_order_id === clientOrderId) {
        return order;
      }
    }
    return undefined;
  }

  private async delay(): Promise<void> {
    if (this.config.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.config.latencyMs));
    }
  }

  private now(): string {
    return this.config.clock().toISOString();
  }
}
