// ============================================================
// OrderRouter: owns the session's order/trade/position tables
// Idempotent place/cancel with at-most-once submission per order,
// plus the merge step reconciliation uses to apply venue state
// ============================================================

import { EventEmitter } from 'events';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import type {
  Order,
  OrderFilter,
  OrderHandle,
  OrderRequest,
  OrderStatus,
  Position,
  Trade,
  VenueOrder,
  VenuePosition,
} from '../../shared/protocol.js';
import type { VenueClient } from './venue-client.js';
import { callVenue } from './venue-client.js';
import { PrecisionResolver } from './precision-resolver.js';
import { PositionTracker } from './position-tracker.js';
import {
  flip,
  fromVenueOrder,
  fromVenuePosition,
  mapVenueStatus,
  parseInstrument,
  parseNumber,
  parseOrderType,
  toTrade,
  toVenueRequest,
} from './order-normalizer.js';
import { advanceOrder, isTerminal, type OrderPatch } from './order-state.js';
import { KeyedLock } from '../../shared/keyed-lock.js';
import {
  InvalidOrderError,
  NotFoundError,
  RoutingError,
  SubmissionRejectedError,
} from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';

const logger = createLogger('OrderRouter');

const OPEN_STATUSES: readonly OrderStatus[] = ['pending', 'submitted', 'partially_filled'];

export interface OrderRouterOptions {
  /** Timeout applied to every venue call */
  venueTimeoutMs: number;
  /** Venue for unqualified instruments; defaults to the first registered */
  defaultVenue?: string;
  /** Cancel an order's related orders once it fills (OCO) */
  cancelRelatedOnFill?: boolean;
  clock?: () => Date;
}

export interface CancelAllResult {
  cancelled: Order[];
  failed: { clientOrderId: string; error: Error }[];
}

export type MergeOutcome = 'created' | 'updated' | 'unchanged' | 'skipped';

export interface MergeResult {
  outcome: MergeOutcome;
  order: Order | null;
  trades: Trade[];
}

interface VenueEntry {
  client: VenueClient;
  precision: PrecisionResolver;
}

/**
 * OrderRouter manages order routing and the order lifecycle.
 * Events:
 * - 'order_update': (Order) - any change to an order record
 * - 'trade': (Trade) - a newly observed fill
 * - 'position_update' / 'position_removed': forwarded from the position tracker
 */
export class OrderRouter extends EventEmitter {
  private venues = new Map<string, VenueEntry>();
  private orders = new Map<string, Order>();
  private venueOrderIndex = new Map<string, string>();
  private trades = new Map<string, Trade>();
  private fillSequence = new Map<string, number>();
  private inflight = new Map<string, Promise<OrderHandle>>();
  private cancelling = new Map<string, Promise<Order>>();
  private readonly lock = new KeyedLock();
  private readonly positions = new PositionTracker();
  private readonly venueTimeoutMs: number;
  private readonly defaultVenue?: string;
  private readonly cancelRelatedOnFill: boolean;
  private readonly clock: () => Date;

  constructor(options: OrderRouterOptions) {
    super();
    this.venueTimeoutMs = options.venueTimeoutMs;
    this.defaultVenue = options.defaultVenue?.toLowerCase();
    this.cancelRelatedOnFill = options.cancelRelatedOnFill ?? true;
    this.clock = options.clock ?? (() => new Date());

    this.positions.on('position_update', (position: Position) => this.emit('position_update', position));
    this.positions.on('position_removed', (removed: { venue: string; instrument: string }) =>
      this.emit('position_removed', removed),
    );
  }

  /**
   * Register a venue client. Each venue gets its own precision cache.
   */
  registerVenue(client: VenueClient): void {
    this.venues.set(client.venue.toLowerCase(), {
      client,
      precision: new PrecisionResolver(client, { timeoutMs: this.venueTimeoutMs }),
    });
  }

  getVenues(): VenueClient[] {
    return Array.from(this.venues.values(), (entry) => entry.client);
  }

  /**
   * Client for `venue`, or for the default venue when omitted.
   */
  getVenue(venue?: string): VenueClient {
    const name = venue ?? this.defaultVenue ?? this.firstVenue();
    if (name === undefined) {
      throw new RoutingError('VENUE_NOT_FOUND', 'none', 'No venue registered');
    }
    return this.requireVenue(name).client;
  }

  getPrecisionResolver(venue: string): PrecisionResolver {
    return this.requireVenue(venue).precision;
  }

  /**
   * Place an order at most once per client order id.
   *
   * A repeated id returns the existing handle (`replayed: true`) without a
   * second submission; a replay that races the first call waits for it.
   * Validation errors are raised before anything is recorded or sent.
   */
  async place(request: OrderRequest): Promise<OrderHandle> {
    const clientOrderId = request.clientOrderId ?? uuidv4();

    const running = this.inflight.get(clientOrderId);
    if (running) {
      await settle(running);
      const order = this.orders.get(clientOrderId);
      if (!order) {
        return running;
      }
      return { clientOrderId, order, replayed: true };
    }

    const existing = this.orders.get(clientOrderId);
    if (existing) {
      logger.info({ client_order_id: clientOrderId, status: existing.status }, 'Duplicate placement ignored');
      return { clientOrderId, order: existing, replayed: true };
    }

    const placement = this.submit(clientOrderId, request);
    this.inflight.set(clientOrderId, placement);
    try {
      return await placement;
    } finally {
      this.inflight.delete(clientOrderId);
    }
  }

  /**
   * Cancel an order. Cancelling a terminal order is a no-op that returns it.
   * An order still being placed is waited for first.
   */
  async cancel(clientOrderId: string): Promise<Order> {
    const running = this.inflight.get(clientOrderId);
    if (running) {
      await settle(running);
    }

    const pending = this.cancelling.get(clientOrderId);
    if (pending) {
      return pending;
    }

    const cancellation = this.cancelOnVenue(clientOrderId);
    this.cancelling.set(clientOrderId, cancellation);
    try {
      return await cancellation;
    } finally {
      this.cancelling.delete(clientOrderId);
    }
  }

  /**
   * Cancel every open order, optionally for one instrument only.
   */
  async cancelAll(instrument?: string): Promise<CancelAllResult> {
    const targets = this.listOrders({ instrument, status: OPEN_STATUSES });
    const results = await Promise.allSettled(targets.map((order) => this.cancel(order.clientOrderId)));

    const result: CancelAllResult = { cancelled: [], failed: [] };
    results.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        result.cancelled.push(outcome.value);
      } else {
        const error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
        logger.error({ client_order_id: targets[i].clientOrderId, err: error }, 'Cancel failed during cancel-all');
        result.failed.push({ clientOrderId: targets[i].clientOrderId, error });
      }
    });
    return result;
  }

  getOrder(clientOrderId: string): Order {
    return this.requireOrder(clientOrderId);
  }

  listOrders(filter: OrderFilter = {}): Order[] {
    const statuses = filter.status === undefined
      ? undefined
      : typeof filter.status === 'string' ? [filter.status] : filter.status;

    const matches = instrumentMatcher(filter.instrument);
    return Array.from(this.orders.values()).filter((order) =>
      matches(order) &&
      (filter.venue === undefined || order.venue === filter.venue.toLowerCase()) &&
      (statuses === undefined || statuses.includes(order.status)),
    );
  }

  listTrades(instrument?: string): Trade[] {
    return Array.from(this.trades.values()).filter(instrumentMatcher(instrument));
  }

  getTrade(tradeId: string): Trade {
    const trade = this.trades.get(tradeId);
    if (!trade) {
      throw new NotFoundError('trade', tradeId);
    }
    return trade;
  }

  listPositions(instrument?: string): Position[] {
    return this.positions.getPositions().filter(instrumentMatcher(instrument));
  }

  isInFlight(clientOrderId: string): boolean {
    return this.inflight.has(clientOrderId);
  }

  /**
   * Replace the venue's positions with a fresh venue snapshot.
   */
  replacePositions(venue: string, rows: VenuePosition[]): void {
    const name = venue.toLowerCase();
    this.positions.replaceVenue(name, rows.map((row) => fromVenuePosition(name, row)));
  }

  /**
   * Merge one venue order into local state. Venue status wins; locally-known
   * metadata (strategy tag, linkage, bracket legs) is kept. Venue orders with
   * no local counterpart become external shadow orders. Orders still being
   * placed are skipped.
   */
  async applyVenueOrder(venue: string, payload: VenueOrder): Promise<MergeResult> {
    const name = venue.toLowerCase();
    const localId = this.findLocalId(name, payload);

    if (localId !== undefined && this.inflight.has(localId)) {
      return { outcome: 'skipped', order: this.orders.get(localId) ?? null, trades: [] };
    }

    let result: MergeResult;
    if (localId === undefined) {
      const shadowId = this.shadowId(name, payload);
      result = await this.lock.run(shadowId, () => this.createShadow(name, shadowId, payload));
    } else {
      result = await this.lock.run(localId, () => this.mergeVenueOrder(localId, payload));
    }

    if (result.order && result.outcome !== 'unchanged' && result.order.status === 'filled') {
      await this.cancelRelated(result.order);
    }
    return result;
  }

  /**
   * Reject an order the venue never acknowledged. No-op unless the order is
   * still `submitted` without a venue id.
   */
  async expireUnacknowledged(clientOrderId: string, reason: string): Promise<Order | null> {
    return this.lock.run(clientOrderId, () => {
      const order = this.orders.get(clientOrderId);
      if (!order || order.status !== 'submitted' || order.venueOrderId !== null || this.inflight.has(clientOrderId)) {
        return null;
      }
      logger.warn({ client_order_id: clientOrderId, venue: order.venue, reason }, 'Unacknowledged order rejected');
      return this.commit(clientOrderId, 'rejected', { rejectReason: reason });
    });
  }

  // --- Private methods ---

  private async submit(clientOrderId: string, request: OrderRequest): Promise<OrderHandle> {
    const { entry, symbol } = this.resolveRoute(request);
    const orderType = parseOrderType(request.orderType);
    if (request.direction !== 1 && request.direction !== -1) {
      throw new InvalidOrderError(`direction must be 1 or -1, got ${String(request.direction)}`);
    }
    const size = await this.roundSize(entry, symbol, request.size);

    const now = this.now();
    const draft: Order = Object.freeze({
      clientOrderId,
      venue: entry.client.venue.toLowerCase(),
      venueOrderId: null,
      instrument: symbol,
      direction: request.direction,
      size,
      orderType,
      limitPrice: request.limitPrice ?? null,
      stopPrice: request.stopPrice ?? null,
      takeProfit: request.takeProfit ?? null,
      stopLoss: request.stopLoss ?? null,
      timeInForce: request.timeInForce ?? 'day',
      status: 'pending',
      filledSize: '0',
      avgFillPrice: null,
      relatedOrders: Object.freeze([...(request.relatedOrders ?? [])]),
      strategyTag: request.strategyTag ?? null,
      external: false,
      rejectReason: null,
      createdAt: now,
      updatedAt: now,
    });
    const params = toVenueRequest(draft);

    await this.lock.run(clientOrderId, () => {
      this.orders.set(clientOrderId, draft);
      this.emit('order_update', draft);
    });
    await this.linkRelated(draft);

    logger.info({
      client_order_id: clientOrderId,
      venue: draft.venue,
      instrument: symbol,
      side: params.side,
      type: params.type,
      qty: params.qty,
      requested_size: String(request.size),
    }, 'Routing order to venue');

    const client = entry.client;
    const submission = invoke(() => client.submitOrder(params));

    try {
      const venueOrderId = await callVenue(client, 'submitOrder', this.venueTimeoutMs, () => submission);
      const order = await this.lock.run(clientOrderId, () =>
        this.commit(clientOrderId, 'submitted', { venueOrderId }),
      );
      logger.info({ client_order_id: clientOrderId, venue_order_id: venueOrderId }, 'Venue accepted order');
      return { clientOrderId, order, replayed: false };
    } catch (error) {
      if (error instanceof SubmissionRejectedError) {
        await this.lock.run(clientOrderId, () =>
          this.commit(clientOrderId, 'rejected', { rejectReason: error.reason }),
        );
        logger.warn({ client_order_id: clientOrderId, reason: error.reason }, 'Venue rejected order');
        throw error;
      }

      // Outcome unknown: keep the order open for reconciliation rather than
      // risk a duplicate submission on retry.
      await this.lock.run(clientOrderId, () => this.commit(clientOrderId, 'submitted', {}));
      logger.warn({ client_order_id: clientOrderId, err: error }, 'Order submission unconfirmed, awaiting reconciliation');
      if (error instanceof RoutingError && error.code === 'TIMEOUT') {
        this.watchLateAnswer(clientOrderId, submission);
      }
      throw error;
    }
  }

  private watchLateAnswer(clientOrderId: string, submission: Promise<string>): void {
    submission
      .then(
        (venueOrderId) =>
          this.lock.run(clientOrderId, () => {
            const order = this.requireOrder(clientOrderId);
            if (isTerminal(order.status)) {
              // The venue order is live; reconciliation adopts it as an external order.
              logger.error(
                { client_order_id: clientOrderId, venue_order_id: venueOrderId, status: order.status },
                'Venue acknowledged an order already closed locally',
              );
              return order;
            }
            logger.info({ client_order_id: clientOrderId, venue_order_id: venueOrderId }, 'Late venue acknowledgement applied');
            return this.commit(clientOrderId, 'submitted', { venueOrderId });
          }),
        (error: unknown) => {
          if (error instanceof SubmissionRejectedError) {
            return this.lock.run(clientOrderId, () =>
              this.commit(clientOrderId, 'rejected', { rejectReason: error.reason }),
            );
          }
          logger.warn({ client_order_id: clientOrderId, err: error }, 'Late submission failure, leaving order to reconciliation');
          return null;
        },
      )
      .catch((error: unknown) => {
        logger.error({ client_order_id: clientOrderId, err: error }, 'Failed to apply late venue answer');
      });
  }

  private async cancelOnVenue(clientOrderId: string): Promise<Order> {
    const order = await this.lock.run(clientOrderId, () => this.requireOrder(clientOrderId));

    if (isTerminal(order.status)) {
      logger.debug({ client_order_id: clientOrderId, status: order.status }, 'Cancel on terminal order is a no-op');
      return order;
    }
    if (order.venueOrderId === null) {
      throw new RoutingError(
        'UNACKNOWLEDGED',
        order.venue,
        `Order ${clientOrderId} has no venue acknowledgement yet; reconcile before cancelling`,
      );
    }

    const { client } = this.requireVenue(order.venue);
    const venueOrderId = order.venueOrderId;
    await callVenue(client, 'cancelOrder', this.venueTimeoutMs, () => client.cancelOrder(venueOrderId));

    return this.lock.run(clientOrderId, () => {
      const updated = this.commit(clientOrderId, 'cancelled', {});
      logger.info({ client_order_id: clientOrderId, venue_order_id: venueOrderId, status: updated.status }, 'Order cancel confirmed');
      return updated;
    });
  }

  private mergeVenueOrder(clientOrderId: string, payload: VenueOrder): MergeResult {
    const order = this.requireOrder(clientOrderId);
    if (isTerminal(order.status)) {
      return { outcome: 'unchanged', order, trades: [] };
    }

    const status = mapVenueStatus(payload.status);
    const venueFilled = new Decimal(payload.filled_qty || '0');
    const localFilled = new Decimal(order.filledSize);
    const venueAvg = parseNumber(payload.filled_avg_price);

    const patch: { -readonly [K in keyof OrderPatch]: OrderPatch[K] } = { venueOrderId: payload.id };
    if (venueFilled.gt(localFilled)) {
      patch.filledSize = venueFilled.toFixed();
      patch.avgFillPrice = venueAvg ?? order.avgFillPrice;
    }
    if (status === 'rejected' && order.rejectReason === null) {
      patch.rejectReason = 'rejected by venue';
    }

    const next = advanceOrder(order, status, patch, this.now());
    if (next === null) {
      logger.warn({
        client_order_id: clientOrderId,
        from: order.status,
        to: status,
        venue_status: payload.status,
      }, 'Ignoring venue status that would move the order backwards');
      return { outcome: 'unchanged', order, trades: [] };
    }
    if (next === order) {
      return { outcome: 'unchanged', order, trades: [] };
    }

    const trades: Trade[] = [];
    if (venueFilled.gt(localFilled)) {
      const delta = venueFilled.minus(localFilled);
      const price = incrementalPrice(localFilled, order.avgFillPrice, venueFilled, venueAvg, delta);
      trades.push(this.recordFill(next, delta.toFixed(), price, payload.filled_at ?? payload.updated_at ?? null));
    }

    this.store(order, next);
    logger.info({
      client_order_id: clientOrderId,
      from: order.status,
      to: next.status,
      filled: next.filledSize,
    }, 'Order reconciled with venue');
    return { outcome: 'updated', order: next, trades };
  }

  private createShadow(venue: string, shadowId: string, payload: VenueOrder): MergeResult {
    const known = this.orders.get(shadowId);
    if (known) {
      return this.mergeVenueOrder(shadowId, payload);
    }

    const now = this.now();
    const base: Order = Object.freeze({
      ...fromVenueOrder(venue, payload, now),
      clientOrderId: shadowId,
      status: 'submitted',
      filledSize: '0',
      avgFillPrice: null,
    });
    this.orders.set(shadowId, base);
    this.venueOrderIndex.set(this.indexKey(venue, payload.id), shadowId);

    const merged = this.mergeVenueOrder(shadowId, payload);
    const order = merged.order ?? base;
    if (merged.outcome === 'unchanged') {
      this.emit('order_update', order);
    }
    logger.info({ client_order_id: shadowId, venue, venue_order_id: payload.id, status: order.status }, 'External venue order adopted');
    return { outcome: 'created', order, trades: merged.trades };
  }

  private recordFill(order: Order, size: string, price: number | null, time: string | null): Trade {
    const sequence = (this.fillSequence.get(order.clientOrderId) ?? 0) + 1;
    this.fillSequence.set(order.clientOrderId, sequence);

    const direction = order.orderType === 'close' ? flip(order.direction) : order.direction;
    const unrealizedPl = this.positions.computePnl(order.venue, order.instrument, direction, price, size);
    const trade = toTrade(order, { sequence, size, price, time }, unrealizedPl);

    this.trades.set(trade.id, trade);
    this.emit('trade', trade);
    return trade;
  }

  private async cancelRelated(order: Order): Promise<void> {
    if (!this.cancelRelatedOnFill || order.relatedOrders.length === 0) {
      return;
    }

    const targets = order.relatedOrders.filter((id) => {
      const related = this.orders.get(id);
      return related !== undefined && !isTerminal(related.status);
    });

    const results = await Promise.allSettled(targets.map((id) => this.cancel(id)));
    results.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        logger.error({
          client_order_id: targets[i],
          filled_order_id: order.clientOrderId,
          err: outcome.reason,
        }, 'Failed to cancel related order after fill');
      }
    });
  }

  private async linkRelated(order: Order): Promise<void> {
    for (const relatedId of order.relatedOrders) {
      await this.lock.run(relatedId, () => {
        const related = this.orders.get(relatedId);
        if (!related || isTerminal(related.status) || related.relatedOrders.includes(order.clientOrderId)) {
          return;
        }
        const linked: Order = Object.freeze({
          ...related,
          relatedOrders: Object.freeze([...related.relatedOrders, order.clientOrderId]),
          updatedAt: this.now(),
        });
        this.store(related, linked);
      });
    }
  }

  /**
   * Apply a status change to a stored order and return the current record.
   * Refused transitions leave the record as it was.
   */
  private commit(clientOrderId: string, status: OrderStatus, patch: OrderPatch): Order {
    const order = this.requireOrder(clientOrderId);
    const next = advanceOrder(order, status, patch, this.now());
    if (next === null) {
      logger.debug({ client_order_id: clientOrderId, from: order.status, to: status }, 'Transition refused');
      return order;
    }
    if (next !== order) {
      this.store(order, next);
    }
    return next;
  }

  private store(previous: Order, next: Order): void {
    this.orders.set(next.clientOrderId, next);
    if (next.venueOrderId !== null && previous.venueOrderId === null) {
      this.venueOrderIndex.set(this.indexKey(next.venue, next.venueOrderId), next.clientOrderId);
    }
    this.emit('order_update', next);
  }

  private findLocalId(venue: string, payload: VenueOrder): string | undefined {
    const indexed = this.venueOrderIndex.get(this.indexKey(venue, payload.id));
    if (indexed !== undefined) {
      return indexed;
    }
    if (payload.client_order_id) {
      const candidate = this.orders.get(payload.client_order_id);
      if (!candidate || candidate.venue !== venue) {
        return undefined;
      }
      if (candidate.venueOrderId === payload.id) {
        return candidate.clientOrderId;
      }
      // A local order closed before any acknowledgement cannot own a venue order.
      if (candidate.venueOrderId === null && !isTerminal(candidate.status)) {
        return candidate.clientOrderId;
      }
    }
    return undefined;
  }

  private shadowId(venue: string, payload: VenueOrder): string {
    const preferred = payload.client_order_id || `ext-${payload.id}`;
    return this.orders.has(preferred) ? `ext-${venue}-${payload.id}` : preferred;
  }

  private resolveRoute(request: OrderRequest): { entry: VenueEntry; symbol: string } {
    const ref = parseInstrument(request.instrument);
    const requested = request.venue?.toLowerCase();
    if (ref.venue !== null && requested !== undefined && ref.venue !== requested) {
      throw new InvalidOrderError(`Instrument ${request.instrument} does not belong to venue ${request.venue}`);
    }

    const venue = ref.venue ?? requested ?? this.defaultVenue ?? this.firstVenue();
    if (venue === undefined) {
      throw new RoutingError('VENUE_NOT_FOUND', 'none', 'No venue registered');
    }
    return { entry: this.requireVenue(venue), symbol: ref.symbol };
  }

  private async roundSize(entry: VenueEntry, symbol: string, size: number | string): Promise<string> {
    let units: Decimal;
    try {
      units = new Decimal(size);
    } catch {
      throw new InvalidOrderError(`Invalid size: ${String(size)}`);
    }
    if (!units.isFinite() || units.lte(0)) {
      throw new InvalidOrderError(`Size must be positive, got ${String(size)}`);
    }

    const rounded = await entry.precision.roundSize(symbol, units.toFixed());
    if (new Decimal(rounded).lte(0)) {
      throw new InvalidOrderError(`Size ${String(size)} rounds to zero for ${symbol}`);
    }
    return rounded;
  }

  private firstVenue(): string | undefined {
    for (const name of this.venues.keys()) {
      return name;
    }
    return undefined;
  }

  private requireVenue(venue: string): VenueEntry {
    const entry = this.venues.get(venue.toLowerCase());
    if (!entry) {
      throw new RoutingError('VENUE_NOT_FOUND', venue, `No client registered for venue: ${venue}`);
    }
    return entry;
  }

  private requireOrder(clientOrderId: string): Order {
    const order = this.orders.get(clientOrderId);
    if (!order) {
      throw new NotFoundError('order', clientOrderId);
    }
    return order;
  }

  private indexKey(venue: string, venueOrderId: string): string {
    return `${venue}:${venueOrderId}`;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

/**
 * Price of the latest fill increment, recovered from the venue's running
 * average: (avg' * filled' - avg * filled) / delta.
 */
function incrementalPrice(
  previousFilled: Decimal,
  previousAvg: number | null,
  filled: Decimal,
  avg: number | null,
  delta: Decimal,
): number | null {
  if (avg === null) {
    return null;
  }
  if (previousFilled.isZero() || previousAvg === null) {
    return avg;
  }
  return new Decimal(avg).times(filled).minus(new Decimal(previousAvg).times(previousFilled)).dividedBy(delta).toNumber();
}

/**
 * Filter for a bare symbol, or a venue-qualified "venue:SYMBOL" id.
 */
function instrumentMatcher(instrument: string | undefined): (record: { venue: string; instrument: string }) => boolean {
  if (instrument === undefined) {
    return () => true;
  }
  const ref = parseInstrument(instrument);
  return (record) => record.instrument === ref.symbol && (ref.venue === null || record.venue === ref.venue);
}

async function invoke<T>(fn: () => Promise<T>): Promise<T> {
  return fn();
}

async function settle(promise: Promise<unknown>): Promise<void> {
  await promise.then(
    () => undefined,
    () => undefined,
  );
}
