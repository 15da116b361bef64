// ============================================================
// Reconciler: pulls venue state and merges it into the router
// Venue state is authoritative; local metadata is kept.
// Polls on an interval with exponential backoff after failures.
// ============================================================

import { EventEmitter } from 'events';
import type { Order, VenueOrder } from '../../shared/protocol.js';
import type { VenueClient } from '../execution/venue-client.js';
import { callVenue } from '../execution/venue-client.js';
import type { MergeResult, OrderRouter } from '../execution/order-router.js';
import { errorMessage } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';

const logger = createLogger('Reconciler');

export interface ReconcilerOptions {
  /** Poll period; 0 disables `start()` */
  intervalMs: number;
  maxBackoffMs: number;
  /** Age after which a never-acknowledged order is rejected */
  unackedOrderGraceMs: number;
  venueTimeoutMs: number;
  clock?: () => Date;
}

export interface ReconcileSummary {
  ok: boolean;
  startedAt: string;
  ordersCreated: number;
  ordersUpdated: number;
  ordersExpired: number;
  tradesRecorded: number;
  positions: number;
  errors: { venue: string; message: string }[];
}

/**
 * Reconciler drives `OrderRouter.applyVenueOrder` from venue snapshots.
 * Events:
 * - 'reconciled': (ReconcileSummary) - after every pass, successful or not
 */
export class Reconciler extends EventEmitter {
  private readonly router: OrderRouter;
  private readonly intervalMs: number;
  private readonly maxBackoffMs: number;
  private readonly unackedOrderGraceMs: number;
  private readonly venueTimeoutMs: number;
  private readonly clock: () => Date;
  private running: Promise<ReconcileSummary> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private currentDelay: number;
  private stopped = true;

  constructor(router: OrderRouter, options: ReconcilerOptions) {
    super();
    this.router = router;
    this.intervalMs = options.intervalMs;
    this.maxBackoffMs = options.maxBackoffMs;
    this.unackedOrderGraceMs = options.unackedOrderGraceMs;
    this.venueTimeoutMs = options.venueTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
    this.currentDelay = options.intervalMs;
  }

  /**
   * Run one pass over every registered venue. Concurrent callers share the
   * pass in progress. Never throws: failures are logged and reported in the
   * summary.
   */
  reconcile(): Promise<ReconcileSummary> {
    if (this.running) {
      return this.running;
    }

    this.running = this.runPass().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  /**
   * Start periodic polling.
   */
  start(): void {
    if (this.intervalMs <= 0 || !this.stopped) {
      return;
    }
    this.stopped = false;
    this.currentDelay = this.intervalMs;
    this.schedule(this.currentDelay);
    logger.info({ interval_ms: this.intervalMs }, 'Reconciliation polling started');
  }

  /**
   * Stop polling and wait for a pass in progress to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }

  isPolling(): boolean {
    return !this.stopped;
  }

  /** Delay before the next scheduled poll */
  getCurrentDelay(): number {
    return this.currentDelay;
  }

  // --- Private methods ---

  private schedule(delay: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((error: unknown) => {
        logger.error({ err: error }, 'Reconciliation tick failed');
      });
    }, delay);
  }

  private async tick(): Promise<void> {
    const summary = await this.reconcile();
    if (this.stopped) {
      return;
    }

    if (summary.ok) {
      this.currentDelay = this.intervalMs;
    } else {
      this.currentDelay = Math.min(this.currentDelay * 2, this.maxBackoffMs);
      logger.warn({ delay_ms: this.currentDelay, errors: summary.errors }, 'Reconciliation failed, backing off');
    }
    this.schedule(this.currentDelay);
  }

  private async runPass(): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = {
      ok: true,
      startedAt: this.clock().toISOString(),
      ordersCreated: 0,
      ordersUpdated: 0,
      ordersExpired: 0,
      tradesRecorded: 0,
      positions: 0,
      errors: [],
    };

    for (const client of this.router.getVenues()) {
      try {
        await this.reconcileVenue(client, summary);
      } catch (error) {
        summary.ok = false;
        summary.errors.push({ venue: client.venue, message: errorMessage(error) });
        logger.error({ venue: client.venue, err: error }, 'Reconciliation poll failed, retrying next cycle');
      }
    }

    summary.positions = this.router.listPositions().length;
    logger.debug({ ...summary }, 'Reconciliation pass complete');
    this.emit('reconciled', summary);
    return summary;
  }

  private async reconcileVenue(client: VenueClient, summary: ReconcileSummary): Promise<void> {
    const venue = client.venue.toLowerCase();

    const positions = await callVenue(client, 'listPositions', this.venueTimeoutMs, () => client.listPositions());
    this.router.replacePositions(venue, positions);

    const open = await callVenue(client, 'listOrders', this.venueTimeoutMs, () => client.listOrders('open'));
    const seen = new Set<string>();
    for (const payload of open) {
      const result = await this.router.applyVenueOrder(venue, payload);
      this.tally(result, summary);
      if (result.order) {
        seen.add(result.order.clientOrderId);
      }
    }

    const missing = this.router
      .listOrders({ venue, status: ['submitted', 'partially_filled'] })
      .filter((order) => !seen.has(order.clientOrderId) && !this.router.isInFlight(order.clientOrderId));
    if (missing.length === 0) {
      return;
    }

    // Orders that left the open list: look for their final state.
    const closed = await callVenue(client, 'listOrders', this.venueTimeoutMs, () => client.listOrders('closed'));
    const resolved = new Set<string>();
    for (const payload of closed) {
      const order = this.matchMissing(missing, payload);
      if (!order) {
        continue;
      }
      const result = await this.router.applyVenueOrder(venue, payload);
      this.tally(result, summary);
      resolved.add(order.clientOrderId);
    }

    const now = this.clock().getTime();
    for (const order of missing) {
      if (resolved.has(order.clientOrderId)) {
        continue;
      }
      if (order.venueOrderId === null) {
        if (order.createdAt !== null && now - Date.parse(order.createdAt) >= this.unackedOrderGraceMs) {
          const expired = await this.router.expireUnacknowledged(order.clientOrderId, 'not acknowledged by venue');
          if (expired) {
            summary.ordersExpired++;
          }
        }
      } else {
        logger.warn({ venue, client_order_id: order.clientOrderId, venue_order_id: order.venueOrderId }, 'Open order not reported by venue');
      }
    }
  }

  private matchMissing(missing: Order[], payload: VenueOrder): Order | undefined {
    return missing.find((order) =>
      order.venueOrderId === payload.id ||
      (order.venueOrderId === null && payload.client_order_id === order.clientOrderId),
    );
  }

  private tally(result: MergeResult, summary: ReconcileSummary): void {
    if (result.outcome === 'created') {
      summary.ordersCreated++;
    } else if (result.outcome === 'updated') {
      summary.ordersUpdated++;
    }
    summary.tradesRecorded += result.trades.length;
  }
}
