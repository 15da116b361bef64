// ============================================================
// TradingGateway: caller-facing API
// Wires venue clients, the order router and the reconciler,
// and manages the polling lifecycle
// ============================================================

import { EventEmitter } from 'events';
import { OrderRouter, type CancelAllResult } from './features/execution/order-router.js';
import { Reconciler, type ReconcileSummary } from './features/reconciliation/reconciler.js';
import type { VenueClient } from './features/execution/venue-client.js';
import { callVenue } from './features/execution/venue-client.js';
import { fromVenueAccount } from './features/execution/order-normalizer.js';
import { SimulatorVenueClient } from './features/simulator/simulator.js';
import type { GatewayConfig } from './shared/config.js';
import { GatewayError } from './shared/errors.js';
import { createLogger } from './shared/logger.js';
import type {
  Account,
  Order,
  OrderFilter,
  OrderHandle,
  OrderRequest,
  OrderStatus,
  Position,
  Trade,
} from './shared/protocol.js';

const logger = createLogger('Gateway');

const OPEN_STATUSES: readonly OrderStatus[] = ['pending', 'submitted', 'partially_filled'];

export interface GatewayStatus {
  state: 'stopped' | 'running';
  venues: string[];
  openOrders: number;
  trades: number;
  openPositions: number;
  lastReconcile: ReconcileSummary | null;
  uptimeSeconds: number;
}

export interface GatewayOptions {
  clock?: () => Date;
}

export class TradingGateway extends EventEmitter {
  private config: GatewayConfig;
  private router: OrderRouter;
  private reconciler: Reconciler;
  private clock: () => Date;
  private state: 'stopped' | 'running' = 'stopped';
  private startTime = 0;
  private lastReconcile: ReconcileSummary | null = null;

  constructor(config: GatewayConfig, clients: VenueClient[] = [], options: GatewayOptions = {}) {
    super();
    this.config = config;
    this.clock = options.clock ?? (() => new Date());

    this.router = new OrderRouter({
      venueTimeoutMs: config.venueTimeoutMs,
      defaultVenue: config.defaultVenue,
      cancelRelatedOnFill: config.cancelRelatedOnFill,
      clock: this.clock,
    });
    this.reconciler = new Reconciler(this.router, {
      intervalMs: config.reconcileIntervalMs,
      maxBackoffMs: config.reconcileMaxBackoffMs,
      unackedOrderGraceMs: config.unackedOrderGraceMs,
      venueTimeoutMs: config.venueTimeoutMs,
      clock: this.clock,
    });

    for (const client of clients) {
      this.registerVenue(client);
    }
    if (config.simulateOrders && clients.length === 0) {
      this.registerVenue(new SimulatorVenueClient({ autoFillMarket: true }));
      logger.info('Simulate mode: registered paper venue');
    }

    this.wirePipelineEvents();
  }

  /**
   * Start the gateway: sync state from every venue once, then poll.
   */
  async start(): Promise<void> {
    if (this.state !== 'stopped') {
      throw new Error(`Cannot start gateway: state is ${this.state}`);
    }

    this.startTime = this.clock().getTime();
    logger.info({ venues: this.router.getVenues().map((v) => v.venue) }, 'Starting gateway');

    await this.reconcile();
    this.reconciler.start();

    this.state = 'running';
    logger.info('Gateway started');
  }

  /**
   * Stop polling. Orders are left as they are on the venue.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }
    await this.reconciler.stop();
    this.state = 'stopped';
    logger.info('Gateway stopped');
    this.emit('stopped');
  }

  registerVenue(client: VenueClient): void {
    this.router.registerVenue(client);
    logger.info({ venue: client.venue }, 'Venue client registered');
  }

  placeOrder(request: OrderRequest): Promise<OrderHandle> {
    return this.router.place(request);
  }

  cancelOrder(clientOrderId: string): Promise<Order> {
    return this.router.cancel(clientOrderId);
  }

  cancelAllOrders(instrument?: string): Promise<CancelAllResult> {
    return this.router.cancelAll(instrument);
  }

  getOrder(clientOrderId: string): Order {
    return this.router.getOrder(clientOrderId);
  }

  /**
   * Orders known to the gateway. Without a status filter only orders that
   * are still working (not filled, cancelled or rejected) are returned.
   */
  getOrders(filter: OrderFilter = {}): Order[] {
    return this.router.listOrders({ ...filter, status: filter.status ?? OPEN_STATUSES });
  }

  getTrades(instrument?: string): Trade[] {
    return this.router.listTrades(instrument);
  }

  getTradeDetails(tradeId: string): Trade {
    return this.router.getTrade(tradeId);
  }

  getPositions(instrument?: string): Position[] {
    return this.router.listPositions(instrument);
  }

  async getAccount(venue?: string): Promise<Account> {
    const client = this.router.getVenue(venue);
    const payload = await callVenue(client, 'getAccount', this.config.venueTimeoutMs, () => client.getAccount());
    return fromVenueAccount(client.venue.toLowerCase(), payload);
  }

  /**
   * Net asset (liquidation) value of the account.
   */
  async getNAV(venue?: string): Promise<number> {
    const account = await this.getAccount(venue);
    return account.portfolioValue;
  }

  /**
   * Account balance as selected by `balanceSource` (equity by default).
   */
  async getBalance(venue?: string): Promise<number> {
    const account = await this.getAccount(venue);
    switch (this.config.balanceSource) {
      case 'equity':
        return account.equity;
      case 'cash':
        return account.cash;
      case 'buying_power':
        if (account.buyingPower === null) {
          throw new GatewayError('BALANCE_UNAVAILABLE', `Venue ${account.venue} does not report buying power`);
        }
        return account.buyingPower;
    }
  }

  async reconcile(): Promise<ReconcileSummary> {
    return this.reconciler.reconcile();
  }

  getStatus(): GatewayStatus {
    return {
      state: this.state,
      venues: this.router.getVenues().map((client) => client.venue),
      openOrders: this.router.listOrders({ status: OPEN_STATUSES }).length,
      trades: this.router.listTrades().length,
      openPositions: this.router.listPositions().length,
      lastReconcile: this.lastReconcile,
      uptimeSeconds: this.startTime > 0 ? Math.floor((this.clock().getTime() - this.startTime) / 1000) : 0,
    };
  }

  // --- Private methods ---

  private wirePipelineEvents(): void {
    this.router.on('order_update', (order: Order) => this.emit('order_update', order));
    this.router.on('trade', (trade: Trade) => {
      logger.info({
        trade_id: trade.id,
        instrument: trade.instrument,
        direction: trade.direction,
        size: trade.size,
        fill_price: trade.fillPrice,
      }, 'Fill recorded');
      this.emit('trade', trade);
    });
    this.router.on('position_update', (position: Position) => this.emit('position_update', position));
    this.router.on('position_removed', (removed: { venue: string; instrument: string }) =>
      this.emit('position_removed', removed),
    );
    this.reconciler.on('reconciled', (summary: ReconcileSummary) => {
      this.lastReconcile = summary;
      this.emit('reconciled', summary);
    });
  }
}
