// ============================================================
// Order Normalizer: venue-neutral records <-> venue wire shapes
// ============================================================

import {
  ORDER_TYPES,
  type Account,
  type Direction,
  type Order,
  type OrderStatus,
  type OrderType,
  type Position,
  type Trade,
  type VenueAccount,
  type VenueOrder,
  type VenueOrderParams,
  type VenueOrderStatus,
  type VenuePosition,
  type VenueSide,
} from '../../shared/protocol.js';
import { InvalidOrderError, UnsupportedOrderTypeError } from '../../shared/errors.js';

export interface InstrumentRef {
  venue: string | null;
  symbol: string;
}

/**
 * Split a venue-qualified instrument ("paper:AAPL") into its parts.
 * Unqualified instruments come back with `venue: null`.
 */
export function parseInstrument(instrument: string): InstrumentRef {
  const colonIndex = instrument.indexOf(':');
  if (colonIndex === -1) {
    return { venue: null, symbol: instrument };
  }

  const venue = instrument.substring(0, colonIndex);
  const symbol = instrument.substring(colonIndex + 1);

  if (!venue || !symbol) {
    throw new InvalidOrderError(`Invalid instrument: ${instrument}. Expected "SYMBOL" or "venue:SYMBOL"`);
  }

  return { venue: venue.toLowerCase(), symbol };
}

export function isOrderType(value: string): value is OrderType {
  return (ORDER_TYPES as readonly string[]).includes(value);
}

export function parseOrderType(value: string): OrderType {
  if (!isOrderType(value)) {
    throw new UnsupportedOrderTypeError(value);
  }
  return value;
}

/**
 * Map an order to the venue's request vocabulary.
 *
 * A close order's `direction` names the position being closed, so the venue
 * side is the opposite one and the request is reduce-only.
 */
export function toVenueRequest(order: Order): VenueOrderParams {
  if (order.timeInForce === null) {
    throw new InvalidOrderError(`Order ${order.clientOrderId} has no time in force`);
  }
  const base = {
    symbol: order.instrument,
    qty: order.size,
    time_in_force: order.timeInForce,
    client_order_id: order.clientOrderId,
  };

  let params: VenueOrderParams;
  switch (order.orderType) {
    case 'market':
      params = { ...base, side: toSide(order.direction), type: 'market' };
      break;
    case 'limit':
      params = {
        ...base,
        side: toSide(order.direction),
        type: 'limit',
        limit_price: requirePrice(order.limitPrice, 'limit', 'limitPrice'),
      };
      break;
    case 'stop-limit':
      params = {
        ...base,
        side: toSide(order.direction),
        type: 'stop_limit',
        limit_price: requirePrice(order.limitPrice, 'stop-limit', 'limitPrice'),
        stop_price: requirePrice(order.stopPrice, 'stop-limit', 'stopPrice'),
      };
      break;
    case 'close':
      if (order.takeProfit !== null || order.stopLoss !== null) {
        throw new InvalidOrderError('close orders cannot carry take-profit or stop-loss legs');
      }
      params = { ...base, side: toSide(flip(order.direction)), type: 'market', reduce_only: true };
      break;
    default:
      return assertUnsupported(order.orderType);
  }

  if (order.takeProfit !== null || order.stopLoss !== null) {
    params.order_class = 'bracket';
    if (order.takeProfit !== null) {
      params.take_profit = { limit_price: order.takeProfit };
    }
    if (order.stopLoss !== null) {
      params.stop_loss = { stop_price: order.stopLoss };
    }
  }

  return params;
}

export function mapVenueStatus(status: VenueOrderStatus): OrderStatus {
  switch (status) {
    case 'new':
    case 'pending_new':
    case 'accepted':
      return 'submitted';
    case 'partially_filled':
      return 'partially_filled';
    case 'filled':
      return 'filled';
    case 'canceled':
    case 'expired':
      return 'cancelled';
    case 'rejected':
      return 'rejected';
  }
}

/**
 * Build a local record for a venue order the gateway never placed.
 */
export function fromVenueOrder(venue: string, payload: VenueOrder, now: string): Order {
  const isClose = payload.type === 'market' && payload.reduce_only === true;
  const sideDirection = fromSide(payload.side);
  const status = mapVenueStatus(payload.status);

  return Object.freeze({
    clientOrderId: payload.client_order_id || `ext-${payload.id}`,
    venue,
    venueOrderId: payload.id,
    instrument: payload.symbol,
    direction: isClose ? flip(sideDirection) : sideDirection,
    size: payload.qty,
    orderType: isClose ? 'close' : fromVenueType(payload.type),
    limitPrice: parseNumber(payload.limit_price),
    stopPrice: parseNumber(payload.stop_price),
    takeProfit: null,
    stopLoss: null,
    timeInForce: payload.time_in_force ?? null,
    status,
    filledSize: payload.filled_qty,
    avgFillPrice: parseNumber(payload.filled_avg_price),
    relatedOrders: Object.freeze([]),
    strategyTag: null,
    external: true,
    rejectReason: null,
    createdAt: payload.submitted_at ?? null,
    updatedAt: now,
  } satisfies Order);
}

/**
 * One venue position row. Rows for the same instrument are summed by the
 * position tracker.
 */
export function fromVenuePosition(venue: string, payload: VenuePosition): Position {
  const qty = Number(payload.qty);
  const pl = parseNumber(payload.unrealized_pl);
  const isShort = qty < 0;

  return {
    venue,
    instrument: payload.symbol,
    longUnits: isShort ? '0' : trimSign(payload.qty),
    longPl: isShort ? null : pl,
    shortUnits: isShort ? trimSign(payload.qty) : '0',
    shortPl: isShort ? pl : null,
    currentPrice: parseNumber(payload.current_price),
  };
}

export function fromVenueAccount(venue: string, payload: VenueAccount): Account {
  return {
    venue,
    equity: Number(payload.equity),
    cash: Number(payload.cash),
    portfolioValue: Number(payload.portfolio_value),
    buyingPower: parseNumber(payload.buying_power),
  };
}

export interface FillEvent {
  sequence: number;
  size: string;
  price: number | null;
  time: string | null;
}

export function toTrade(order: Order, fill: FillEvent, unrealizedPl: number | null): Trade {
  return Object.freeze({
    id: `${order.clientOrderId}-${fill.sequence}`,
    orderId: order.clientOrderId,
    venue: order.venue,
    instrument: order.instrument,
    direction: order.orderType === 'close' ? flip(order.direction) : order.direction,
    fillPrice: fill.price,
    size: fill.size,
    timeFilled: fill.time,
    unrealizedPl,
  });
}

/**
 * Parse an optional numeric venue field. Missing or malformed values are null.
 */
export function parseNumber(value: string | null | undefined): number | null {
  if (value === null || value === undefined || value.trim() === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function flip(direction: Direction): Direction {
  return direction === 1 ? -1 : 1;
}

function toSide(direction: Direction): VenueSide {
  return direction === 1 ? 'buy' : 'sell';
}

function fromSide(side: VenueSide): Direction {
  return side === 'buy' ? 1 : -1;
}

function fromVenueType(type: VenueOrder['type']): OrderType {
  switch (type) {
    case 'market':
      return 'market';
    case 'limit':
      return 'limit';
    case 'stop_limit':
      return 'stop-limit';
  }
}

function trimSign(qty: string): string {
  return qty.startsWith('-') || qty.startsWith('+') ? qty.substring(1) : qty;
}

function requirePrice(value: number | null, orderType: OrderType, field: string): number {
  if (value === null || !Number.isFinite(value) || value <= 0) {
    throw new InvalidOrderError(`${orderType} orders require a positive ${field}`);
  }
  return value;
}

function assertUnsupported(orderType: never): never {
  throw new UnsupportedOrderTypeError(String(orderType));
}
