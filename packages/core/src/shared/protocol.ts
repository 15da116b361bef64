// --- Domain: orders, trades, positions (gateway-owned) ---

export type OrderType = 'market' | 'limit' | 'stop-limit' | 'close';

export const ORDER_TYPES: readonly OrderType[] = ['market', 'limit', 'stop-limit', 'close'];

export type Direction = 1 | -1;

export type TimeInForce = 'day' | 'gtc' | 'ioc' | 'fok';

export type OrderStatus =
  | 'pending'
  | 'submitted'
  | 'partially_filled'
  | 'filled'
  | 'cancelled'
  | 'rejected';

/**
 * What a caller hands to `place`. `orderType` is a plain string so that an
 * unrecognised type reaches the normalizer and fails with a typed error.
 */
export interface OrderRequest {
  clientOrderId?: string;
  /** Bare symbol, or venue-qualified as "venue:SYMBOL" */
  instrument: string;
  venue?: string;
  direction: Direction;
  size: number | string;
  orderType: string;
  limitPrice?: number;
  stopPrice?: number;
  timeInForce?: TimeInForce;
  takeProfit?: number;
  stopLoss?: number;
  relatedOrders?: string[];
  strategyTag?: string;
}

export interface Order {
  readonly clientOrderId: string;
  readonly venue: string;
  readonly venueOrderId: string | null;
  readonly instrument: string;
  readonly direction: Direction;
  /** Decimal string, rounded to the instrument's precision */
  readonly size: string;
  readonly orderType: OrderType;
  readonly limitPrice: number | null;
  readonly stopPrice: number | null;
  readonly takeProfit: number | null;
  readonly stopLoss: number | null;
  /** Null when the venue did not report one */
  readonly timeInForce: TimeInForce | null;
  readonly status: OrderStatus;
  readonly filledSize: string;
  readonly avgFillPrice: number | null;
  readonly relatedOrders: readonly string[];
  readonly strategyTag: string | null;
  /** Found on the venue with no local counterpart */
  readonly external: boolean;
  readonly rejectReason: string | null;
  /** Submission time; null for an external order the venue sent without one */
  readonly createdAt: string | null;
  /** When the gateway last changed this record */
  readonly updatedAt: string;
}

export interface OrderHandle {
  readonly clientOrderId: string;
  readonly order: Order;
  /** True when the call matched an order that was already placed */
  readonly replayed: boolean;
}

export interface OrderFilter {
  instrument?: string;
  venue?: string;
  status?: OrderStatus | readonly OrderStatus[];
}

export interface Trade {
  readonly id: string;
  readonly orderId: string;
  readonly venue: string;
  readonly instrument: string;
  readonly direction: Direction;
  readonly fillPrice: number | null;
  readonly size: string;
  readonly timeFilled: string | null;
  readonly unrealizedPl: number | null;
}

export interface Position {
  readonly venue: string;
  readonly instrument: string;
  readonly longUnits: string;
  readonly longPl: number | null;
  readonly shortUnits: string;
  readonly shortPl: number | null;
  readonly currentPrice: number | null;
}

export interface Account {
  venue: string;
  equity: number;
  cash: number;
  portfolioValue: number;
  buyingPower: number | null;
}

// --- Venue wire shapes (what a Venue Client sends and returns) ---

export type VenueSide = 'buy' | 'sell';

export type VenueOrderType = 'market' | 'limit' | 'stop_limit';

export type VenueOrderStatus =
  | 'new'
  | 'pending_new'
  | 'accepted'
  | 'partially_filled'
  | 'filled'
  | 'canceled'
  | 'expired'
  | 'rejected';

export type VenueOrderQuery = 'open' | 'closed' | 'all';

export interface VenueOrderParams {
  symbol: string;
  /** Unsigned quantity; direction travels in `side` */
  qty: string;
  side: VenueSide;
  type: VenueOrderType;
  time_in_force: TimeInForce;
  client_order_id: string;
  limit_price?: number;
  stop_price?: number;
  reduce_only?: boolean;
  order_class?: 'simple' | 'bracket';
  take_profit?: { limit_price: number };
  stop_loss?: { stop_price: number };
}

export interface VenueOrder {
  id: string;
  client_order_id?: string | null;
  symbol: string;
  side: VenueSide;
  type: VenueOrderType;
  qty: string;
  filled_qty: string;
  filled_avg_price?: string | null;
  limit_price?: string | null;
  stop_price?: string | null;
  time_in_force?: TimeInForce | null;
  reduce_only?: boolean | null;
  status: VenueOrderStatus;
  submitted_at?: string | null;
  filled_at?: string | null;
  updated_at?: string | null;
}

export interface VenuePosition {
  symbol: string;
  /** Signed: negative for a short position */
  qty: string;
  avg_entry_price?: string | null;
  current_price?: string | null;
  unrealized_pl?: string | null;
}

export interface VenueAccount {
  equity: string;
  cash: string;
  portfolio_value: string;
  buying_power?: string | null;
}

export interface VenueAsset {
  symbol: string;
  fractionable: boolean;
  /** Smallest tradable quantity step, e.g. "0.001" */
  min_increment?: string | null;
  tradable?: boolean | null;
}
