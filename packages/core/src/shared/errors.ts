// ============================================================
// Error taxonomy: every failure the gateway surfaces to a caller
// ============================================================

export type RoutingErrorCode = 'TRANSPORT' | 'TIMEOUT' | 'UNACKNOWLEDGED' | 'VENUE_NOT_FOUND';

/**
 * Base class for gateway errors. `code` is stable and safe to branch on.
 */
export class GatewayError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownInstrumentError extends GatewayError {
  readonly instrument: string;
  readonly venue: string;

  constructor(venue: string, instrument: string) {
    super('UNKNOWN_INSTRUMENT', `Instrument ${instrument} is not known to venue ${venue}`);
    this.venue = venue;
    this.instrument = instrument;
  }
}

export class UnsupportedOrderTypeError extends GatewayError {
  readonly orderType: string;

  constructor(orderType: string) {
    super('UNSUPPORTED_ORDER_TYPE', `Order type not recognised: ${orderType}`);
    this.orderType = orderType;
  }
}

export class InvalidOrderError extends GatewayError {
  constructor(message: string) {
    super('INVALID_ORDER', message);
  }
}

/**
 * The venue received the request and declined it. Venue clients throw this
 * for business-level refusals; anything else they throw is treated as transport.
 */
export class SubmissionRejectedError extends GatewayError {
  readonly reason: string;
  readonly venueCode?: string;

  constructor(reason: string, venueCode?: string) {
    super('SUBMISSION_REJECTED', `Venue rejected request: ${reason}`);
    this.reason = reason;
    this.venueCode = venueCode;
  }
}

export class RoutingError extends GatewayError {
  declare readonly code: RoutingErrorCode;
  readonly venue: string;

  constructor(code: RoutingErrorCode, venue: string, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.venue = venue;
  }
}

export class NotFoundError extends GatewayError {
  readonly kind: 'order' | 'trade';
  readonly id: string;

  constructor(kind: 'order' | 'trade', id: string) {
    super('NOT_FOUND', `${kind === 'order' ? 'Order' : 'Trade'} not found: ${id}`);
    this.kind = kind;
    this.id = id;
  }
}

/**
 * Render any thrown value as a log/report message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
