import type {
  VenueOrderParams,
  VenueOrder,
  VenueOrderQuery,
  VenuePosition,
  VenueAccount,
  VenueAsset,
} from '../../shared/protocol.js';
import { GatewayError, RoutingError, errorMessage } from '../../shared/errors.js';
import { withTimeout } from '../../shared/timeout.js';

/**
 * Capability the gateway consumes for one venue. Implementations own the
 * wire protocol and hold no order state of their own.
 *
 * Venue-side refusals must be thrown as `SubmissionRejectedError`; any other
 * thrown error is treated as a transport failure.
 */
export interface VenueClient {
  readonly venue: string;
  /** Returns the venue's id for the accepted order */
  submitOrder(params: VenueOrderParams): Promise<string>;
  cancelOrder(venueOrderId: string): Promise<void>;
  listOrders(status: VenueOrderQuery, instrument?: string): Promise<VenueOrder[]>;
  listPositions(instrument?: string): Promise<VenuePosition[]>;
  getAccount(): Promise<VenueAccount>;
  /** `null` when the venue does not list the instrument */
  getAsset(instrument: string): Promise<VenueAsset | null>;
}

/**
 * Invoke a venue operation with a timeout. Gateway errors thrown by the client
 * (venue rejections) pass through; anything else becomes a TRANSPORT routing error.
 */
export async function callVenue<T>(
  client: VenueClient,
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await withTimeout(fn(), timeoutMs, client.venue, operation);
  } catch (error) {
    if (error instanceof GatewayError) {
      throw error;
    }
    throw new RoutingError(
      'TRANSPORT',
      client.venue,
      `${operation} on ${client.venue} failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}
