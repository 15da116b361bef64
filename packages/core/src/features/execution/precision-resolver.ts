// ============================================================
// PrecisionResolver: tradable size precision per instrument
// ============================================================

import Decimal from 'decimal.js';
import type { VenueClient } from './venue-client.js';
import { callVenue } from './venue-client.js';
import { UnknownInstrumentError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';

const logger = createLogger('PrecisionResolver');

// Fractionable assets that publish no increment trade to 9 decimals.
const DEFAULT_FRACTIONAL_PRECISION = 9;

export interface PrecisionResolverOptions {
  timeoutMs: number;
}

export class PrecisionResolver {
  private readonly client: VenueClient;
  private readonly timeoutMs: number;
  private readonly cache = new Map<string, Promise<number>>();

  constructor(client: VenueClient, options: PrecisionResolverOptions) {
    this.client = client;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Decimal places allowed for `instrument`. The venue is asked once; concurrent
   * first lookups share the same request. Failed lookups are not cached.
   */
  precision(instrument: string): Promise<number> {
    const cached = this.cache.get(instrument);
    if (cached) {
      return cached;
    }

    const lookup = this.lookup(instrument);
    this.cache.set(instrument, lookup);
    lookup.catch(() => {
      if (this.cache.get(instrument) === lookup) {
        this.cache.delete(instrument);
      }
    });
    return lookup;
  }

  /**
   * Round `units` half-to-even to the instrument's precision.
   * Returns a plain decimal string ("10", "0.125").
   */
  async roundSize(instrument: string, units: number | string): Promise<string> {
    const places = await this.precision(instrument);
    return new Decimal(units).toDecimalPlaces(places, Decimal.ROUND_HALF_EVEN).toFixed();
  }

  /**
   * Drop one cached entry, or all of them.
   */
  refresh(instrument?: string): void {
    if (instrument === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(instrument);
    }
  }

  has(instrument: string): boolean {
    return this.cache.has(instrument);
  }

  private async lookup(instrument: string): Promise<number> {
    const asset = await callVenue(this.client, 'getAsset', this.timeoutMs, () =>
      this.client.getAsset(instrument),
    );

    if (!asset) {
      throw new UnknownInstrumentError(this.client.venue, instrument);
    }

    let places = 0;
    if (asset.fractionable) {
      places = asset.min_increment
        ? new Decimal(asset.min_increment).decimalPlaces()
        : DEFAULT_FRACTIONAL_PRECISION;
    }

    logger.debug({ venue: this.client.venue, instrument, places }, 'Resolved instrument precision');
    return places;
  }
}
