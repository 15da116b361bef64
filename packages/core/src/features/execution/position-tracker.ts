// ============================================================
// Position Tracker - venue-derived positions per instrument
// ============================================================

import { EventEmitter } from 'events';
import Decimal from 'decimal.js';
import type { Position } from '../../shared/protocol.js';

/**
 * Holds the last venue snapshot of positions. Positions are only ever
 * replaced wholesale from venue state, never edited in place.
 * Emits events: 'position_update', 'position_removed'
 */
export class PositionTracker extends EventEmitter {
  private positions = new Map<string, Position>();

  /**
   * Replace every position of `venue` with `rows`. Rows for the same
   * instrument (long and short legs) are summed. Only real changes emit.
   */
  replaceVenue(venue: string, rows: Position[]): void {
    const next = new Map<string, Position>();
    for (const row of rows) {
      const key = this.makeKey(venue, row.instrument);
      const existing = next.get(key);
      next.set(key, existing ? this.merge(existing, row) : { ...row, venue });
    }

    for (const [key, position] of this.positions) {
      if (position.venue === venue && !next.has(key)) {
        this.positions.delete(key);
        this.emit('position_removed', { venue, instrument: position.instrument });
      }
    }

    for (const [key, position] of next) {
      const current = this.positions.get(key);
      if (current && this.samePosition(current, position)) {
        continue;
      }
      const frozen = Object.freeze(position);
      this.positions.set(key, frozen);
      this.emit('position_update', frozen);
    }
  }

  getPositions(instrument?: string): Position[] {
    const all = Array.from(this.positions.values());
    return instrument === undefined ? all : all.filter((p) => p.instrument === instrument);
  }

  getPosition(venue: string, instrument: string): Position | undefined {
    return this.positions.get(this.makeKey(venue, instrument));
  }

  /**
   * Unrealized P&L a fill at `fillPrice` would carry at the current mark.
   * Returns null when the mark or the fill price is unknown.
   *
   * Logic:
   * - Buy fills: (current_price - fill_price) * size
   * - Sell fills: (fill_price - current_price) * size
   */
  computePnl(venue: string, instrument: string, direction: 1 | -1, fillPrice: number | null, size: string): number | null {
    const currentPrice = this.getPosition(venue, instrument)?.currentPrice ?? null;
    if (currentPrice === null || fillPrice === null) {
      return null;
    }
    return new Decimal(currentPrice).minus(fillPrice).times(direction).times(size).toNumber();
  }

  private merge(a: Position, b: Position): Position {
    return {
      venue: a.venue,
      instrument: a.instrument,
      longUnits: new Decimal(a.longUnits).plus(b.longUnits).toFixed(),
      longPl: this.sumNullable(a.longPl, b.longPl),
      shortUnits: new Decimal(a.shortUnits).plus(b.shortUnits).toFixed(),
      shortPl: this.sumNullable(a.shortPl, b.shortPl),
      currentPrice: a.currentPrice ?? b.currentPrice,
    };
  }

  private sumNullable(a: number | null, b: number | null): number | null {
    if (a === null) return b;
    if (b === null) return a;
    return new Decimal(a).plus(b).toNumber();
  }

  private samePosition(a: Position, b: Position): boolean {
    return (
      a.longUnits === b.longUnits &&
      a.longPl === b.longPl &&
      a.shortUnits === b.shortUnits &&
      a.shortPl === b.shortPl &&
      a.currentPrice === b.currentPrice
    );
  }

  /**
   * Generate composite key for position tracking.
   */
  private makeKey(venue: string, instrument: string): string {
    return `${venue}:${instrument}`;
  }
}
