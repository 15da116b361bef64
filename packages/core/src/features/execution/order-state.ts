// ============================================================
// Order lifecycle: pending -> submitted -> partially_filled -> filled
//                                       \-> cancelled | rejected
// Terminal orders never change again.
// ============================================================

import type { Order, OrderStatus } from '../../shared/protocol.js';

const TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ['submitted', 'rejected'],
  submitted: ['partially_filled', 'filled', 'cancelled', 'rejected'],
  partially_filled: ['partially_filled', 'filled', 'cancelled'],
  filled: [],
  cancelled: [],
  rejected: [],
};

const TERMINAL: ReadonlySet<OrderStatus> = new Set(['filled', 'cancelled', 'rejected']);

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL.has(status);
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export type OrderPatch = Partial<Pick<Order, 'venueOrderId' | 'filledSize' | 'avgFillPrice' | 'rejectReason'>>;

/**
 * Move `order` to `status`, applying `patch`.
 *
 * Returns `null` when the move is not allowed (including any move out of a
 * terminal status), and the very same object when nothing would change.
 * `venueOrderId` is only ever set once.
 */
export function advanceOrder(order: Order, status: OrderStatus, patch: OrderPatch, now: string): Order | null {
  if (isTerminal(order.status)) {
    return null;
  }
  if (status !== order.status && !canTransition(order.status, status)) {
    return null;
  }

  const next: Order = {
    ...order,
    status,
    venueOrderId: order.venueOrderId ?? patch.venueOrderId ?? null,
    filledSize: patch.filledSize ?? order.filledSize,
    avgFillPrice: patch.avgFillPrice !== undefined ? patch.avgFillPrice : order.avgFillPrice,
    rejectReason: patch.rejectReason !== undefined ? patch.rejectReason : order.rejectReason,
  };

  const unchanged =
    next.status === order.status &&
    next.venueOrderId === order.venueOrderId &&
    next.filledSize === order.filledSize &&
    next.avgFillPrice === order.avgFillPrice &&
    next.rejectReason === order.rejectReason;

  if (unchanged) {
    return order;
  }

  return Object.freeze({ ...next, updatedAt: now });
}
