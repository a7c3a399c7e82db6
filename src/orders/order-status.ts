import { DomainError, ErrorKind } from '../common/errors';
import type { OrderStatus } from '../database/schema';

/** Every permitted edge of the workflow; anything absent is rejected. */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  received: ['in_progress', 'cancelled'],
  in_progress: ['ready_for_pickup', 'cancelled'],
  ready_for_pickup: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};

/** Statuses in which line items may still change. */
export const EDITABLE_STATUSES: readonly OrderStatus[] = ['received', 'in_progress'];

export const isTerminal = (status: OrderStatus) => ORDER_TRANSITIONS[status].length === 0;

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: OrderStatus, to: OrderStatus): void {
  if (!canTransition(from, to)) {
    throw new DomainError(ErrorKind.INVALID_TRANSITION, `Cannot move an order from ${from} to ${to}`);
  }
}

export function assertEditable(status: OrderStatus): void {
  if (!EDITABLE_STATUSES.includes(status)) {
    throw new DomainError(ErrorKind.INVALID_TRANSITION, `Items cannot be changed while the order is ${status}`);
  }
}
