import type { OrderStatus } from '../database/schema';

export const NOTIFICATIONS_QUEUE = 'notifications';

export type NotificationType = 'order_created' | 'order_status_changed' | 'loyalty_earned';

/** Emitted by the order engine after commit. */
export interface NotificationEvent {
  type: NotificationType;
  recipientId: string;
  shopId: string;
  orderId: string;
  orderNumber: string;
  oldStatus: OrderStatus | null;
  newStatus: OrderStatus;
  /** ISO-8601 instant of the change. */
  timestamp: string;
  data?: Record<string, string | number | boolean | null>;
}

export type NotificationJob = NotificationEvent;

export interface RenderedNotification {
  title: string;
  message: string;
}
