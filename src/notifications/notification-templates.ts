import type { OrderStatus } from '../database/schema';
import { NotificationEvent, NotificationType, RenderedNotification } from './notifications.types';

const STATUS_LABELS: Record<OrderStatus, string> = {
  received: 'received',
  in_progress: 'in progress',
  ready_for_pickup: 'ready for pickup',
  completed: 'completed',
  cancelled: 'cancelled',
};

const TEMPLATES: Record<NotificationType, RenderedNotification> = {
  order_created: {
    title: 'Order {{orderNumber}} received',
    message: 'We have received your order {{orderNumber}}.',
  },
  order_status_changed: {
    title: 'Order {{orderNumber}} is {{newStatus}}',
    message: 'Your order {{orderNumber}} moved from {{oldStatus}} to {{newStatus}}.',
  },
  loyalty_earned: {
    title: 'You earned {{points}} points',
    message: 'Order {{orderNumber}} earned you {{points}} loyalty points.',
  },
};

function fill(template: string, vars: Record<string, string>) {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match, key: string) => vars[key] ?? match);
}

export function renderNotification(event: NotificationEvent): RenderedNotification {
  const vars: Record<string, string> = {
    orderNumber: event.orderNumber,
    newStatus: STATUS_LABELS[event.newStatus],
    oldStatus: event.oldStatus ? STATUS_LABELS[event.oldStatus] : 'new',
  };
  for (const [key, value] of Object.entries(event.data ?? {})) {
    vars[key] = String(value);
  }
  const template = TEMPLATES[event.type];
  return { title: fill(template.title, vars), message: fill(template.message, vars) };
}
