import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { Notification } from '../database/schema';
import { Store } from '../database/store';
import { renderNotification } from './notification-templates';
import { NOTIFICATIONS_QUEUE, NotificationJob } from './notifications.types';

@Processor(NOTIFICATIONS_QUEUE)
export class NotificationsProcessor extends WorkerHost {
  private readonly logger = new Logger(NotificationsProcessor.name);

  constructor(private readonly store: Store) {
    super();
  }

  async process(job: Job<NotificationJob>) {
    return this.handle(job.data);
  }

  /** Renders the event and stores it as an in-app notification. */
  async handle(payload: NotificationJob): Promise<Notification> {
    const rendered = renderNotification(payload);
    const notification = await this.store.transaction((tx) =>
      tx.notifications.insert({
        recipientId: payload.recipientId,
        type: payload.type,
        title: rendered.title,
        message: rendered.message,
        orderId: payload.orderId,
        shopId: payload.shopId,
        data: {
          oldStatus: payload.oldStatus,
          newStatus: payload.newStatus,
          timestamp: payload.timestamp,
          ...payload.data,
        },
      }),
    );
    this.logger.log({
      msg: 'Notification stored',
      type: payload.type,
      recipientId: payload.recipientId,
      orderId: payload.orderId,
      notificationId: notification.id,
    });
    return notification;
  }
}
