import { Injectable, Logger, Optional } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { Paginated } from '../common/dto/pagination.dto';
import { DomainError, ErrorKind } from '../common/errors';
import { Notification } from '../database/schema';
import { Store } from '../database/store';
import { NotificationListQueryDto } from './dto';
import { NotificationsProcessor } from './notifications.processor';
import { NOTIFICATIONS_QUEUE, NotificationEvent } from './notifications.types';

@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(
    private readonly store: Store,
    private readonly processor: NotificationsProcessor,
    @InjectQueue(NOTIFICATIONS_QUEUE) @Optional() private readonly queue?: Pick<Queue<NotificationEvent>, 'add'>,
  ) {}

  /** Fire-and-forget; delivery problems are logged and never reach the caller. */
  dispatch(event: NotificationEvent): void {
    this.deliver(event).catch((err: unknown) => {
      this.logger.error({
        msg: 'Notification dispatch failed',
        type: event.type,
        orderId: event.orderId,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  /** Enqueues the event, or processes it inline when no queue is configured. */
  async deliver(event: NotificationEvent): Promise<void> {
    if (!this.queue) {
      await this.processor.handle(event);
      return;
    }
    await this.queue.add(event.type, event, {
      removeOnComplete: 50,
      removeOnFail: 25,
      attempts: 3,
      backoff: { type: 'exponential', delay: 2000 },
    });
  }

  async list(userId: string, query: NotificationListQueryDto): Promise<Paginated<Notification>> {
    const page = query.toPageRequest();
    const result = await this.store.transaction((tx) =>
      tx.notifications.listByRecipient(userId, { status: query.status }, page),
    );
    return { ...result, page: query.page ?? 1, pageSize: page.take };
  }

  updateStatus(userId: string, notificationId: string, status: 'read' | 'archived') {
    return this.store.transaction(async (tx) => {
      const notification = await tx.notifications.findById(notificationId);
      if (!notification || notification.recipientId !== userId) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Notification not found');
      }
      return tx.notifications.update(notificationId, {
        status,
        readAt: notification.readAt ?? new Date(),
      });
    });
  }
}
