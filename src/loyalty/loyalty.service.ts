import { Injectable, Logger } from '@nestjs/common';
import { AccessControlService } from '../access/access-control.service';
import { Capability } from '../access/capabilities';
import { DomainError, ErrorKind } from '../common/errors';
import { LoyaltyEntry, LoyaltyEntryType, Order } from '../database/schema';
import { Store, StoreTransaction } from '../database/store';
import { SettingsService } from '../settings/settings.service';
import { Paginated } from '../common/dto/pagination.dto';
import { AdjustLoyaltyPointsDto, LoyaltyTransactionsQueryDto, RedeemPointsDto } from './dto/loyalty.dto';
import { addDays, allocate, balanceOf, earnedPoints, expiringWithin, openLots } from './loyalty-ledger';

export interface LoyaltySummary {
  customerId: string;
  balance: number;
  expiringSoon: { points: number; withinDays: number };
  recent: LoyaltyEntry[];
}

export interface RedemptionResult {
  customerId: string;
  redeemed: number;
  balance: number;
  entries: LoyaltyEntry[];
}

@Injectable()
export class LoyaltyService {
  private readonly logger = new Logger(LoyaltyService.name);

  constructor(
    private readonly store: Store,
    private readonly settings: SettingsService,
    private readonly access: AccessControlService,
  ) {}

  /**
   * Credits points for a completed order inside the caller's transaction.
   * Returns the number of points written (zero writes nothing).
   */
  async accrueForOrder(tx: StoreTransaction, order: Order, actorId: string, at: Date): Promise<number> {
    const config = this.settings.getLoyaltyConfig();
    const points = earnedPoints(order.totalCents, config.earnPercent);
    if (points <= 0) {
      return 0;
    }
    await tx.loyalty.insert({
      customerId: order.customerId,
      type: 'earned',
      points,
      description: `Points earned for order ${order.orderNumber}`,
      orderId: order.id,
      expiresAt: addDays(at, config.expiryDays),
      processedBy: actorId,
      createdAt: at,
    });
    return points;
  }

  redeem(actorId: string, customerId: string, dto: RedeemPointsDto): Promise<RedemptionResult> {
    return this.store.transaction(async (tx) => {
      await this.access.requireCustomerAccess(tx, actorId, customerId);
      this.assertPositive(dto.points);
      await this.lockCustomer(tx, customerId);
      if (dto.orderId) {
        const order = await tx.orders.findById(dto.orderId);
        if (!order || order.customerId !== customerId) {
          throw new DomainError(ErrorKind.NOT_FOUND, 'Order not found');
        }
      }

      const entries = await this.drawPoints(tx, customerId, dto.points, {
        type: 'redeemed',
        description: dto.description,
        orderId: dto.orderId,
        processedBy: actorId,
      });
      const balance = balanceOf(await tx.loyalty.listByCustomer(customerId), new Date());
      this.logger.log({ msg: 'Points redeemed', customerId, points: dto.points, balance, actorId });
      return { customerId, redeemed: dto.points, balance, entries };
    });
  }

  adjust(actorId: string, customerId: string, dto: AdjustLoyaltyPointsDto) {
    return this.store.transaction(async (tx) => {
      const grant = await this.access.resolve(tx, actorId);
      this.access.require(grant, Capability.MANAGE_LOYALTY);
      if (!Number.isInteger(dto.points) || dto.points === 0) {
        throw new DomainError(ErrorKind.VALIDATION_FAILED, 'Adjustment must be a non-zero whole number', {
          points: ['must be a non-zero integer'],
        });
      }
      await this.lockCustomer(tx, customerId);

      const entries =
        dto.points > 0
          ? [
              await tx.loyalty.insert({
                customerId,
                type: 'adjustment',
                points: dto.points,
                description: dto.reason,
                processedBy: actorId,
              }),
            ]
          : await this.drawPoints(tx, customerId, -dto.points, {
              type: 'adjustment',
              description: dto.reason,
              processedBy: actorId,
            });
      const balance = balanceOf(await tx.loyalty.listByCustomer(customerId), new Date());
      this.logger.log({ msg: 'Points adjusted', customerId, points: dto.points, balance, actorId });
      return { customerId, balance, entries };
    });
  }

  getSummary(actorId: string, customerId: string, options?: { historyLimit?: number }): Promise<LoyaltySummary> {
    return this.store.transaction(async (tx) => {
      await this.access.requireCustomerAccess(tx, actorId, customerId);
      if (!(await tx.customers.findProfile(customerId))) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Customer not found');
      }
      const now = new Date();
      const { expiringSoonDays } = this.settings.getLoyaltyConfig();
      const entries = await tx.loyalty.listByCustomer(customerId);
      const recent = await tx.loyalty.recent(customerId, options?.historyLimit ?? 10);
      return {
        customerId,
        balance: balanceOf(entries, now),
        expiringSoon: {
          points: expiringWithin(openLots(entries, now), now, expiringSoonDays),
          withinDays: expiringSoonDays,
        },
        recent,
      };
    });
  }

  /** Full ledger of a customer, newest first. */
  listTransactions(
    actorId: string,
    customerId: string,
    query: LoyaltyTransactionsQueryDto,
  ): Promise<Paginated<LoyaltyEntry>> {
    const page = query.toPageRequest();
    return this.store.transaction(async (tx) => {
      await this.access.requireCustomerAccess(tx, actorId, customerId);
      const result = await tx.loyalty.listPage(customerId, { type: query.type }, page);
      return { ...result, page: query.page ?? 1, pageSize: page.take };
    });
  }

  /** Writes one negative entry per lot drawn, each expiring with its lot. */
  private async drawPoints(
    tx: StoreTransaction,
    customerId: string,
    points: number,
    meta: { type: LoyaltyEntryType; description: string; orderId?: string; processedBy: string },
  ): Promise<LoyaltyEntry[]> {
    const now = new Date();
    const lots = openLots(await tx.loyalty.listByCustomer(customerId), now);
    const draws = allocate(lots, points);
    const written: LoyaltyEntry[] = [];
    for (const draw of draws) {
      written.push(
        await tx.loyalty.insert({
          customerId,
          type: meta.type,
          points: -draw.points,
          description: meta.description,
          orderId: meta.orderId,
          consumesEntryId: draw.lot.entryId,
          expiresAt: draw.lot.expiresAt,
          processedBy: meta.processedBy,
          createdAt: now,
        }),
      );
    }
    return written;
  }

  private async lockCustomer(tx: StoreTransaction, customerId: string) {
    const profile = await tx.customers.lockProfile(customerId);
    if (!profile) {
      throw new DomainError(ErrorKind.NOT_FOUND, 'Customer not found');
    }
    return profile;
  }

  private assertPositive(points: number) {
    if (!Number.isInteger(points) || points <= 0) {
      throw new DomainError(ErrorKind.VALIDATION_FAILED, 'Points must be a positive whole number', {
        points: ['must be a positive integer'],
      });
    }
  }
}
