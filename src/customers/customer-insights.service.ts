import { Injectable } from '@nestjs/common';
import { AccessControlService } from '../access/access-control.service';
import { Capability } from '../access/capabilities';
import { Paginated } from '../common/dto/pagination.dto';
import { DomainError, ErrorKind } from '../common/errors';
import { formatCents } from '../common/utils/money.util';
import { MEMBERSHIP_TIERS, MembershipTier, OrderItem } from '../database/schema';
import { ServedCustomer, Store, StoreTransaction } from '../database/store';
import { ShopCustomersQueryDto } from './dto/customer.dto';

const DAY_MS = 24 * 60 * 60 * 1000;
const NEW_CUSTOMER_WINDOW_DAYS = 30;
const ACTIVE_CUSTOMER_WINDOW_DAYS = 90;
const PREFERENCE_LIMIT = 5;
const LEADERBOARD_LIMIT = 10;

export interface ShopCustomerSummary {
  id: string;
  username: string;
  email: string | null;
  phone: string;
  preferredName: string | null;
  membershipTier: MembershipTier;
  totalSpentCents: number;
  totalSpent: string;
  totalOrders: number;
  lastOrderAt: Date | null;
  loyaltyBalance: number;
}

export interface CustomerAnalytics {
  customerId: string;
  displayName: string;
  membershipTier: MembershipTier;
  loyaltyBalance: number;
  /** Completed orders at this shop only. */
  completedOrders: number;
  totalSpentCents: number;
  averageOrderCents: number;
  firstOrderAt: Date | null;
  lastOrderAt: Date | null;
  daysSinceLastOrder: number | null;
  preferredServices: string[];
  preferredItems: string[];
}

export interface ShopCustomerStats {
  shopId: string;
  totalCustomers: number;
  tierDistribution: Array<{ tier: MembershipTier; count: number }>;
  newCustomers: number;
  activeCustomers: number;
  loyaltyPointsOutstanding: number;
  averageCustomerValueCents: number;
  topSpenders: ShopCustomerSummary[];
  mostLoyal: ShopCustomerSummary[];
}

/** Names ranked by summed quantity, ties broken alphabetically. */
export function rankByQuantity(lines: OrderItem[], key: (line: OrderItem) => string, limit: number): string[] {
  const tally = new Map<string, number>();
  for (const line of lines) {
    tally.set(key(line), (tally.get(key(line)) ?? 0) + line.quantity);
  }
  return [...tally.entries()]
    .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
    .slice(0, limit)
    .map(([name]) => name);
}

/** Read-only views over the customers a shop has served. Owner and admin only. */
@Injectable()
export class CustomerInsightsService {
  constructor(
    private readonly store: Store,
    private readonly access: AccessControlService,
  ) {}

  list(actorId: string, shopId: string, query: ShopCustomersQueryDto): Promise<Paginated<ShopCustomerSummary>> {
    const page = query.toPageRequest();
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      const result = await tx.customers.listServedByShop(
        shopId,
        { search: query.search, tier: query.tier, sort: query.sort },
        page,
      );
      const balances = await tx.loyalty.balances(
        result.items.map((c) => c.user.id),
        new Date(),
      );
      return {
        items: result.items.map((c) => toSummary(c, balances)),
        total: result.total,
        page: query.page ?? 1,
        pageSize: page.take,
      };
    });
  }

  analytics(actorId: string, shopId: string, customerId: string): Promise<CustomerAnalytics> {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      const profile = await tx.customers.findProfile(customerId);
      const user = await tx.users.findById(customerId);
      if (!profile || !user || !(await tx.orders.customerHasOrderAt(customerId, shopId))) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Customer not found');
      }

      const now = new Date();
      const completed = await tx.orders.listByCustomerAtShop(customerId, shopId, { status: 'completed' });
      const lines = await tx.orders.listItemsOf(completed.map((o) => o.id));
      const totalSpentCents = completed.reduce((sum, o) => sum + o.totalCents, 0);
      const first = completed.at(0);
      const last = completed.at(-1);

      return {
        customerId,
        displayName: profile.preferredName ?? user.username,
        membershipTier: profile.membershipTier,
        loyaltyBalance: await tx.loyalty.balance(customerId, now),
        completedOrders: completed.length,
        totalSpentCents,
        averageOrderCents: completed.length ? Math.round(totalSpentCents / completed.length) : 0,
        firstOrderAt: first?.createdAt ?? null,
        lastOrderAt: last?.createdAt ?? null,
        daysSinceLastOrder: last ? Math.floor((now.getTime() - last.createdAt.getTime()) / DAY_MS) : null,
        preferredServices: rankByQuantity(lines, (l) => l.serviceName, PREFERENCE_LIMIT),
        preferredItems: rankByQuantity(lines, (l) => l.itemName, PREFERENCE_LIMIT),
      };
    });
  }

  stats(actorId: string, shopId: string): Promise<ShopCustomerStats> {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      const now = new Date();
      const served = await tx.customers.allServedByShop(shopId);
      const balances = await tx.loyalty.balances(
        served.map((c) => c.user.id),
        now,
      );
      const summaries = served.map((c) => toSummary(c, balances));
      const since = (days: number) => now.getTime() - days * DAY_MS;
      const totalSpent = summaries.reduce((sum, c) => sum + c.totalSpentCents, 0);
      const byName = (a: ShopCustomerSummary, b: ShopCustomerSummary) => a.username.localeCompare(b.username);

      return {
        shopId,
        totalCustomers: served.length,
        tierDistribution: MEMBERSHIP_TIERS.map((tier) => ({
          tier,
          count: summaries.filter((c) => c.membershipTier === tier).length,
        })),
        newCustomers: served.filter((c) => c.profile.createdAt.getTime() >= since(NEW_CUSTOMER_WINDOW_DAYS)).length,
        activeCustomers: served.filter(
          (c) => c.profile.lastOrderAt !== null && c.profile.lastOrderAt.getTime() >= since(ACTIVE_CUSTOMER_WINDOW_DAYS),
        ).length,
        loyaltyPointsOutstanding: summaries.reduce((sum, c) => sum + c.loyaltyBalance, 0),
        averageCustomerValueCents: served.length ? Math.round(totalSpent / served.length) : 0,
        topSpenders: [...summaries]
          .sort((a, b) => b.totalSpentCents - a.totalSpentCents || byName(a, b))
          .slice(0, LEADERBOARD_LIMIT),
        mostLoyal: [...summaries]
          .sort((a, b) => b.loyaltyBalance - a.loyaltyBalance || byName(a, b))
          .slice(0, LEADERBOARD_LIMIT),
      };
    });
  }

  private async authorize(tx: StoreTransaction, actorId: string, shopId: string) {
    if (!(await tx.shops.findById(shopId))) {
      throw new DomainError(ErrorKind.NOT_FOUND, 'Shop not found');
    }
    const grant = await this.access.resolve(tx, actorId);
    this.access.require(grant, Capability.VIEW_SHOP_CUSTOMERS, shopId);
  }
}

function toSummary(customer: ServedCustomer, balances: Map<string, number>): ShopCustomerSummary {
  const { user, profile } = customer;
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    phone: user.phone,
    preferredName: profile.preferredName,
    membershipTier: profile.membershipTier,
    totalSpentCents: profile.totalSpentCents,
    totalSpent: formatCents(profile.totalSpentCents),
    totalOrders: profile.totalOrders,
    lastOrderAt: profile.lastOrderAt,
    loyaltyBalance: balances.get(user.id) ?? 0,
  };
}
