import { AccessControlService } from '../access/access-control.service';
import { MemoryStore } from '../database/memory/memory-store';
import {
  ids,
  seedOrder,
  seedStore,
  shirtDryCleanLine,
  shirtPressLine,
  suitDryCleanLine,
} from '../testing/fixtures';
import { CustomerInsightsService, rankByQuantity } from './customer-insights.service';
import { ShopCustomersQueryDto } from './dto/customer.dto';

const NOW = new Date('2025-03-01T10:00:00Z');
const days = (n: number) => new Date(NOW.getTime() + n * 24 * 60 * 60 * 1000);
const CAROL = 'user-carol';

const query = (fields: Partial<ShopCustomersQueryDto> = {}) => Object.assign(new ShopCustomersQueryDto(), fields);

describe('CustomerInsightsService', () => {
  beforeEach(() => {
    jest.useFakeTimers({ now: NOW, doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  /**
   * alice: silver, recent, 150 points. bob: bronze, lapsed, only expired points.
   * carol: gold, joined two months ago, 40 points. All three ordered at the main shop.
   */
  const buildService = async () => {
    const store = await seedStore();
    await store.transaction(async (tx) => {
      await tx.users.insert({ id: CAROL, username: 'carol', phone: '+15550000008', role: 'customer', passwordHash: 'hash' });
      await tx.customers.insertProfile({ userId: CAROL, createdAt: days(-60) });
      await tx.customers.updateProfile(ids.customer, {
        totalSpentCents: 25_000,
        membershipTier: 'silver',
        lastOrderAt: days(-5),
      });
      await tx.customers.updateProfile(ids.otherCustomer, { totalSpentCents: 1_000, lastOrderAt: days(-120) });
      await tx.customers.updateProfile(CAROL, {
        totalSpentCents: 60_000,
        membershipTier: 'gold',
        lastOrderAt: days(-30),
      });
      const lot = (customerId: string, points: number, expiresAt: Date | null) =>
        tx.loyalty.insert({ customerId, type: 'earned', points, description: 'seed', expiresAt });
      await lot(ids.customer, 150, null);
      await lot(ids.otherCustomer, 500, days(-1));
      await lot(CAROL, 40, null);
    });
    await seedOrder(store, {
      id: 'o-1',
      customerId: ids.customer,
      status: 'completed',
      createdAt: days(-20),
      lines: [shirtDryCleanLine(2), shirtPressLine(3)],
    });
    await seedOrder(store, {
      id: 'o-2',
      customerId: ids.customer,
      status: 'completed',
      createdAt: days(-5),
      lines: [suitDryCleanLine(1)],
    });
    await seedOrder(store, {
      id: 'o-3',
      customerId: ids.customer,
      createdAt: days(-1),
      lines: [suitDryCleanLine(5)],
    });
    await seedOrder(store, { id: 'o-4', customerId: ids.otherCustomer, createdAt: days(-2) });
    await seedOrder(store, { id: 'o-5', customerId: CAROL, createdAt: days(-30) });
    return { store, service: new CustomerInsightsService(store, new AccessControlService()) };
  };

  describe('list', () => {
    it('lists served customers by most recent order with their balances', async () => {
      const { service } = await buildService();
      const result = await service.list(ids.owner, ids.shop, query());
      expect(result.total).toBe(3);
      expect(result.items.map((c) => [c.username, c.loyaltyBalance])).toEqual([
        ['alice', 150],
        ['carol', 40],
        ['bob', 0],
      ]);
      expect(result.items[0]).toMatchObject({ membershipTier: 'silver', totalSpent: '250.00' });
    });

    it('searches across name and phone', async () => {
      const { service } = await buildService();
      const byName = await service.list(ids.owner, ids.shop, query({ search: 'CAR' }));
      expect(byName.items.map((c) => c.id)).toEqual([CAROL]);
      const byPhone = await service.list(ids.owner, ids.shop, query({ search: '0007' }));
      expect(byPhone.items.map((c) => c.id)).toEqual([ids.otherCustomer]);
    });

    it('filters by tier and sorts by name', async () => {
      const { service } = await buildService();
      const gold = await service.list(ids.owner, ids.shop, query({ tier: 'gold' }));
      expect(gold.items.map((c) => c.id)).toEqual([CAROL]);
      const byName = await service.list(ids.owner, ids.shop, query({ sort: 'name' }));
      expect(byName.items.map((c) => c.username)).toEqual(['alice', 'bob', 'carol']);
    });

    it('pages the result', async () => {
      const { service } = await buildService();
      const second = await service.list(ids.owner, ids.shop, query({ page: 2, pageSize: 2 }));
      expect(second).toMatchObject({ total: 3, page: 2, pageSize: 2 });
      expect(second.items.map((c) => c.username)).toEqual(['bob']);
    });

    it('leaves out customers who only used another shop', async () => {
      const { store, service } = await buildService();
      await seedOrder(store, { id: 'o-6', customerId: ids.customer, shopId: ids.otherShop });
      const result = await service.list(ids.otherOwner, ids.otherShop, query());
      expect(result.items.map((c) => c.id)).toEqual([ids.customer]);
    });

    it('is closed to staff and to owners of other shops', async () => {
      const { service } = await buildService();
      await expect(service.list(ids.staff, ids.shop, query())).rejects.toMatchObject({ kind: 'Forbidden' });
      await expect(service.list(ids.otherOwner, ids.shop, query())).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('reports an unknown shop as not found', async () => {
      const { service } = await buildService();
      await expect(service.list(ids.admin, 'shop-missing', query())).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });

  describe('analytics', () => {
    it('summarises completed orders at the shop', async () => {
      const { service } = await buildService();
      const analytics = await service.analytics(ids.owner, ids.shop, ids.customer);
      expect(analytics).toEqual({
        customerId: ids.customer,
        displayName: 'Alice',
        membershipTier: 'silver',
        loyaltyBalance: 150,
        completedOrders: 2,
        totalSpentCents: 6700,
        averageOrderCents: 3350,
        firstOrderAt: days(-20),
        lastOrderAt: days(-5),
        daysSinceLastOrder: 5,
        preferredServices: ['DryClean', 'Press'],
        preferredItems: ['ShirtA', 'Suit'],
      });
    });

    it('reports empty figures for a customer without completed orders', async () => {
      const { service } = await buildService();
      const analytics = await service.analytics(ids.admin, ids.shop, CAROL);
      expect(analytics).toMatchObject({
        displayName: 'carol',
        completedOrders: 0,
        totalSpentCents: 0,
        averageOrderCents: 0,
        lastOrderAt: null,
        daysSinceLastOrder: null,
        preferredServices: [],
      });
    });

    it('treats a customer the shop never served as not found', async () => {
      const { service } = await buildService();
      await expect(service.analytics(ids.otherOwner, ids.otherShop, ids.customer)).rejects.toMatchObject({
        kind: 'NotFound',
      });
    });
  });

  describe('stats', () => {
    it('aggregates tiers, activity, loyalty and leaderboards', async () => {
      const { service } = await buildService();
      const stats = await service.stats(ids.owner, ids.shop);
      expect(stats).toMatchObject({
        shopId: ids.shop,
        totalCustomers: 3,
        tierDistribution: [
          { tier: 'bronze', count: 1 },
          { tier: 'silver', count: 1 },
          { tier: 'gold', count: 1 },
          { tier: 'platinum', count: 0 },
        ],
        newCustomers: 2,
        activeCustomers: 2,
        loyaltyPointsOutstanding: 190,
        averageCustomerValueCents: 28_667,
      });
      expect(stats.topSpenders.map((c) => c.username)).toEqual(['carol', 'alice', 'bob']);
      expect(stats.mostLoyal.map((c) => c.username)).toEqual(['alice', 'carol', 'bob']);
    });

    it('returns zeros for a shop without customers', async () => {
      const store = await seedStore(new MemoryStore());
      const service = new CustomerInsightsService(store, new AccessControlService());
      const stats = await service.stats(ids.otherOwner, ids.otherShop);
      expect(stats).toMatchObject({
        totalCustomers: 0,
        loyaltyPointsOutstanding: 0,
        averageCustomerValueCents: 0,
        topSpenders: [],
        mostLoyal: [],
      });
    });
  });
});

describe('rankByQuantity', () => {
  it('ranks by summed quantity and caps the list', () => {
    const line = (serviceName: string, quantity: number) => ({
      id: serviceName,
      orderId: 'o',
      servicePriceId: 'p',
      itemId: 'i',
      serviceId: 's',
      itemName: 'ShirtA',
      serviceName,
      quantity,
      unitPriceCents: 100,
      totalPriceCents: 100 * quantity,
      notes: null,
      createdAt: NOW,
    });
    const ranked = rankByQuantity([line('Press', 1), line('Wash', 4), line('Press', 2), line('Fold', 3)], (l) => l.serviceName, 2);
    expect(ranked).toEqual(['Wash', 'Fold']);
  });
});
