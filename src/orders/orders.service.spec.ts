import { ConfigService } from '@nestjs/config';
import { AccessControlService } from '../access/access-control.service';
import { CatalogService } from '../catalog/catalog.service';
import { PaginationDto } from '../common/dto/pagination.dto';
import { CustomersService } from '../customers/customers.service';
import { LoyaltyService } from '../loyalty/loyalty.service';
import { NotificationListQueryDto } from '../notifications/dto';
import { NotificationsProcessor } from '../notifications/notifications.processor';
import { NotificationsService } from '../notifications/notifications.service';
import { SettingsService } from '../settings/settings.service';
import { ids, seedStore } from '../testing/fixtures';
import { CreateOrderDto, ShopOrdersQueryDto } from './dto/order.dto';
import { OrdersService } from './orders.service';

const NOW = new Date('2025-03-01T10:00:00Z');
const days = (n: number) => new Date(NOW.getTime() + n * 24 * 60 * 60 * 1000);

const orderDto = (overrides: Partial<CreateOrderDto> = {}): CreateOrderDto => ({
  shopId: ids.shop,
  items: [{ itemId: ids.shirt, serviceId: ids.dryClean, quantity: 2 }],
  pickupAt: days(1),
  deliveryAt: days(3),
  ...overrides,
});

describe('OrdersService', () => {
  beforeEach(() => {
    jest.useFakeTimers({ now: NOW, doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  const buildService = async (env: Record<string, unknown> = {}) => {
    const store = await seedStore();
    const config = new ConfigService({ LOYALTY_EARN_PERCENT: 100, BCRYPT_ROUNDS: 4, ...env });
    const settings = new SettingsService(config);
    const access = new AccessControlService();
    const notifications = new NotificationsService(store, new NotificationsProcessor(store));
    const loyalty = new LoyaltyService(store, settings, access);
    const customers = new CustomersService(store, access, settings, config);
    const service = new OrdersService(
      store,
      access,
      new CatalogService(store, access),
      loyalty,
      customers,
      settings,
      notifications,
    );
    return { store, service, notifications, loyalty, customers };
  };

  const walkTo = async (service: OrdersService, orderId: string, statuses: Array<'in_progress' | 'ready_for_pickup' | 'completed'>) => {
    for (const status of statuses) {
      await service.updateStatus(ids.staff, orderId, { status });
    }
  };

  describe('create', () => {
    it('numbers the order per shop and year and totals the snapshotted prices', async () => {
      const { service } = await buildService();

      const summary = await service.create(ids.customer, orderDto());

      expect(summary).toMatchObject({
        orderNumber: 'ORD-2025-0001',
        status: 'received',
        totalCents: 2500,
        total: '25.00',
      });
      const detail = await service.getDetail(ids.customer, summary.orderId);
      expect(detail.items).toHaveLength(1);
      expect(detail.items[0]).toMatchObject({
        itemName: 'ShirtA',
        serviceName: 'DryClean',
        servicePriceId: ids.shirtDryClean,
        quantity: 2,
        unitPriceCents: 1250,
        totalPriceCents: 2500,
      });
      expect(detail.history.map((h) => [h.fromStatus, h.toStatus])).toEqual([[null, 'received']]);
      expect(detail.customerId).toBe(ids.customer);
      expect(detail.createdBy).toBe(ids.customer);
    });

    it('keeps the snapshot when the catalog price changes later', async () => {
      const { store, service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());

      await store.transaction((tx) => tx.catalog.updatePrice(ids.shirtDryClean, { priceCents: 9999 }));

      const detail = await service.getDetail(ids.customer, orderId);
      expect(detail.items[0].unitPriceCents).toBe(1250);
      expect(detail.totalCents).toBe(2500);
    });

    it('hands out distinct gapless numbers to concurrent orders', async () => {
      const { service } = await buildService();

      const created = await Promise.all([
        service.create(ids.customer, orderDto()),
        service.create(ids.otherCustomer, orderDto()),
        service.create(ids.customer, orderDto()),
      ]);

      expect(created.map((o) => o.orderNumber).sort()).toEqual([
        'ORD-2025-0001',
        'ORD-2025-0002',
        'ORD-2025-0003',
      ]);
    });

    it('uses the configured number prefix', async () => {
      const { service } = await buildService({ ORDER_NUMBER_PREFIX: 'DC' });
      const summary = await service.create(ids.customer, orderDto());
      expect(summary.orderNumber).toBe('DC-2025-0001');
    });

    it('reports an unknown pair before a bad quantity', async () => {
      const { service } = await buildService();
      await expect(
        service.create(
          ids.customer,
          orderDto({
            items: [
              { itemId: ids.shirt, serviceId: ids.dryClean, quantity: 0 },
              { itemId: ids.suit, serviceId: ids.press, quantity: 1 },
            ],
          }),
        ),
      ).rejects.toMatchObject({ kind: 'PricingNotFound' });
    });

    it.each([0, -1, 1.5])('rejects quantity %p', async (quantity) => {
      const { service } = await buildService();
      await expect(
        service.create(ids.customer, orderDto({ items: [{ itemId: ids.shirt, serviceId: ids.dryClean, quantity }] })),
      ).rejects.toMatchObject({ kind: 'InvalidQuantity' });
    });

    it('accepts the configured maximum quantity and refuses one more', async () => {
      const { service } = await buildService({ ORDER_MAX_ITEM_QUANTITY: 1000 });
      const line = (quantity: number) => orderDto({ items: [{ itemId: ids.shirt, serviceId: ids.dryClean, quantity }] });

      const summary = await service.create(ids.customer, line(1000));
      expect(summary.totalCents).toBe(1_250_000);

      await expect(service.create(ids.customer, line(1001))).rejects.toMatchObject({
        kind: 'InvalidQuantity',
        fieldErrors: { quantity: ['1001 exceeds the limit of 1000'] },
      });
    });

    it('applies the quantity limit when items are added later', async () => {
      const { service } = await buildService({ ORDER_MAX_ITEM_QUANTITY: 5 });
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(
        service.addItem(ids.staff, orderId, { itemId: ids.suit, serviceId: ids.dryClean, quantity: 6 }),
      ).rejects.toMatchObject({ kind: 'InvalidQuantity' });
    });

    it('rejects an order without items', async () => {
      const { service } = await buildService();
      await expect(service.create(ids.customer, orderDto({ items: [] }))).rejects.toMatchObject({
        kind: 'EmptyOrder',
      });
    });

    it('rejects a pickup after the delivery', async () => {
      const { service } = await buildService();
      await expect(
        service.create(ids.customer, orderDto({ pickupAt: days(4), deliveryAt: days(2) })),
      ).rejects.toMatchObject({ kind: 'InvalidSchedule' });
    });

    it('rejects a pickup in the past', async () => {
      const { service } = await buildService();
      await expect(service.create(ids.customer, orderDto({ pickupAt: days(-1) }))).rejects.toMatchObject({
        kind: 'InvalidSchedule',
      });
    });

    it('accepts pickup and delivery at the same instant', async () => {
      const { service } = await buildService();
      const summary = await service.create(ids.customer, orderDto({ pickupAt: days(2), deliveryAt: days(2) }));
      expect(summary.status).toBe('received');
    });

    it('leaves no trace when creation fails', async () => {
      const { service } = await buildService();
      await expect(service.create(ids.customer, orderDto({ pickupAt: days(-1) }))).rejects.toMatchObject({
        kind: 'InvalidSchedule',
      });

      const page = await service.listMine(ids.customer, new PaginationDto());
      expect(page.total).toBe(0);
      const summary = await service.create(ids.customer, orderDto());
      expect(summary.orderNumber).toBe('ORD-2025-0001');
    });

    it('lets staff take an order on behalf of a customer', async () => {
      const { service } = await buildService();
      const summary = await service.create(ids.clerk, orderDto({ customerId: ids.customer }));

      const detail = await service.getDetail(ids.customer, summary.orderId);
      expect(detail.customerId).toBe(ids.customer);
      expect(detail.createdBy).toBe(ids.clerk);
    });

    it('does not let staff place orders for themselves', async () => {
      const { service } = await buildService();
      await expect(service.create(ids.staff, orderDto())).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('does not let a customer order for someone else', async () => {
      const { service } = await buildService();
      await expect(
        service.create(ids.customer, orderDto({ customerId: ids.otherCustomer })),
      ).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('does not let another shop take orders here', async () => {
      const { service } = await buildService();
      await expect(
        service.create(ids.otherOwner, orderDto({ customerId: ids.customer })),
      ).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('reports an unknown customer as not found', async () => {
      const { service } = await buildService();
      await expect(service.create(ids.staff, orderDto({ customerId: 'user-missing' }))).rejects.toMatchObject({
        kind: 'NotFound',
      });
    });

    it('rejects an inactive shop', async () => {
      const { store, service } = await buildService();
      await store.transaction((tx) => tx.shops.update(ids.shop, { isActive: false }));
      await expect(service.create(ids.customer, orderDto())).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('dispatches an order_created notification after commit', async () => {
      const { service, notifications } = await buildService();
      const dispatch = jest.spyOn(notifications, 'dispatch');

      const summary = await service.create(ids.customer, orderDto());

      expect(dispatch).toHaveBeenCalledTimes(1);
      expect(dispatch).toHaveBeenCalledWith({
        type: 'order_created',
        recipientId: ids.customer,
        shopId: ids.shop,
        orderId: summary.orderId,
        orderNumber: 'ORD-2025-0001',
        oldStatus: null,
        newStatus: 'received',
        timestamp: NOW.toISOString(),
        data: undefined,
      });
    });
  });

  describe('updateStatus', () => {
    it('accrues loyalty and updates the profile on completion', async () => {
      const { service, loyalty, customers } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());

      await walkTo(service, orderId, ['in_progress', 'ready_for_pickup']);
      const result = await service.updateStatus(ids.staff, orderId, { status: 'completed', note: 'collected' });

      expect(result).toEqual({
        orderId,
        orderNumber: 'ORD-2025-0001',
        status: 'completed',
        loyaltyPointsEarned: 25,
      });
      const summary = await loyalty.getSummary(ids.customer, ids.customer);
      expect(summary.balance).toBe(25);
      expect(summary.recent[0]).toMatchObject({ type: 'earned', points: 25, orderId, expiresAt: days(365) });

      const profile = await customers.getProfile(ids.customer, ids.customer);
      expect(profile.profile).toMatchObject({ totalSpentCents: 2500, totalOrders: 1, lastOrderAt: NOW });

      const detail = await service.getDetail(ids.customer, orderId);
      expect(detail.completedAt).toEqual(NOW);
      expect(detail.version).toBe(4);
      expect(detail.history.map((h) => h.toStatus)).toEqual(['received', 'in_progress', 'ready_for_pickup', 'completed']);
      expect(detail.history[3].note).toBe('collected');
    });

    it.each([
      ['loyalty accrual', 'loyalty'],
      ['the profile update', 'customers'],
    ] as const)('rolls the whole completion back when %s fails', async (_label, failing) => {
      const { service, loyalty, customers } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await walkTo(service, orderId, ['in_progress', 'ready_for_pickup']);
      if (failing === 'loyalty') {
        jest.spyOn(loyalty, 'accrueForOrder').mockRejectedValueOnce(new Error('ledger write failed'));
      } else {
        jest.spyOn(customers, 'recordCompletedOrder').mockRejectedValueOnce(new Error('profile write failed'));
      }

      await expect(service.updateStatus(ids.staff, orderId, { status: 'completed' })).rejects.toThrow(/write failed/);

      const detail = await service.getDetail(ids.customer, orderId);
      expect(detail.status).toBe('ready_for_pickup');
      expect(detail.completedAt).toBeNull();
      expect(detail.history).toHaveLength(3);
      const summary = await loyalty.getSummary(ids.customer, ids.customer);
      expect(summary.balance).toBe(0);
      expect(summary.recent).toEqual([]);
      const profile = await customers.getProfile(ids.customer, ids.customer);
      expect(profile.profile).toMatchObject({ totalSpentCents: 0, totalOrders: 0, lastOrderAt: null });
    });

    it('does not reopen a completed order', async () => {
      const { service, loyalty } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await walkTo(service, orderId, ['in_progress', 'ready_for_pickup', 'completed']);

      await expect(service.updateStatus(ids.staff, orderId, { status: 'in_progress' })).rejects.toMatchObject({
        kind: 'InvalidTransition',
      });
      const summary = await loyalty.getSummary(ids.customer, ids.customer);
      expect(summary.balance).toBe(25);
    });

    it('does not skip steps', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(service.updateStatus(ids.staff, orderId, { status: 'completed' })).rejects.toMatchObject({
        kind: 'InvalidTransition',
      });
    });

    it('stamps the cancellation time', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());

      const result = await service.updateStatus(ids.owner, orderId, { status: 'cancelled' });

      expect(result).toMatchObject({ status: 'cancelled', loyaltyPointsEarned: 0 });
      const detail = await service.getDetail(ids.owner, orderId);
      expect(detail.cancelledAt).toEqual(NOW);
    });

    it('rejects staff without update rights and leaves the order untouched', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());

      await expect(service.updateStatus(ids.clerk, orderId, { status: 'in_progress' })).rejects.toMatchObject({
        kind: 'Forbidden',
      });
      const detail = await service.getDetail(ids.customer, orderId);
      expect(detail.status).toBe('received');
      expect(detail.history).toHaveLength(1);
    });

    it('rejects the owner of another shop', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(service.updateStatus(ids.otherOwner, orderId, { status: 'in_progress' })).rejects.toMatchObject({
        kind: 'Forbidden',
      });
    });

    it('reports a missing order as not found', async () => {
      const { service } = await buildService();
      await expect(service.updateStatus(ids.staff, 'order-missing', { status: 'in_progress' })).rejects.toMatchObject({
        kind: 'NotFound',
      });
    });

    it('notifies the customer of each change and of earned points', async () => {
      const { service, notifications } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await walkTo(service, orderId, ['in_progress', 'ready_for_pickup', 'completed']);

      const page = await notifications.list(ids.customer, new NotificationListQueryDto());

      expect(page.total).toBe(5);
      const earned = page.items.find((n) => n.type === 'loyalty_earned');
      expect(earned).toMatchObject({
        title: 'You earned 25 points',
        message: 'Order ORD-2025-0001 earned you 25 loyalty points.',
        orderId,
      });
    });

    it('skips the loyalty notification when nothing was earned', async () => {
      const { service, notifications } = await buildService({ LOYALTY_EARN_PERCENT: 0 });
      const { orderId } = await service.create(ids.customer, orderDto());
      await walkTo(service, orderId, ['in_progress', 'ready_for_pickup']);
      const dispatch = jest.spyOn(notifications, 'dispatch');

      const result = await service.updateStatus(ids.staff, orderId, { status: 'completed' });

      expect(result.loyaltyPointsEarned).toBe(0);
      expect(dispatch).toHaveBeenCalledTimes(1);
      expect(dispatch).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'order_status_changed', oldStatus: 'ready_for_pickup', newStatus: 'completed' }),
      );
    });
  });

  describe('line items', () => {
    it('adds an item and recomputes the total', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());

      const detail = await service.addItem(ids.clerk, orderId, { itemId: ids.suit, serviceId: ids.dryClean, quantity: 1 });

      expect(detail.totalCents).toBe(5500);
      expect(detail.total).toBe('55.00');
      expect(detail.items).toHaveLength(2);
      expect(detail.version).toBe(2);
    });

    it('rejects an unpriced pair on add', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(
        service.addItem(ids.staff, orderId, { itemId: ids.suit, serviceId: ids.press, quantity: 1 }),
      ).rejects.toMatchObject({ kind: 'PricingNotFound' });
    });

    it('does not let the customer edit items', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(
        service.addItem(ids.customer, orderId, { itemId: ids.suit, serviceId: ids.dryClean, quantity: 1 }),
      ).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('freezes items once the order is ready for pickup', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await walkTo(service, orderId, ['in_progress', 'ready_for_pickup']);
      await expect(
        service.addItem(ids.staff, orderId, { itemId: ids.suit, serviceId: ids.dryClean, quantity: 1 }),
      ).rejects.toMatchObject({ kind: 'InvalidTransition' });
    });

    it('refuses to remove the only item and keeps it', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      const [only] = (await service.getDetail(ids.customer, orderId)).items;

      await expect(service.removeItem(ids.staff, orderId, only.id)).rejects.toMatchObject({ kind: 'EmptyOrder' });

      const detail = await service.getDetail(ids.customer, orderId);
      expect(detail.items.map((i) => i.id)).toEqual([only.id]);
      expect(detail.totalCents).toBe(2500);
    });

    it('removes one of several items and recomputes the total', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(
        ids.customer,
        orderDto({
          items: [
            { itemId: ids.shirt, serviceId: ids.dryClean, quantity: 2 },
            { itemId: ids.shirt, serviceId: ids.press, quantity: 3 },
          ],
        }),
      );
      const before = await service.getDetail(ids.customer, orderId);
      expect(before.totalCents).toBe(3700);
      const press = before.items.find((i) => i.serviceId === ids.press);

      const detail = await service.removeItem(ids.staff, orderId, press?.id ?? 'missing');

      expect(detail.totalCents).toBe(2500);
      expect(detail.items).toHaveLength(1);
    });

    it('reports an unknown line as not found', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(service.removeItem(ids.staff, orderId, 'line-missing')).rejects.toMatchObject({
        kind: 'NotFound',
      });
    });
  });

  describe('reading', () => {
    it.each([
      ['the customer', ids.customer],
      ['staff of the shop', ids.clerk],
      ['the shop owner', ids.owner],
      ['an admin', ids.admin],
    ])('shows the detail to %s', async (_label, actorId) => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(service.getDetail(actorId, orderId)).resolves.toMatchObject({ id: orderId });
    });

    it.each([
      ['another customer', ids.otherCustomer],
      ['another shop owner', ids.otherOwner],
    ])('hides the detail from %s', async (_label, actorId) => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(service.getDetail(actorId, orderId)).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('lists only the caller orders', async () => {
      const { service } = await buildService();
      await service.create(ids.customer, orderDto());
      await service.create(ids.otherCustomer, orderDto());

      const page = await service.listMine(ids.customer, new PaginationDto());

      expect(page).toMatchObject({ total: 1, page: 1, pageSize: 20 });
      expect(page.items[0].orderNumber).toBe('ORD-2025-0001');
    });

    it('filters shop orders by status', async () => {
      const { service } = await buildService();
      const first = await service.create(ids.customer, orderDto());
      await service.create(ids.otherCustomer, orderDto());
      await service.updateStatus(ids.staff, first.orderId, { status: 'in_progress' });

      const query = Object.assign(new ShopOrdersQueryDto(), { status: 'in_progress' as const });
      const page = await service.listForShop(ids.clerk, ids.shop, query);

      expect(page.total).toBe(1);
      expect(page.items[0].orderId).toBe(first.orderId);
    });

    it('keeps shop orders from other shops', async () => {
      const { service } = await buildService();
      await expect(
        service.listForShop(ids.otherOwner, ids.shop, new ShopOrdersQueryDto()),
      ).rejects.toMatchObject({ kind: 'Forbidden' });
    });
  });

  describe('deleteOrder', () => {
    it('removes the order for an admin', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());

      await expect(service.deleteOrder(ids.admin, orderId)).resolves.toEqual({ orderId, deleted: true });
      await expect(service.getDetail(ids.admin, orderId)).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('is reserved to admins', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await expect(service.deleteOrder(ids.owner, orderId)).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('keeps completed orders', async () => {
      const { service } = await buildService();
      const { orderId } = await service.create(ids.customer, orderDto());
      await walkTo(service, orderId, ['in_progress', 'ready_for_pickup', 'completed']);
      await expect(service.deleteOrder(ids.admin, orderId)).rejects.toMatchObject({ kind: 'InvalidTransition' });
    });
  });
});
