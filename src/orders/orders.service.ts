import { Injectable, Logger } from '@nestjs/common';
import { AccessControlService } from '../access/access-control.service';
import { Capability } from '../access/capabilities';
import { CatalogService, priceKey } from '../catalog/catalog.service';
import { Paginated, PaginationDto } from '../common/dto/pagination.dto';
import { DomainError, ErrorKind } from '../common/errors';
import { formatCents } from '../common/utils/money.util';
import { CustomersService } from '../customers/customers.service';
import { Order, OrderItem, OrderStatus, OrderStatusHistory } from '../database/schema';
import { Store, StoreTransaction } from '../database/store';
import { LoyaltyService } from '../loyalty/loyalty.service';
import { NotificationsService } from '../notifications/notifications.service';
import { NotificationEvent } from '../notifications/notifications.types';
import { SettingsService } from '../settings/settings.service';
import { CreateOrderDto, OrderLineDto, ShopOrdersQueryDto, UpdateOrderStatusDto } from './dto/order.dto';
import { formatOrderNumber } from './order-number';
import { assertEditable, assertTransition } from './order-status';

export interface OrderSummary {
  orderId: string;
  orderNumber: string;
  status: OrderStatus;
  totalCents: number;
  total: string;
}

export interface StatusChangeResult {
  orderId: string;
  orderNumber: string;
  status: OrderStatus;
  loyaltyPointsEarned: number;
}

export interface OrderDetail extends Order {
  total: string;
  items: OrderItem[];
  history: OrderStatusHistory[];
}

type PricedLine = Omit<OrderItem, 'id' | 'orderId' | 'createdAt'>;

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    private readonly store: Store,
    private readonly access: AccessControlService,
    private readonly catalog: CatalogService,
    private readonly loyalty: LoyaltyService,
    private readonly customers: CustomersService,
    private readonly settings: SettingsService,
    private readonly notifications: NotificationsService,
  ) {}

  /**
   * Places an order for the caller, or for `dto.customerId` when taken at
   * the counter. Prices are snapshotted; the number is drawn from the
   * shop's yearly counter inside the same transaction.
   */
  async create(actorId: string, dto: CreateOrderDto): Promise<OrderSummary> {
    const now = new Date();
    const order = await this.store.transaction(async (tx) => {
      const grant = await this.access.resolve(tx, actorId);
      const shop = await tx.shops.findById(dto.shopId);
      if (!shop || !shop.isActive) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Shop not found');
      }

      const customerId = dto.customerId ?? actorId;
      if (customerId === actorId) {
        this.access.require(grant, Capability.PLACE_ORDERS);
      } else {
        this.access.require(grant, Capability.TAKE_ORDERS, shop.id);
        const customer = await tx.users.findById(customerId);
        if (!customer || customer.role !== 'customer' || !customer.isActive) {
          throw new DomainError(ErrorKind.NOT_FOUND, 'Customer not found');
        }
      }

      const lines = await this.priceLines(tx, shop.id, dto.items);
      if (lines.length === 0) {
        throw new DomainError(ErrorKind.EMPTY_ORDER, 'An order needs at least one item');
      }
      this.assertSchedule(dto.pickupAt, dto.deliveryAt, now);
      await this.customers.ensureProfile(tx, customerId);

      const year = now.getUTCFullYear();
      const sequence = await tx.orders.nextSequence(shop.id, year);
      const created = await tx.orders.insert({
        shopId: shop.id,
        customerId,
        orderNumber: formatOrderNumber(this.settings.getOrderPolicy().numberPrefix, year, sequence),
        status: 'received',
        priority: dto.priority ?? 'normal',
        pickupType: dto.pickupType ?? 'drop_off',
        pickupAddress: dto.pickupAddress ?? null,
        pickupAt: dto.pickupAt,
        deliveryAt: dto.deliveryAt,
        specialInstructions: dto.specialInstructions ?? null,
        totalCents: sumLines(lines),
        createdBy: actorId,
        createdAt: now,
        updatedAt: now,
      });
      await tx.orders.insertItems(lines.map((line) => ({ ...line, orderId: created.id, createdAt: now })));
      await tx.orders.insertHistory({
        orderId: created.id,
        fromStatus: null,
        toStatus: 'received',
        actorId,
        note: 'Order created',
        changedAt: now,
      });
      return created;
    });

    this.logger.log({
      msg: 'Order created',
      orderId: order.id,
      orderNumber: order.orderNumber,
      shopId: order.shopId,
      customerId: order.customerId,
      totalCents: order.totalCents,
      actorId,
    });
    this.notifications.dispatch(this.event(order, 'order_created', null, now));
    return this.summarize(order);
  }

  /** Moves an order along the workflow; completion accrues loyalty in the same transaction. */
  async updateStatus(actorId: string, orderId: string, dto: UpdateOrderStatusDto): Promise<StatusChangeResult> {
    const now = new Date();
    const { before, after } = await this.store.transaction(async (tx) => {
      const order = await this.lockOrder(tx, orderId);
      const grant = await this.access.resolve(tx, actorId);
      this.access.require(grant, Capability.UPDATE_ORDERS, order.shopId);
      assertTransition(order.status, dto.status);

      let loyaltyPointsEarned = order.loyaltyPointsEarned;
      if (dto.status === 'completed') {
        loyaltyPointsEarned = await this.loyalty.accrueForOrder(tx, order, actorId, now);
        await this.customers.recordCompletedOrder(tx, order, now);
      }
      const updated = await tx.orders.update(order.id, {
        status: dto.status,
        version: order.version + 1,
        loyaltyPointsEarned,
        completedAt: dto.status === 'completed' ? now : order.completedAt,
        cancelledAt: dto.status === 'cancelled' ? now : order.cancelledAt,
        updatedAt: now,
      });
      await tx.orders.insertHistory({
        orderId: order.id,
        fromStatus: order.status,
        toStatus: dto.status,
        actorId,
        note: dto.note ?? null,
        changedAt: now,
      });
      return { before: order, after: updated };
    });

    this.logger.log({
      msg: 'Order status changed',
      orderId,
      orderNumber: after.orderNumber,
      from: before.status,
      to: after.status,
      actorId,
    });
    this.notifications.dispatch(this.event(after, 'order_status_changed', before.status, now));
    if (after.status === 'completed' && after.loyaltyPointsEarned > 0) {
      this.notifications.dispatch(
        this.event(after, 'loyalty_earned', before.status, now, { points: after.loyaltyPointsEarned }),
      );
    }
    return {
      orderId: after.id,
      orderNumber: after.orderNumber,
      status: after.status,
      loyaltyPointsEarned: after.loyaltyPointsEarned,
    };
  }

  addItem(actorId: string, orderId: string, dto: OrderLineDto): Promise<OrderDetail> {
    return this.store.transaction(async (tx) => {
      const order = await this.lockForEditing(tx, actorId, orderId);
      const [line] = await this.priceLines(tx, order.shopId, [dto]);
      const now = new Date();
      await tx.orders.insertItems([{ ...line, orderId: order.id, createdAt: now }]);
      const updated = await this.recalculate(tx, order, now);
      this.logger.log({ msg: 'Order item added', orderId, itemId: line.itemId, serviceId: line.serviceId, actorId });
      return this.detailOf(tx, updated);
    });
  }

  removeItem(actorId: string, orderId: string, orderItemId: string): Promise<OrderDetail> {
    return this.store.transaction(async (tx) => {
      const order = await this.lockForEditing(tx, actorId, orderId);
      const items = await tx.orders.listItems(order.id);
      if (!items.some((item) => item.id === orderItemId)) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Order item not found');
      }
      if (items.length === 1) {
        throw new DomainError(ErrorKind.EMPTY_ORDER, 'Cannot remove the last item; cancel the order instead');
      }
      await tx.orders.deleteItem(orderItemId);
      const updated = await this.recalculate(tx, order, new Date());
      this.logger.log({ msg: 'Order item removed', orderId, orderItemId, actorId });
      return this.detailOf(tx, updated);
    });
  }

  /** Visible to the ordering customer, members of the shop and admins. */
  getDetail(actorId: string, orderId: string): Promise<OrderDetail> {
    return this.store.transaction(async (tx) => {
      const order = await tx.orders.findById(orderId);
      if (!order) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Order not found');
      }
      if (order.customerId !== actorId) {
        const grant = await this.access.resolve(tx, actorId);
        if (!this.access.isShopMember(grant, order.shopId)) {
          throw new DomainError(ErrorKind.FORBIDDEN, 'You are not allowed to view this order');
        }
      }
      return this.detailOf(tx, order);
    });
  }

  async listMine(actorId: string, query: PaginationDto): Promise<Paginated<OrderSummary>> {
    const page = query.toPageRequest();
    const result = await this.store.transaction((tx) => tx.orders.listByCustomer(actorId, page));
    return {
      items: result.items.map((order) => this.summarize(order)),
      total: result.total,
      page: query.page ?? 1,
      pageSize: page.take,
    };
  }

  async listForShop(actorId: string, shopId: string, query: ShopOrdersQueryDto): Promise<Paginated<OrderSummary>> {
    const page = query.toPageRequest();
    const result = await this.store.transaction(async (tx) => {
      const grant = await this.access.resolve(tx, actorId);
      this.access.require(grant, Capability.VIEW_SHOP_ORDERS, shopId);
      return tx.orders.listByShop(shopId, { status: query.status }, page);
    });
    return {
      items: result.items.map((order) => this.summarize(order)),
      total: result.total,
      page: query.page ?? 1,
      pageSize: page.take,
    };
  }

  /**
   * Removes an order with its items and history. Loyalty entries stay on
   * the ledger, unlinked, so a customer's balance never moves here.
   */
  async deleteOrder(actorId: string, orderId: string): Promise<{ orderId: string; deleted: true }> {
    await this.store.transaction(async (tx) => {
      const grant = await this.access.resolve(tx, actorId);
      this.access.require(grant, Capability.DELETE_ORDERS);
      const order = await this.lockOrder(tx, orderId);
      if (order.status === 'completed') {
        throw new DomainError(ErrorKind.INVALID_TRANSITION, 'Completed orders cannot be deleted');
      }
      await tx.loyalty.detachOrder(order.id);
      await tx.orders.deleteItemsOf(order.id);
      await tx.orders.deleteHistoryOf(order.id);
      await tx.orders.delete(order.id);
    });
    this.logger.warn({ msg: 'Order deleted', orderId, actorId });
    return { orderId, deleted: true };
  }

  /**
   * Checks every pair against the shop's active prices before looking at
   * quantities, so an unknown pair is reported ahead of a bad quantity.
   */
  private async priceLines(tx: StoreTransaction, shopId: string, lines: OrderLineDto[]): Promise<PricedLine[]> {
    const prices = await this.catalog.resolvePrices(
      tx,
      shopId,
      lines.map(({ itemId, serviceId }) => ({ itemId, serviceId })),
    );
    const priced = lines.map((line) => {
      const match = prices.get(priceKey(line.itemId, line.serviceId));
      if (!match) {
        throw new DomainError(
          ErrorKind.PRICING_NOT_FOUND,
          `No active price for item ${line.itemId} with service ${line.serviceId}`,
        );
      }
      return { line, match };
    });

    const { maxItemQuantity } = this.settings.getOrderPolicy();
    return priced.map(({ line, match }) => {
      if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
        throw new DomainError(ErrorKind.INVALID_QUANTITY, 'Quantity must be a positive whole number', {
          quantity: [`${line.quantity} is not a positive integer`],
        });
      }
      if (line.quantity > maxItemQuantity) {
        throw new DomainError(ErrorKind.INVALID_QUANTITY, `Quantity must not exceed ${maxItemQuantity}`, {
          quantity: [`${line.quantity} exceeds the limit of ${maxItemQuantity}`],
        });
      }
      return {
        servicePriceId: match.price.id,
        itemId: line.itemId,
        serviceId: line.serviceId,
        itemName: match.itemName,
        serviceName: match.serviceName,
        quantity: line.quantity,
        unitPriceCents: match.price.priceCents,
        totalPriceCents: match.price.priceCents * line.quantity,
        notes: line.notes ?? null,
      };
    });
  }

  private assertSchedule(pickupAt: Date, deliveryAt: Date, now: Date) {
    const pickup = pickupAt.getTime();
    const delivery = deliveryAt.getTime();
    if (Number.isNaN(pickup) || Number.isNaN(delivery)) {
      throw new DomainError(ErrorKind.INVALID_SCHEDULE, 'Pickup and delivery times must be valid dates');
    }
    if (pickup <= now.getTime() || delivery <= now.getTime()) {
      throw new DomainError(ErrorKind.INVALID_SCHEDULE, 'Pickup and delivery must be in the future');
    }
    if (pickup > delivery) {
      throw new DomainError(ErrorKind.INVALID_SCHEDULE, 'Pickup must not be later than delivery');
    }
  }

  private async lockOrder(tx: StoreTransaction, orderId: string): Promise<Order> {
    const order = await tx.orders.lockById(orderId);
    if (!order) {
      throw new DomainError(ErrorKind.NOT_FOUND, 'Order not found');
    }
    return order;
  }

  private async lockForEditing(tx: StoreTransaction, actorId: string, orderId: string): Promise<Order> {
    const order = await this.lockOrder(tx, orderId);
    const grant = await this.access.resolve(tx, actorId);
    this.access.require(grant, Capability.TAKE_ORDERS, order.shopId);
    assertEditable(order.status);
    return order;
  }

  private async recalculate(tx: StoreTransaction, order: Order, at: Date): Promise<Order> {
    const items = await tx.orders.listItems(order.id);
    return tx.orders.update(order.id, {
      totalCents: sumLines(items),
      version: order.version + 1,
      updatedAt: at,
    });
  }

  private async detailOf(tx: StoreTransaction, order: Order): Promise<OrderDetail> {
    const [items, history] = await Promise.all([tx.orders.listItems(order.id), tx.orders.listHistory(order.id)]);
    return { ...order, total: formatCents(order.totalCents), items, history };
  }

  private summarize(order: Order): OrderSummary {
    return {
      orderId: order.id,
      orderNumber: order.orderNumber,
      status: order.status,
      totalCents: order.totalCents,
      total: formatCents(order.totalCents),
    };
  }

  private event(
    order: Order,
    type: NotificationEvent['type'],
    oldStatus: OrderStatus | null,
    at: Date,
    data?: NotificationEvent['data'],
  ): NotificationEvent {
    return {
      type,
      recipientId: order.customerId,
      shopId: order.shopId,
      orderId: order.id,
      orderNumber: order.orderNumber,
      oldStatus,
      newStatus: order.status,
      timestamp: at.toISOString(),
      data,
    };
  }
}

const sumLines = (lines: ReadonlyArray<Pick<OrderItem, 'totalPriceCents'>>) =>
  lines.reduce((sum, line) => sum + line.totalPriceCents, 0);
