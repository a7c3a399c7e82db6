import { randomUUID } from 'crypto';
import { DomainError, ErrorKind } from '../../common/errors';
import type {
  CustomerAddress,
  CustomerProfile,
  Item,
  LoyaltyEntry,
  Notification,
  Order,
  OrderItem,
  OrderStatusHistory,
  RefreshSession,
  Service,
  ServicePrice,
  Shop,
  ShopStaff,
  User,
} from '../schema';
import {
  AddressRepository,
  CatalogRepository,
  CustomerRepository,
  LoyaltyRepository,
  NotificationRepository,
  OrderRepository,
  PageRequest,
  PageResult,
  PricedPair,
  RefreshSessionRepository,
  ServedCustomer,
  ServedCustomerFilter,
  ShopRepository,
  StaffRepository,
  Store,
  StoreTransaction,
  TransactionWork,
  UserRepository,
} from '../store';

interface OrderCounter {
  shopId: string;
  year: number;
  lastNumber: number;
}

export interface MemoryTables {
  users: User[];
  refreshSessions: RefreshSession[];
  shops: Shop[];
  shopStaff: ShopStaff[];
  services: Service[];
  items: Item[];
  servicePrices: ServicePrice[];
  customerProfiles: CustomerProfile[];
  customerAddresses: CustomerAddress[];
  orders: Order[];
  orderItems: OrderItem[];
  orderStatusHistory: OrderStatusHistory[];
  orderCounters: OrderCounter[];
  loyaltyEntries: LoyaltyEntry[];
  notifications: Notification[];
}

export const emptyTables = (): MemoryTables => ({
  users: [],
  refreshSessions: [],
  shops: [],
  shopStaff: [],
  services: [],
  items: [],
  servicePrices: [],
  customerProfiles: [],
  customerAddresses: [],
  orders: [],
  orderItems: [],
  orderStatusHistory: [],
  orderCounters: [],
  loyaltyEntries: [],
  notifications: [],
});

function unique<T>(rows: T[], candidate: T, same: (a: T, b: T) => boolean, constraint: string) {
  if (rows.some((row) => same(row, candidate))) {
    throw new DomainError(ErrorKind.CONFLICT, `Duplicate value violates ${constraint}`);
  }
}

function patchRow<T extends object, P extends Partial<T>>(
  rows: T[],
  match: (row: T) => boolean,
  patch: P,
  table: string,
): T {
  const index = rows.findIndex(match);
  if (index < 0) {
    throw new DomainError(ErrorKind.NOT_FOUND, `${table} row not found`);
  }
  const next: T = { ...rows[index], ...stripUndefined(patch) };
  rows[index] = next;
  return detached(next);
}

function stripUndefined<P>(patch: P): Partial<P> {
  const clean: Partial<P> = {};
  for (const key in patch) {
    if (patch[key] !== undefined) clean[key] = patch[key];
  }
  return clean;
}

function page<T>(rows: T[], request: PageRequest): PageResult<T> {
  return { items: rows.slice(request.skip, request.skip + request.take), total: rows.length };
}

/** Rows leave the store as copies, the way a database hands out fresh objects. */
const detached = <T>(value: T): T => structuredClone(value);

const byCreatedDesc = (a: { createdAt: Date }, b: { createdAt: Date }) =>
  b.createdAt.getTime() - a.createdAt.getTime();

function usersRepository(t: MemoryTables): UserRepository {
  return {
    async findById(id) {
      return detached(t.users.find((u) => u.id === id));
    },
    async findByIdentifier(identifier) {
      const email = identifier.toLowerCase();
      return detached(t.users.find((u) => u.username === identifier || u.phone === identifier || u.email === email));
    },
    async findConflicting(input) {
      const conflicting = t.users.find(
        (u) =>
          u.username === input.username ||
          u.phone === input.phone ||
          (!!input.email && u.email === input.email),
      );
      return detached(conflicting);
    },
    async insert(values) {
      const now = new Date();
      const row: User = {
        id: values.id ?? randomUUID(),
        username: values.username,
        email: values.email ?? null,
        phone: values.phone,
        role: values.role ?? 'customer',
        passwordHash: values.passwordHash,
        isActive: values.isActive ?? true,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      unique(t.users, row, (a, b) => a.username === b.username, 'uq_users_username');
      unique(t.users, row, (a, b) => a.phone === b.phone, 'uq_users_phone');
      unique(t.users, row, (a, b) => a.email !== null && a.email === b.email, 'uq_users_email');
      t.users.push(row);
      return detached(row);
    },
    async update(id, patch) {
      return patchRow(t.users, (u) => u.id === id, patch, 'users');
    },
  };
}

function refreshSessionsRepository(t: MemoryTables): RefreshSessionRepository {
  return {
    async insert(values) {
      const row: RefreshSession = {
        jti: values.jti,
        userId: values.userId,
        expiresAt: values.expiresAt,
        revokedAt: values.revokedAt ?? null,
        createdAt: values.createdAt ?? new Date(),
      };
      t.refreshSessions.push(row);
      return detached(row);
    },
    async findByJti(jti) {
      return detached(t.refreshSessions.find((s) => s.jti === jti));
    },
    async revoke(jti, at) {
      const session = t.refreshSessions.find((s) => s.jti === jti);
      if (session && !session.revokedAt) session.revokedAt = at;
    },
  };
}

function shopsRepository(t: MemoryTables): ShopRepository {
  return {
    async findById(id) {
      return detached(t.shops.find((s) => s.id === id));
    },
    async findByOwner(ownerId) {
      return detached(t.shops.find((s) => s.ownerId === ownerId));
    },
    async list(filter) {
      return detached(t.shops.filter((s) => !filter.activeOnly || s.isActive).sort(byCreatedDesc));
    },
    async insert(values) {
      const now = new Date();
      const row: Shop = {
        id: values.id ?? randomUUID(),
        ownerId: values.ownerId,
        name: values.name,
        address: values.address,
        phone: values.phone,
        isActive: values.isActive ?? true,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      unique(t.shops, row, (a, b) => a.ownerId === b.ownerId, 'uq_shops_owner');
      t.shops.push(row);
      return detached(row);
    },
    async update(id, patch) {
      return patchRow(t.shops, (s) => s.id === id, patch, 'shops');
    },
  };
}

function staffRepository(t: MemoryTables): StaffRepository {
  return {
    async findById(id) {
      return detached(t.shopStaff.find((s) => s.id === id));
    },
    async findByUser(userId) {
      return detached(t.shopStaff.find((s) => s.userId === userId));
    },
    async listByShop(shopId) {
      return detached(t.shopStaff.filter((s) => s.shopId === shopId).sort(byCreatedDesc));
    },
    async insert(values) {
      const now = new Date();
      const row: ShopStaff = {
        id: values.id ?? randomUUID(),
        shopId: values.shopId,
        userId: values.userId,
        position: values.position,
        isActive: values.isActive ?? true,
        canTakeOrders: values.canTakeOrders ?? true,
        canUpdateOrders: values.canUpdateOrders ?? true,
        canRegisterCustomers: values.canRegisterCustomers ?? true,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      unique(t.shopStaff, row, (a, b) => a.userId === b.userId, 'uq_shop_staff_user');
      t.shopStaff.push(row);
      return detached(row);
    },
    async update(id, patch) {
      return patchRow(t.shopStaff, (s) => s.id === id, patch, 'shop_staff');
    },
  };
}

function catalogRepository(t: MemoryTables): CatalogRepository {
  const byName = (a: { name: string }, b: { name: string }) => a.name.localeCompare(b.name);
  return {
    async findService(id) {
      return detached(t.services.find((s) => s.id === id));
    },
    async findServiceByName(shopId, name) {
      return detached(t.services.find((s) => s.shopId === shopId && s.name === name));
    },
    async listServices(shopId, filter) {
      return detached(t.services.filter((s) => s.shopId === shopId && (!filter.activeOnly || s.isActive)).sort(byName));
    },
    async insertService(values) {
      const now = new Date();
      const row: Service = {
        id: values.id ?? randomUUID(),
        shopId: values.shopId,
        name: values.name,
        description: values.description ?? null,
        isActive: values.isActive ?? true,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      unique(t.services, row, (a, b) => a.shopId === b.shopId && a.name === b.name, 'uq_services_shop_name');
      t.services.push(row);
      return detached(row);
    },
    async updateService(id, patch) {
      return patchRow(t.services, (s) => s.id === id, patch, 'services');
    },

    async findItem(id) {
      return detached(t.items.find((i) => i.id === id));
    },
    async findItemByName(shopId, name) {
      return detached(t.items.find((i) => i.shopId === shopId && i.name === name));
    },
    async listItems(shopId, filter) {
      return detached(t.items.filter((i) => i.shopId === shopId && (!filter.activeOnly || i.isActive)).sort(byName));
    },
    async insertItem(values) {
      const now = new Date();
      const row: Item = {
        id: values.id ?? randomUUID(),
        shopId: values.shopId,
        name: values.name,
        description: values.description ?? null,
        isActive: values.isActive ?? true,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      unique(t.items, row, (a, b) => a.shopId === b.shopId && a.name === b.name, 'uq_items_shop_name');
      t.items.push(row);
      return detached(row);
    },
    async updateItem(id, patch) {
      return patchRow(t.items, (i) => i.id === id, patch, 'items');
    },

    async findPrice(id) {
      return detached(t.servicePrices.find((p) => p.id === id));
    },
    async findPriceByTriple(shopId, serviceId, itemId) {
      return detached(t.servicePrices.find((p) => p.shopId === shopId && p.serviceId === serviceId && p.itemId === itemId));
    },
    async listPrices(shopId, filter) {
      return detached(t.servicePrices.filter((p) => p.shopId === shopId && (!filter.activeOnly || p.isActive)));
    },
    async insertPrice(values) {
      const now = new Date();
      const row: ServicePrice = {
        id: values.id ?? randomUUID(),
        shopId: values.shopId,
        serviceId: values.serviceId,
        itemId: values.itemId,
        priceCents: values.priceCents,
        isActive: values.isActive ?? true,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      unique(
        t.servicePrices,
        row,
        (a, b) => a.shopId === b.shopId && a.serviceId === b.serviceId && a.itemId === b.itemId,
        'uq_service_prices_triple',
      );
      t.servicePrices.push(row);
      return detached(row);
    },
    async updatePrice(id, patch) {
      return patchRow(t.servicePrices, (p) => p.id === id, patch, 'service_prices');
    },
    async findActivePrices(shopId, pairs) {
      const result: PricedPair[] = [];
      for (const pair of pairs) {
        const price = t.servicePrices.find(
          (p) => p.shopId === shopId && p.itemId === pair.itemId && p.serviceId === pair.serviceId && p.isActive,
        );
        const item = t.items.find((i) => i.id === pair.itemId && i.isActive);
        const service = t.services.find((s) => s.id === pair.serviceId && s.isActive);
        if (price && item && service && !result.some((r) => r.price.id === price.id)) {
          result.push({ price, itemName: item.name, serviceName: service.name });
        }
      }
      return detached(result);
    },
  };
}

function servedBy(t: MemoryTables, shopId: string): ServedCustomer[] {
  const served: ServedCustomer[] = [];
  for (const profile of t.customerProfiles) {
    const user = t.users.find((u) => u.id === profile.userId);
    if (user && t.orders.some((o) => o.customerId === user.id && o.shopId === shopId)) {
      served.push({ user: { id: user.id, username: user.username, email: user.email, phone: user.phone }, profile });
    }
  }
  return served;
}

function matchesSearch(customer: ServedCustomer, search: string): boolean {
  const needle = search.toLowerCase();
  return [customer.user.username, customer.user.email, customer.user.phone, customer.profile.preferredName].some(
    (value) => value?.toLowerCase().includes(needle),
  );
}

function servedOrder(sort: ServedCustomerFilter['sort']) {
  const byName = (a: ServedCustomer, b: ServedCustomer) => a.user.username.localeCompare(b.user.username);
  switch (sort) {
    case 'name':
      return byName;
    case 'spent':
      return (a: ServedCustomer, b: ServedCustomer) =>
        b.profile.totalSpentCents - a.profile.totalSpentCents || byName(a, b);
    default:
      return (a: ServedCustomer, b: ServedCustomer) =>
        (b.profile.lastOrderAt?.getTime() ?? -Infinity) - (a.profile.lastOrderAt?.getTime() ?? -Infinity) ||
        byName(a, b);
  }
}

function customersRepository(t: MemoryTables): CustomerRepository {
  return {
    async findProfile(userId) {
      return detached(t.customerProfiles.find((p) => p.userId === userId));
    },
    async lockProfile(userId) {
      return detached(t.customerProfiles.find((p) => p.userId === userId));
    },
    async insertProfile(values) {
      const now = new Date();
      const row: CustomerProfile = {
        userId: values.userId,
        preferredName: values.preferredName ?? null,
        preferredCommunication: values.preferredCommunication ?? 'email',
        specialInstructions: values.specialInstructions ?? null,
        membershipTier: values.membershipTier ?? 'bronze',
        totalSpentCents: values.totalSpentCents ?? 0,
        totalOrders: values.totalOrders ?? 0,
        firstOrderAt: values.firstOrderAt ?? null,
        lastOrderAt: values.lastOrderAt ?? null,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      unique(t.customerProfiles, row, (a, b) => a.userId === b.userId, 'customer_profiles_pkey');
      t.customerProfiles.push(row);
      return detached(row);
    },
    async updateProfile(userId, patch) {
      return patchRow(t.customerProfiles, (p) => p.userId === userId, patch, 'customer_profiles');
    },
    async listServedByShop(shopId, filter, request) {
      const { search, tier } = filter;
      const rows = servedBy(t, shopId)
        .filter((c) => (!search || matchesSearch(c, search)) && (!tier || c.profile.membershipTier === tier))
        .sort(servedOrder(filter.sort));
      return detached(page(rows, request));
    },
    async allServedByShop(shopId) {
      return detached(servedBy(t, shopId));
    },
  };
}

function addressesRepository(t: MemoryTables): AddressRepository {
  return {
    async listActive(customerId) {
      const rows = t.customerAddresses
        .filter((a) => a.customerId === customerId && a.isActive)
        .sort((a, b) => Number(b.isDefault) - Number(a.isDefault) || a.label.localeCompare(b.label));
      return detached(rows);
    },
    async findById(id) {
      return detached(t.customerAddresses.find((a) => a.id === id));
    },
    async findActiveByLabel(customerId, label) {
      return detached(t.customerAddresses.find((a) => a.customerId === customerId && a.label === label && a.isActive));
    },
    async insert(values) {
      const now = new Date();
      const row: CustomerAddress = {
        id: values.id ?? randomUUID(),
        customerId: values.customerId,
        type: values.type ?? 'home',
        label: values.label,
        streetAddress: values.streetAddress,
        apartmentUnit: values.apartmentUnit ?? null,
        city: values.city,
        state: values.state,
        postalCode: values.postalCode,
        country: values.country ?? 'USA',
        pickupInstructions: values.pickupInstructions ?? null,
        isDefault: values.isDefault ?? false,
        isActive: values.isActive ?? true,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      unique(
        t.customerAddresses,
        row,
        (a, b) => a.isActive && b.isActive && a.customerId === b.customerId && a.label === b.label,
        'uq_customer_addresses_label',
      );
      t.customerAddresses.push(row);
      return detached(row);
    },
    async update(id, patch) {
      return patchRow(t.customerAddresses, (a) => a.id === id, patch, 'customer_addresses');
    },
    async clearDefault(customerId) {
      for (const address of t.customerAddresses) {
        if (address.customerId === customerId) address.isDefault = false;
      }
    },
  };
}

function ordersRepository(t: MemoryTables): OrderRepository {
  return {
    async nextSequence(shopId, year) {
      const counter = t.orderCounters.find((c) => c.shopId === shopId && c.year === year);
      if (counter) {
        counter.lastNumber += 1;
        return counter.lastNumber;
      }
      t.orderCounters.push({ shopId, year, lastNumber: 1 });
      return 1;
    },
    async insert(values) {
      const now = new Date();
      const row: Order = {
        id: values.id ?? randomUUID(),
        shopId: values.shopId,
        customerId: values.customerId,
        orderNumber: values.orderNumber,
        status: values.status ?? 'received',
        priority: values.priority ?? 'normal',
        pickupType: values.pickupType ?? 'drop_off',
        pickupAddress: values.pickupAddress ?? null,
        pickupAt: values.pickupAt,
        deliveryAt: values.deliveryAt,
        totalCents: values.totalCents ?? 0,
        specialInstructions: values.specialInstructions ?? null,
        loyaltyPointsEarned: values.loyaltyPointsEarned ?? 0,
        version: values.version ?? 1,
        createdBy: values.createdBy,
        completedAt: values.completedAt ?? null,
        cancelledAt: values.cancelledAt ?? null,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      if (t.orders.some((o) => o.shopId === row.shopId && o.orderNumber === row.orderNumber)) {
        throw new DomainError(ErrorKind.CONCURRENCY_CONFLICT, 'Order number already taken');
      }
      t.orders.push(row);
      return detached(row);
    },
    async findById(id) {
      return detached(t.orders.find((o) => o.id === id));
    },
    async lockById(id) {
      return detached(t.orders.find((o) => o.id === id));
    },
    async update(id, patch) {
      return patchRow(t.orders, (o) => o.id === id, patch, 'orders');
    },
    async listByCustomer(customerId, request) {
      return detached(page(t.orders.filter((o) => o.customerId === customerId).sort(byCreatedDesc), request));
    },
    async listByShop(shopId, filter, request) {
      const rows = t.orders
        .filter((o) => o.shopId === shopId && (!filter.status || o.status === filter.status))
        .sort(byCreatedDesc);
      return detached(page(rows, request));
    },
    async listByCustomerAtShop(customerId, shopId, filter) {
      const rows = t.orders
        .filter((o) => o.customerId === customerId && o.shopId === shopId && (!filter.status || o.status === filter.status))
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
      return detached(rows);
    },
    async customerHasOrderAt(customerId, shopId) {
      return t.orders.some((o) => o.customerId === customerId && o.shopId === shopId);
    },
    async countByShop(shopId, filter) {
      const { statuses, createdSince } = filter;
      return t.orders.filter(
        (o) =>
          o.shopId === shopId &&
          (!statuses || statuses.includes(o.status)) &&
          (!createdSince || o.createdAt >= createdSince),
      ).length;
    },
    async delete(id) {
      t.orders = t.orders.filter((o) => o.id !== id);
    },

    async insertItems(values) {
      const now = new Date();
      const rows = values.map(
        (value): OrderItem => ({
          id: value.id ?? randomUUID(),
          orderId: value.orderId,
          servicePriceId: value.servicePriceId,
          itemId: value.itemId,
          serviceId: value.serviceId,
          itemName: value.itemName,
          serviceName: value.serviceName,
          quantity: value.quantity,
          unitPriceCents: value.unitPriceCents,
          totalPriceCents: value.totalPriceCents,
          notes: value.notes ?? null,
          createdAt: value.createdAt ?? now,
        }),
      );
      t.orderItems.push(...rows);
      return detached(rows);
    },
    async listItems(orderId) {
      return detached(t.orderItems.filter((i) => i.orderId === orderId));
    },
    async listItemsOf(orderIds) {
      return detached(t.orderItems.filter((i) => orderIds.includes(i.orderId)));
    },
    async deleteItem(id) {
      t.orderItems = t.orderItems.filter((i) => i.id !== id);
    },
    async deleteItemsOf(orderId) {
      t.orderItems = t.orderItems.filter((i) => i.orderId !== orderId);
    },

    async insertHistory(values) {
      const row: OrderStatusHistory = {
        id: values.id ?? randomUUID(),
        orderId: values.orderId,
        fromStatus: values.fromStatus ?? null,
        toStatus: values.toStatus,
        actorId: values.actorId,
        note: values.note ?? null,
        changedAt: values.changedAt ?? new Date(),
      };
      t.orderStatusHistory.push(row);
      return detached(row);
    },
    async listHistory(orderId) {
      return detached(t.orderStatusHistory.filter((h) => h.orderId === orderId));
    },
    async deleteHistoryOf(orderId) {
      t.orderStatusHistory = t.orderStatusHistory.filter((h) => h.orderId !== orderId);
    },
  };
}

function loyaltyRepository(t: MemoryTables): LoyaltyRepository {
  return {
    async insert(values) {
      const row: LoyaltyEntry = {
        id: values.id ?? randomUUID(),
        customerId: values.customerId,
        type: values.type,
        points: values.points,
        description: values.description,
        orderId: values.orderId ?? null,
        consumesEntryId: values.consumesEntryId ?? null,
        expiresAt: values.expiresAt ?? null,
        processedBy: values.processedBy ?? null,
        createdAt: values.createdAt ?? new Date(),
      };
      t.loyaltyEntries.push(row);
      return detached(row);
    },
    async listByCustomer(customerId) {
      return detached(t.loyaltyEntries.filter((e) => e.customerId === customerId));
    },
    async recent(customerId, limit) {
      const newestFirst = t.loyaltyEntries.filter((e) => e.customerId === customerId).reverse().sort(byCreatedDesc);
      return detached(newestFirst.slice(0, limit));
    },
    async listPage(customerId, filter, request) {
      const rows = t.loyaltyEntries
        .filter((e) => e.customerId === customerId && (!filter.type || e.type === filter.type))
        .reverse()
        .sort(byCreatedDesc);
      return detached(page(rows, request));
    },
    async balance(customerId, at) {
      return t.loyaltyEntries
        .filter((e) => e.customerId === customerId && (!e.expiresAt || e.expiresAt > at))
        .reduce((sum, e) => sum + e.points, 0);
    },
    async balances(customerIds, at) {
      const totals = new Map<string, number>();
      for (const e of t.loyaltyEntries) {
        if (customerIds.includes(e.customerId) && (!e.expiresAt || e.expiresAt > at)) {
          totals.set(e.customerId, (totals.get(e.customerId) ?? 0) + e.points);
        }
      }
      return totals;
    },
    async detachOrder(orderId) {
      for (const entry of t.loyaltyEntries) {
        if (entry.orderId === orderId) entry.orderId = null;
      }
    },
  };
}

function notificationsRepository(t: MemoryTables): NotificationRepository {
  return {
    async insert(values) {
      const row: Notification = {
        id: values.id ?? randomUUID(),
        recipientId: values.recipientId,
        type: values.type,
        title: values.title,
        message: values.message,
        orderId: values.orderId ?? null,
        shopId: values.shopId ?? null,
        status: values.status ?? 'unread',
        data: values.data ?? {},
        readAt: values.readAt ?? null,
        createdAt: values.createdAt ?? new Date(),
      };
      t.notifications.push(row);
      return detached(row);
    },
    async findById(id) {
      return detached(t.notifications.find((n) => n.id === id));
    },
    async listByRecipient(recipientId, filter, request) {
      const rows = t.notifications
        .filter((n) => n.recipientId === recipientId && (!filter.status || n.status === filter.status))
        .sort(byCreatedDesc);
      return detached(page(rows, request));
    },
    async update(id, patch) {
      return patchRow(t.notifications, (n) => n.id === id, patch, 'notifications');
    },
  };
}

export function memoryTransaction(tables: MemoryTables): StoreTransaction {
  return {
    users: usersRepository(tables),
    refreshSessions: refreshSessionsRepository(tables),
    shops: shopsRepository(tables),
    staff: staffRepository(tables),
    catalog: catalogRepository(tables),
    customers: customersRepository(tables),
    addresses: addressesRepository(tables),
    orders: ordersRepository(tables),
    loyalty: loyaltyRepository(tables),
    notifications: notificationsRepository(tables),
  };
}

/**
 * In-process store. Transactions run one at a time against a copy of the
 * tables; the copy replaces the live tables only when the work resolves.
 */
export class MemoryStore extends Store {
  private tables: MemoryTables = emptyTables();
  private tail: Promise<unknown> = Promise.resolve();

  protected runTransaction<T>(work: TransactionWork<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const draft = structuredClone(this.tables);
      const result = await work(memoryTransaction(draft));
      this.tables = draft;
      return result;
    });
    // the chain only orders transactions; callers observe failures through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async ping() {
    return;
  }
}
