import { and, asc, count, desc, eq, gt, gte, ilike, inArray, isNull, or, SQL, sql } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import { DomainError, ErrorKind } from '../../common/errors';
import * as schema from '../schema';
import {
  customerAddresses,
  customerProfiles,
  items,
  loyaltyEntries,
  notifications,
  orderCounters,
  orderItems,
  orderStatusHistory,
  orders,
  refreshSessions,
  servicePrices,
  services,
  shopStaff,
  shops,
  users,
} from '../schema';
import type { ServedCustomerFilter, StoreTransaction } from '../store';

/** A drizzle database or an open transaction on it. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

function single<T>(rows: T[], table: string): T {
  const [row] = rows;
  if (!row) {
    throw new DomainError(ErrorKind.NOT_FOUND, `${table} row not found`);
  }
  return row;
}

const firstCount = (rows: Array<{ value: number }>) => rows[0]?.value ?? 0;

const likePattern = (search: string) => `%${search.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;

const servedColumns = {
  user: { id: users.id, username: users.username, email: users.email, phone: users.phone },
  profile: customerProfiles,
};

function servedOrderBy(sort: ServedCustomerFilter['sort']): SQL[] {
  switch (sort) {
    case 'name':
      return [asc(users.username)];
    case 'spent':
      return [desc(customerProfiles.totalSpentCents), asc(users.username)];
    default:
      return [sql`${customerProfiles.lastOrderAt} desc nulls last`, asc(users.username)];
  }
}

export function drizzleTransaction(db: Executor): StoreTransaction {
  return {
    users: {
      async findById(id) {
        const [row] = await db.select().from(users).where(eq(users.id, id)).limit(1);
        return row;
      },
      async findByIdentifier(identifier) {
        const [row] = await db
          .select()
          .from(users)
          .where(
            or(
              eq(users.username, identifier),
              eq(users.phone, identifier),
              eq(users.email, identifier.toLowerCase()),
            ),
          )
          .limit(1);
        return row;
      },
      async findConflicting(input) {
        const clauses = [eq(users.username, input.username), eq(users.phone, input.phone)];
        if (input.email) clauses.push(eq(users.email, input.email));
        const [row] = await db
          .select()
          .from(users)
          .where(or(...clauses))
          .limit(1);
        return row;
      },
      async insert(values) {
        return single(await db.insert(users).values(values).returning(), 'users');
      },
      async update(id, patch) {
        return single(await db.update(users).set(patch).where(eq(users.id, id)).returning(), 'users');
      },
    },

    refreshSessions: {
      async insert(values) {
        return single(await db.insert(refreshSessions).values(values).returning(), 'refresh_sessions');
      },
      async findByJti(jti) {
        const [row] = await db.select().from(refreshSessions).where(eq(refreshSessions.jti, jti)).limit(1);
        return row;
      },
      async revoke(jti, at) {
        await db
          .update(refreshSessions)
          .set({ revokedAt: at })
          .where(and(eq(refreshSessions.jti, jti), isNull(refreshSessions.revokedAt)));
      },
    },

    shops: {
      async findById(id) {
        const [row] = await db.select().from(shops).where(eq(shops.id, id)).limit(1);
        return row;
      },
      async findByOwner(ownerId) {
        const [row] = await db.select().from(shops).where(eq(shops.ownerId, ownerId)).limit(1);
        return row;
      },
      async list(filter) {
        return db
          .select()
          .from(shops)
          .where(filter.activeOnly ? eq(shops.isActive, true) : undefined)
          .orderBy(desc(shops.createdAt));
      },
      async insert(values) {
        return single(await db.insert(shops).values(values).returning(), 'shops');
      },
      async update(id, patch) {
        return single(await db.update(shops).set(patch).where(eq(shops.id, id)).returning(), 'shops');
      },
    },

    staff: {
      async findById(id) {
        const [row] = await db.select().from(shopStaff).where(eq(shopStaff.id, id)).limit(1);
        return row;
      },
      async findByUser(userId) {
        const [row] = await db.select().from(shopStaff).where(eq(shopStaff.userId, userId)).limit(1);
        return row;
      },
      async listByShop(shopId) {
        return db.select().from(shopStaff).where(eq(shopStaff.shopId, shopId)).orderBy(desc(shopStaff.createdAt));
      },
      async insert(values) {
        return single(await db.insert(shopStaff).values(values).returning(), 'shop_staff');
      },
      async update(id, patch) {
        return single(await db.update(shopStaff).set(patch).where(eq(shopStaff.id, id)).returning(), 'shop_staff');
      },
    },

    catalog: {
      async findService(id) {
        const [row] = await db.select().from(services).where(eq(services.id, id)).limit(1);
        return row;
      },
      async findServiceByName(shopId, name) {
        const [row] = await db
          .select()
          .from(services)
          .where(and(eq(services.shopId, shopId), eq(services.name, name)))
          .limit(1);
        return row;
      },
      async listServices(shopId, filter) {
        return db
          .select()
          .from(services)
          .where(and(eq(services.shopId, shopId), filter.activeOnly ? eq(services.isActive, true) : undefined))
          .orderBy(asc(services.name));
      },
      async insertService(values) {
        return single(await db.insert(services).values(values).returning(), 'services');
      },
      async updateService(id, patch) {
        return single(await db.update(services).set(patch).where(eq(services.id, id)).returning(), 'services');
      },

      async findItem(id) {
        const [row] = await db.select().from(items).where(eq(items.id, id)).limit(1);
        return row;
      },
      async findItemByName(shopId, name) {
        const [row] = await db
          .select()
          .from(items)
          .where(and(eq(items.shopId, shopId), eq(items.name, name)))
          .limit(1);
        return row;
      },
      async listItems(shopId, filter) {
        return db
          .select()
          .from(items)
          .where(and(eq(items.shopId, shopId), filter.activeOnly ? eq(items.isActive, true) : undefined))
          .orderBy(asc(items.name));
      },
      async insertItem(values) {
        return single(await db.insert(items).values(values).returning(), 'items');
      },
      async updateItem(id, patch) {
        return single(await db.update(items).set(patch).where(eq(items.id, id)).returning(), 'items');
      },

      async findPrice(id) {
        const [row] = await db.select().from(servicePrices).where(eq(servicePrices.id, id)).limit(1);
        return row;
      },
      async findPriceByTriple(shopId, serviceId, itemId) {
        const [row] = await db
          .select()
          .from(servicePrices)
          .where(
            and(
              eq(servicePrices.shopId, shopId),
              eq(servicePrices.serviceId, serviceId),
              eq(servicePrices.itemId, itemId),
            ),
          )
          .limit(1);
        return row;
      },
      async listPrices(shopId, filter) {
        return db
          .select()
          .from(servicePrices)
          .where(
            and(eq(servicePrices.shopId, shopId), filter.activeOnly ? eq(servicePrices.isActive, true) : undefined),
          );
      },
      async insertPrice(values) {
        return single(await db.insert(servicePrices).values(values).returning(), 'service_prices');
      },
      async updatePrice(id, patch) {
        return single(
          await db.update(servicePrices).set(patch).where(eq(servicePrices.id, id)).returning(),
          'service_prices',
        );
      },
      async findActivePrices(shopId, pairs) {
        if (!pairs.length) return [];
        const rows = await db
          .select({ price: servicePrices, itemName: items.name, serviceName: services.name })
          .from(servicePrices)
          .innerJoin(items, eq(items.id, servicePrices.itemId))
          .innerJoin(services, eq(services.id, servicePrices.serviceId))
          .where(
            and(
              eq(servicePrices.shopId, shopId),
              eq(servicePrices.isActive, true),
              eq(items.isActive, true),
              eq(services.isActive, true),
              inArray(
                servicePrices.itemId,
                pairs.map((p) => p.itemId),
              ),
              inArray(
                servicePrices.serviceId,
                pairs.map((p) => p.serviceId),
              ),
            ),
          );
        return rows.filter((row) =>
          pairs.some((p) => p.itemId === row.price.itemId && p.serviceId === row.price.serviceId),
        );
      },
    },

    customers: {
      async findProfile(userId) {
        const [row] = await db.select().from(customerProfiles).where(eq(customerProfiles.userId, userId)).limit(1);
        return row;
      },
      async lockProfile(userId) {
        const [row] = await db
          .select()
          .from(customerProfiles)
          .where(eq(customerProfiles.userId, userId))
          .for('update');
        return row;
      },
      async insertProfile(values) {
        return single(await db.insert(customerProfiles).values(values).returning(), 'customer_profiles');
      },
      async updateProfile(userId, patch) {
        return single(
          await db.update(customerProfiles).set(patch).where(eq(customerProfiles.userId, userId)).returning(),
          'customer_profiles',
        );
      },
      async listServedByShop(shopId, filter, page) {
        const pattern = filter.search ? likePattern(filter.search) : undefined;
        const where = and(
          inArray(users.id, db.select({ id: orders.customerId }).from(orders).where(eq(orders.shopId, shopId))),
          filter.tier ? eq(customerProfiles.membershipTier, filter.tier) : undefined,
          pattern
            ? or(
                ilike(users.username, pattern),
                ilike(users.email, pattern),
                ilike(users.phone, pattern),
                ilike(customerProfiles.preferredName, pattern),
              )
            : undefined,
        );
        const rows = await db
          .select(servedColumns)
          .from(customerProfiles)
          .innerJoin(users, eq(users.id, customerProfiles.userId))
          .where(where)
          .orderBy(...servedOrderBy(filter.sort))
          .offset(page.skip)
          .limit(page.take);
        const total = firstCount(
          await db
            .select({ value: count() })
            .from(customerProfiles)
            .innerJoin(users, eq(users.id, customerProfiles.userId))
            .where(where),
        );
        return { items: rows, total };
      },
      async allServedByShop(shopId) {
        return db
          .select(servedColumns)
          .from(customerProfiles)
          .innerJoin(users, eq(users.id, customerProfiles.userId))
          .where(inArray(users.id, db.select({ id: orders.customerId }).from(orders).where(eq(orders.shopId, shopId))));
      },
    },

    addresses: {
      async listActive(customerId) {
        return db
          .select()
          .from(customerAddresses)
          .where(and(eq(customerAddresses.customerId, customerId), eq(customerAddresses.isActive, true)))
          .orderBy(desc(customerAddresses.isDefault), asc(customerAddresses.label));
      },
      async findById(id) {
        const [row] = await db.select().from(customerAddresses).where(eq(customerAddresses.id, id)).limit(1);
        return row;
      },
      async findActiveByLabel(customerId, label) {
        const [row] = await db
          .select()
          .from(customerAddresses)
          .where(
            and(
              eq(customerAddresses.customerId, customerId),
              eq(customerAddresses.label, label),
              eq(customerAddresses.isActive, true),
            ),
          )
          .limit(1);
        return row;
      },
      async insert(values) {
        return single(await db.insert(customerAddresses).values(values).returning(), 'customer_addresses');
      },
      async update(id, patch) {
        return single(
          await db.update(customerAddresses).set(patch).where(eq(customerAddresses.id, id)).returning(),
          'customer_addresses',
        );
      },
      async clearDefault(customerId) {
        await db
          .update(customerAddresses)
          .set({ isDefault: false })
          .where(and(eq(customerAddresses.customerId, customerId), eq(customerAddresses.isDefault, true)));
      },
    },

    orders: {
      async nextSequence(shopId, year) {
        const rows = await db
          .insert(orderCounters)
          .values({ shopId, year, lastNumber: 1 })
          .onConflictDoUpdate({
            target: [orderCounters.shopId, orderCounters.year],
            set: { lastNumber: sql`${orderCounters.lastNumber} + 1` },
          })
          .returning({ lastNumber: orderCounters.lastNumber });
        return single(rows, 'order_counters').lastNumber;
      },
      async insert(values) {
        return single(await db.insert(orders).values(values).returning(), 'orders');
      },
      async findById(id) {
        const [row] = await db.select().from(orders).where(eq(orders.id, id)).limit(1);
        return row;
      },
      async lockById(id) {
        const [row] = await db.select().from(orders).where(eq(orders.id, id)).for('update');
        return row;
      },
      async update(id, patch) {
        return single(await db.update(orders).set(patch).where(eq(orders.id, id)).returning(), 'orders');
      },
      async listByCustomer(customerId, page) {
        const where = eq(orders.customerId, customerId);
        const rows = await db
          .select()
          .from(orders)
          .where(where)
          .orderBy(desc(orders.createdAt))
          .offset(page.skip)
          .limit(page.take);
        return { items: rows, total: firstCount(await db.select({ value: count() }).from(orders).where(where)) };
      },
      async listByShop(shopId, filter, page) {
        const where = and(eq(orders.shopId, shopId), filter.status ? eq(orders.status, filter.status) : undefined);
        const rows = await db
          .select()
          .from(orders)
          .where(where)
          .orderBy(desc(orders.createdAt))
          .offset(page.skip)
          .limit(page.take);
        return { items: rows, total: firstCount(await db.select({ value: count() }).from(orders).where(where)) };
      },
      async listByCustomerAtShop(customerId, shopId, filter) {
        return db
          .select()
          .from(orders)
          .where(
            and(
              eq(orders.customerId, customerId),
              eq(orders.shopId, shopId),
              filter.status ? eq(orders.status, filter.status) : undefined,
            ),
          )
          .orderBy(asc(orders.createdAt));
      },
      async customerHasOrderAt(customerId, shopId) {
        const [row] = await db
          .select({ id: orders.id })
          .from(orders)
          .where(and(eq(orders.customerId, customerId), eq(orders.shopId, shopId)))
          .limit(1);
        return row !== undefined;
      },
      async countByShop(shopId, filter) {
        const where = and(
          eq(orders.shopId, shopId),
          filter.statuses ? inArray(orders.status, filter.statuses) : undefined,
          filter.createdSince ? gte(orders.createdAt, filter.createdSince) : undefined,
        );
        return firstCount(await db.select({ value: count() }).from(orders).where(where));
      },
      async delete(id) {
        await db.delete(orders).where(eq(orders.id, id));
      },

      async insertItems(values) {
        if (!values.length) return [];
        return db.insert(orderItems).values(values).returning();
      },
      async listItems(orderId) {
        return db.select().from(orderItems).where(eq(orderItems.orderId, orderId)).orderBy(asc(orderItems.createdAt));
      },
      async listItemsOf(orderIds) {
        if (!orderIds.length) return [];
        return db.select().from(orderItems).where(inArray(orderItems.orderId, orderIds));
      },
      async deleteItem(id) {
        await db.delete(orderItems).where(eq(orderItems.id, id));
      },
      async deleteItemsOf(orderId) {
        await db.delete(orderItems).where(eq(orderItems.orderId, orderId));
      },

      async insertHistory(values) {
        return single(await db.insert(orderStatusHistory).values(values).returning(), 'order_status_history');
      },
      async listHistory(orderId) {
        return db
          .select()
          .from(orderStatusHistory)
          .where(eq(orderStatusHistory.orderId, orderId))
          .orderBy(asc(orderStatusHistory.changedAt));
      },
      async deleteHistoryOf(orderId) {
        await db.delete(orderStatusHistory).where(eq(orderStatusHistory.orderId, orderId));
      },
    },

    loyalty: {
      async insert(values) {
        return single(await db.insert(loyaltyEntries).values(values).returning(), 'loyalty_entries');
      },
      async listByCustomer(customerId) {
        return db
          .select()
          .from(loyaltyEntries)
          .where(eq(loyaltyEntries.customerId, customerId))
          .orderBy(asc(loyaltyEntries.createdAt));
      },
      async recent(customerId, limit) {
        return db
          .select()
          .from(loyaltyEntries)
          .where(eq(loyaltyEntries.customerId, customerId))
          .orderBy(desc(loyaltyEntries.createdAt))
          .limit(limit);
      },
      async listPage(customerId, filter, page) {
        const where = and(
          eq(loyaltyEntries.customerId, customerId),
          filter.type ? eq(loyaltyEntries.type, filter.type) : undefined,
        );
        const rows = await db
          .select()
          .from(loyaltyEntries)
          .where(where)
          .orderBy(desc(loyaltyEntries.createdAt))
          .offset(page.skip)
          .limit(page.take);
        return {
          items: rows,
          total: firstCount(await db.select({ value: count() }).from(loyaltyEntries).where(where)),
        };
      },
      async balance(customerId, at) {
        const [row] = await db
          .select({ value: sql<number>`coalesce(sum(${loyaltyEntries.points}), 0)`.mapWith(Number) })
          .from(loyaltyEntries)
          .where(
            and(
              eq(loyaltyEntries.customerId, customerId),
              or(isNull(loyaltyEntries.expiresAt), gt(loyaltyEntries.expiresAt, at)),
            ),
          );
        return row?.value ?? 0;
      },
      async balances(customerIds, at) {
        const totals = new Map<string, number>();
        if (!customerIds.length) return totals;
        const rows = await db
          .select({
            customerId: loyaltyEntries.customerId,
            value: sql<number>`coalesce(sum(${loyaltyEntries.points}), 0)`.mapWith(Number),
          })
          .from(loyaltyEntries)
          .where(
            and(
              inArray(loyaltyEntries.customerId, customerIds),
              or(isNull(loyaltyEntries.expiresAt), gt(loyaltyEntries.expiresAt, at)),
            ),
          )
          .groupBy(loyaltyEntries.customerId);
        for (const row of rows) totals.set(row.customerId, row.value);
        return totals;
      },
      async detachOrder(orderId) {
        await db.update(loyaltyEntries).set({ orderId: null }).where(eq(loyaltyEntries.orderId, orderId));
      },
    },

    notifications: {
      async insert(values) {
        return single(await db.insert(notifications).values(values).returning(), 'notifications');
      },
      async findById(id) {
        const [row] = await db.select().from(notifications).where(eq(notifications.id, id)).limit(1);
        return row;
      },
      async listByRecipient(recipientId, filter, page) {
        const where = and(
          eq(notifications.recipientId, recipientId),
          filter.status ? eq(notifications.status, filter.status) : undefined,
        );
        const rows = await db
          .select()
          .from(notifications)
          .where(where)
          .orderBy(desc(notifications.createdAt))
          .offset(page.skip)
          .limit(page.take);
        return {
          items: rows,
          total: firstCount(await db.select({ value: count() }).from(notifications).where(where)),
        };
      },
      async update(id, patch) {
        return single(
          await db.update(notifications).set(patch).where(eq(notifications.id, id)).returning(),
          'notifications',
        );
      },
    },
  };
}
