import { randomUUID } from 'crypto';
import { sql } from 'drizzle-orm';
import {
  bigint,
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

export const USER_ROLES = ['admin', 'shop_owner', 'staff', 'customer'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const ORDER_STATUSES = ['received', 'in_progress', 'ready_for_pickup', 'completed', 'cancelled'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const ORDER_PRIORITIES = ['normal', 'high', 'urgent'] as const;
export type OrderPriority = (typeof ORDER_PRIORITIES)[number];

export const PICKUP_TYPES = ['drop_off', 'pickup'] as const;
export type PickupType = (typeof PICKUP_TYPES)[number];

export const LOYALTY_ENTRY_TYPES = ['earned', 'redeemed', 'bonus', 'adjustment'] as const;
export type LoyaltyEntryType = (typeof LOYALTY_ENTRY_TYPES)[number];

export const MEMBERSHIP_TIERS = ['bronze', 'silver', 'gold', 'platinum'] as const;
export type MembershipTier = (typeof MEMBERSHIP_TIERS)[number];

export const COMMUNICATION_CHANNELS = ['email', 'sms', 'phone', 'app'] as const;
export type CommunicationChannel = (typeof COMMUNICATION_CHANNELS)[number];

export const ADDRESS_TYPES = ['home', 'work', 'other'] as const;
export type AddressType = (typeof ADDRESS_TYPES)[number];

export const NOTIFICATION_STATUSES = ['unread', 'read', 'archived'] as const;
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

const createdAt = () => timestamp('created_at', { withTimezone: true }).notNull().defaultNow();
const updatedAt = () => timestamp('updated_at', { withTimezone: true }).notNull().defaultNow();

// ── Accounts ────────────────────────────────────────────────────
export const users = pgTable(
  'users',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    username: text('username').notNull(),
    email: text('email'),
    phone: text('phone').notNull(),
    role: text('role', { enum: USER_ROLES }).notNull().default('customer'),
    passwordHash: text('password_hash').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [
    uniqueIndex('uq_users_username').on(table.username),
    uniqueIndex('uq_users_phone').on(table.phone),
    uniqueIndex('uq_users_email').on(table.email),
  ],
);

export const refreshSessions = pgTable(
  'refresh_sessions',
  {
    jti: text('jti').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
    createdAt: createdAt(),
  },
  (table) => [index('idx_refresh_sessions_user').on(table.userId)],
);

// ── Shops ───────────────────────────────────────────────────────
export const shops = pgTable(
  'shops',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    ownerId: text('owner_id')
      .notNull()
      .references(() => users.id),
    name: text('name').notNull(),
    address: text('address').notNull(),
    phone: text('phone').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex('uq_shops_owner').on(table.ownerId), index('idx_shops_active').on(table.isActive)],
);

export const shopStaff = pgTable(
  'shop_staff',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    shopId: text('shop_id')
      .notNull()
      .references(() => shops.id),
    userId: text('user_id')
      .notNull()
      .references(() => users.id),
    position: text('position').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    canTakeOrders: boolean('can_take_orders').notNull().default(true),
    canUpdateOrders: boolean('can_update_orders').notNull().default(true),
    canRegisterCustomers: boolean('can_register_customers').notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex('uq_shop_staff_user').on(table.userId), index('idx_shop_staff_shop').on(table.shopId)],
);

// ── Catalog ─────────────────────────────────────────────────────
export const services = pgTable(
  'services',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    shopId: text('shop_id')
      .notNull()
      .references(() => shops.id),
    name: text('name').notNull(),
    description: text('description'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex('uq_services_shop_name').on(table.shopId, table.name)],
);

export const items = pgTable(
  'items',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    shopId: text('shop_id')
      .notNull()
      .references(() => shops.id),
    name: text('name').notNull(),
    description: text('description'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex('uq_items_shop_name').on(table.shopId, table.name)],
);

export const servicePrices = pgTable(
  'service_prices',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    shopId: text('shop_id')
      .notNull()
      .references(() => shops.id),
    serviceId: text('service_id')
      .notNull()
      .references(() => services.id),
    itemId: text('item_id')
      .notNull()
      .references(() => items.id),
    priceCents: integer('price_cents').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex('uq_service_prices_triple').on(table.shopId, table.serviceId, table.itemId)],
);

// ── Customers ───────────────────────────────────────────────────
export const customerProfiles = pgTable(
  'customer_profiles',
  {
    userId: text('user_id')
      .primaryKey()
      .references(() => users.id),
    preferredName: text('preferred_name'),
    preferredCommunication: text('preferred_communication', { enum: COMMUNICATION_CHANNELS })
      .notNull()
      .default('email'),
    specialInstructions: text('special_instructions'),
    membershipTier: text('membership_tier', { enum: MEMBERSHIP_TIERS }).notNull().default('bronze'),
    totalSpentCents: bigint('total_spent_cents', { mode: 'number' }).notNull().default(0),
    totalOrders: integer('total_orders').notNull().default(0),
    firstOrderAt: timestamp('first_order_at', { withTimezone: true }),
    lastOrderAt: timestamp('last_order_at', { withTimezone: true }),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [index('idx_customer_profiles_tier').on(table.membershipTier)],
);

export const customerAddresses = pgTable(
  'customer_addresses',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    customerId: text('customer_id')
      .notNull()
      .references(() => users.id),
    type: text('type', { enum: ADDRESS_TYPES }).notNull().default('home'),
    label: text('label').notNull(),
    streetAddress: text('street_address').notNull(),
    apartmentUnit: text('apartment_unit'),
    city: text('city').notNull(),
    state: text('state').notNull(),
    postalCode: text('postal_code').notNull(),
    country: text('country').notNull().default('USA'),
    pickupInstructions: text('pickup_instructions'),
    isDefault: boolean('is_default').notNull().default(false),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [
    index('idx_customer_addresses_customer').on(table.customerId, table.isActive),
    uniqueIndex('uq_customer_addresses_label')
      .on(table.customerId, table.label)
      .where(sql`${table.isActive}`),
  ],
);

// ── Orders ──────────────────────────────────────────────────────
export const orders = pgTable(
  'orders',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    shopId: text('shop_id')
      .notNull()
      .references(() => shops.id),
    customerId: text('customer_id')
      .notNull()
      .references(() => users.id),
    orderNumber: text('order_number').notNull(),
    status: text('status', { enum: ORDER_STATUSES }).notNull().default('received'),
    priority: text('priority', { enum: ORDER_PRIORITIES }).notNull().default('normal'),
    pickupType: text('pickup_type', { enum: PICKUP_TYPES }).notNull().default('drop_off'),
    pickupAddress: text('pickup_address'),
    pickupAt: timestamp('pickup_at', { withTimezone: true }).notNull(),
    deliveryAt: timestamp('delivery_at', { withTimezone: true }).notNull(),
    totalCents: bigint('total_cents', { mode: 'number' }).notNull().default(0),
    specialInstructions: text('special_instructions'),
    loyaltyPointsEarned: integer('loyalty_points_earned').notNull().default(0),
    version: integer('version').notNull().default(1),
    createdBy: text('created_by').notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    cancelledAt: timestamp('cancelled_at', { withTimezone: true }),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [
    uniqueIndex('uq_orders_shop_number').on(table.shopId, table.orderNumber),
    index('idx_orders_shop_status').on(table.shopId, table.status),
    index('idx_orders_customer_created').on(table.customerId, table.createdAt),
  ],
);

export const orderItems = pgTable(
  'order_items',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    orderId: text('order_id')
      .notNull()
      .references(() => orders.id),
    servicePriceId: text('service_price_id').notNull(),
    itemId: text('item_id').notNull(),
    serviceId: text('service_id').notNull(),
    itemName: text('item_name').notNull(),
    serviceName: text('service_name').notNull(),
    quantity: integer('quantity').notNull(),
    unitPriceCents: integer('unit_price_cents').notNull(),
    totalPriceCents: bigint('total_price_cents', { mode: 'number' }).notNull(),
    notes: text('notes'),
    createdAt: createdAt(),
  },
  (table) => [index('idx_order_items_order').on(table.orderId)],
);

export const orderStatusHistory = pgTable(
  'order_status_history',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    orderId: text('order_id')
      .notNull()
      .references(() => orders.id),
    fromStatus: text('from_status', { enum: ORDER_STATUSES }),
    toStatus: text('to_status', { enum: ORDER_STATUSES }).notNull(),
    actorId: text('actor_id').notNull(),
    note: text('note'),
    changedAt: timestamp('changed_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_order_status_history_order').on(table.orderId, table.changedAt)],
);

export const orderCounters = pgTable(
  'order_counters',
  {
    shopId: text('shop_id').notNull(),
    year: integer('year').notNull(),
    lastNumber: integer('last_number').notNull().default(0),
  },
  (table) => [primaryKey({ columns: [table.shopId, table.year] })],
);

// ── Loyalty ─────────────────────────────────────────────────────
export const loyaltyEntries = pgTable(
  'loyalty_entries',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    customerId: text('customer_id')
      .notNull()
      .references(() => users.id),
    type: text('type', { enum: LOYALTY_ENTRY_TYPES }).notNull(),
    points: integer('points').notNull(),
    description: text('description').notNull(),
    orderId: text('order_id'),
    consumesEntryId: text('consumes_entry_id'),
    expiresAt: timestamp('expires_at', { withTimezone: true }),
    processedBy: text('processed_by'),
    createdAt: createdAt(),
  },
  (table) => [
    index('idx_loyalty_entries_customer').on(table.customerId, table.createdAt),
    index('idx_loyalty_entries_expires').on(table.expiresAt),
  ],
);

// ── Notifications ───────────────────────────────────────────────
export const notifications = pgTable(
  'notifications',
  {
    id: text('id').primaryKey().$defaultFn(randomUUID),
    recipientId: text('recipient_id')
      .notNull()
      .references(() => users.id),
    type: text('type').notNull(),
    title: text('title').notNull(),
    message: text('message').notNull(),
    orderId: text('order_id'),
    shopId: text('shop_id'),
    status: text('status', { enum: NOTIFICATION_STATUSES }).notNull().default('unread'),
    data: jsonb('data').$type<Record<string, unknown>>().notNull().default({}),
    readAt: timestamp('read_at', { withTimezone: true }),
    createdAt: createdAt(),
  },
  (table) => [index('idx_notifications_recipient_status').on(table.recipientId, table.status)],
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type RefreshSession = typeof refreshSessions.$inferSelect;
export type NewRefreshSession = typeof refreshSessions.$inferInsert;
export type Shop = typeof shops.$inferSelect;
export type NewShop = typeof shops.$inferInsert;
export type ShopStaff = typeof shopStaff.$inferSelect;
export type NewShopStaff = typeof shopStaff.$inferInsert;
export type Service = typeof services.$inferSelect;
export type NewService = typeof services.$inferInsert;
export type Item = typeof items.$inferSelect;
export type NewItem = typeof items.$inferInsert;
export type ServicePrice = typeof servicePrices.$inferSelect;
export type NewServicePrice = typeof servicePrices.$inferInsert;
export type CustomerProfile = typeof customerProfiles.$inferSelect;
export type NewCustomerProfile = typeof customerProfiles.$inferInsert;
export type CustomerAddress = typeof customerAddresses.$inferSelect;
export type NewCustomerAddress = typeof customerAddresses.$inferInsert;
export type Order = typeof orders.$inferSelect;
export type NewOrder = typeof orders.$inferInsert;
export type OrderItem = typeof orderItems.$inferSelect;
export type NewOrderItem = typeof orderItems.$inferInsert;
export type OrderStatusHistory = typeof orderStatusHistory.$inferSelect;
export type NewOrderStatusHistory = typeof orderStatusHistory.$inferInsert;
export type LoyaltyEntry = typeof loyaltyEntries.$inferSelect;
export type NewLoyaltyEntry = typeof loyaltyEntries.$inferInsert;
export type Notification = typeof notifications.$inferSelect;
export type NewNotification = typeof notifications.$inferInsert;
