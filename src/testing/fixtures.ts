import { MemoryStore } from '../database/memory/memory-store';
import type { Order, OrderStatus } from '../database/schema';
import type { Store } from '../database/store';

export const ids = {
  admin: 'user-admin',
  owner: 'user-owner',
  otherOwner: 'user-owner-2',
  staff: 'user-staff',
  clerk: 'user-clerk',
  customer: 'user-customer',
  otherCustomer: 'user-customer-2',
  shop: 'shop-main',
  otherShop: 'shop-other',
  dryClean: 'svc-dry-clean',
  press: 'svc-press',
  shirt: 'item-shirt',
  suit: 'item-suit',
  shirtDryClean: 'price-shirt-dry-clean',
  suitDryClean: 'price-suit-dry-clean',
  shirtPress: 'price-shirt-press',
} as const;

/**
 * One active shop with an owner, a fully privileged staff member and a clerk
 * that may only take orders, plus a second shop and two customers.
 */
export async function seedStore(store = new MemoryStore()) {
  await store.transaction(async (tx) => {
    const user = (id: string, username: string, phone: string, role: 'admin' | 'shop_owner' | 'staff' | 'customer') =>
      tx.users.insert({ id, username, phone, role, passwordHash: 'hash' });

    await user(ids.admin, 'admin', '+15550000001', 'admin');
    await user(ids.owner, 'owner', '+15550000002', 'shop_owner');
    await user(ids.otherOwner, 'owner2', '+15550000003', 'shop_owner');
    await user(ids.staff, 'staff', '+15550000004', 'staff');
    await user(ids.clerk, 'clerk', '+15550000005', 'staff');
    await user(ids.customer, 'alice', '+15550000006', 'customer');
    await user(ids.otherCustomer, 'bob', '+15550000007', 'customer');

    await tx.shops.insert({ id: ids.shop, ownerId: ids.owner, name: 'Main Street Cleaners', address: '1 Main St', phone: '+15551110000' });
    await tx.shops.insert({ id: ids.otherShop, ownerId: ids.otherOwner, name: 'Harbor Cleaners', address: '9 Pier Rd', phone: '+15552220000' });

    await tx.staff.insert({ shopId: ids.shop, userId: ids.staff, position: 'manager' });
    await tx.staff.insert({
      shopId: ids.shop,
      userId: ids.clerk,
      position: 'counter',
      canUpdateOrders: false,
      canRegisterCustomers: false,
    });

    await tx.customers.insertProfile({ userId: ids.customer, preferredName: 'Alice' });
    await tx.customers.insertProfile({ userId: ids.otherCustomer });

    await tx.catalog.insertService({ id: ids.dryClean, shopId: ids.shop, name: 'DryClean' });
    await tx.catalog.insertService({ id: ids.press, shopId: ids.shop, name: 'Press' });
    await tx.catalog.insertItem({ id: ids.shirt, shopId: ids.shop, name: 'ShirtA' });
    await tx.catalog.insertItem({ id: ids.suit, shopId: ids.shop, name: 'Suit' });
    await tx.catalog.insertPrice({ id: ids.shirtDryClean, shopId: ids.shop, serviceId: ids.dryClean, itemId: ids.shirt, priceCents: 1250 });
    await tx.catalog.insertPrice({ id: ids.suitDryClean, shopId: ids.shop, serviceId: ids.dryClean, itemId: ids.suit, priceCents: 3000 });
    await tx.catalog.insertPrice({ id: ids.shirtPress, shopId: ids.shop, serviceId: ids.press, itemId: ids.shirt, priceCents: 400 });
  });
  return store;
}

export interface SeedLine {
  priceId: string;
  itemId: string;
  serviceId: string;
  itemName: string;
  serviceName: string;
  quantity: number;
  unitPriceCents: number;
}

export interface SeedOrderOptions {
  id: string;
  customerId: string;
  shopId?: string;
  status?: OrderStatus;
  createdAt?: Date;
  lines?: SeedLine[];
}

export const shirtDryCleanLine = (quantity: number): SeedLine => ({
  priceId: ids.shirtDryClean,
  itemId: ids.shirt,
  serviceId: ids.dryClean,
  itemName: 'ShirtA',
  serviceName: 'DryClean',
  quantity,
  unitPriceCents: 1250,
});

export const suitDryCleanLine = (quantity: number): SeedLine => ({
  priceId: ids.suitDryClean,
  itemId: ids.suit,
  serviceId: ids.dryClean,
  itemName: 'Suit',
  serviceName: 'DryClean',
  quantity,
  unitPriceCents: 3000,
});

export const shirtPressLine = (quantity: number): SeedLine => ({
  priceId: ids.shirtPress,
  itemId: ids.shirt,
  serviceId: ids.press,
  itemName: 'ShirtA',
  serviceName: 'Press',
  quantity,
  unitPriceCents: 400,
});

/** Writes an order row with its lines directly, bypassing pricing and status rules. */
export function seedOrder(store: Store, options: SeedOrderOptions): Promise<Order> {
  const lines = options.lines ?? [];
  const createdAt = options.createdAt ?? new Date();
  return store.transaction(async (tx) => {
    const order = await tx.orders.insert({
      id: options.id,
      shopId: options.shopId ?? ids.shop,
      customerId: options.customerId,
      orderNumber: `SEED-${options.id}`,
      status: options.status ?? 'received',
      pickupAt: createdAt,
      deliveryAt: createdAt,
      totalCents: lines.reduce((sum, line) => sum + line.unitPriceCents * line.quantity, 0),
      createdBy: options.customerId,
      completedAt: options.status === 'completed' ? createdAt : null,
      createdAt,
      updatedAt: createdAt,
    });
    await tx.orders.insertItems(
      lines.map((line) => ({
        orderId: order.id,
        servicePriceId: line.priceId,
        itemId: line.itemId,
        serviceId: line.serviceId,
        itemName: line.itemName,
        serviceName: line.serviceName,
        quantity: line.quantity,
        unitPriceCents: line.unitPriceCents,
        totalPriceCents: line.unitPriceCents * line.quantity,
      })),
    );
    return order;
  });
}
