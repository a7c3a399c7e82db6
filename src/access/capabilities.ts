import type { UserRole } from '../database/schema';

export enum Capability {
  /** Create orders for oneself. */
  PLACE_ORDERS = 'place_orders',
  /** Create orders on a customer's behalf and edit their line items. */
  TAKE_ORDERS = 'take_orders',
  UPDATE_ORDERS = 'update_orders',
  REGISTER_CUSTOMERS = 'register_customers',
  VIEW_SHOP_ORDERS = 'view_shop_orders',
  /** Customer list, analytics and stats of a shop. */
  VIEW_SHOP_CUSTOMERS = 'view_shop_customers',
  MANAGE_CATALOG = 'manage_catalog',
  MANAGE_SHOP = 'manage_shop',
  MANAGE_LOYALTY = 'manage_loyalty',
  DELETE_ORDERS = 'delete_orders',
}

export interface AccessGrant {
  userId: string;
  role: UserRole;
  /** Shop the capabilities apply to; absent for customers and admins. */
  shopId?: string;
  capabilities: ReadonlySet<Capability>;
}

export const ALL_CAPABILITIES: readonly Capability[] = Object.values(Capability);

export const OWNER_CAPABILITIES: readonly Capability[] = [
  Capability.TAKE_ORDERS,
  Capability.UPDATE_ORDERS,
  Capability.REGISTER_CUSTOMERS,
  Capability.VIEW_SHOP_ORDERS,
  Capability.VIEW_SHOP_CUSTOMERS,
  Capability.MANAGE_CATALOG,
  Capability.MANAGE_SHOP,
];

/** Capabilities that are not tied to one shop. */
export const UNSCOPED_CAPABILITIES: ReadonlySet<Capability> = new Set([Capability.PLACE_ORDERS]);
