import { Injectable } from '@nestjs/common';
import { DomainError, ErrorKind } from '../common/errors';
import { StoreTransaction } from '../database/store';
import { AccessGrant, ALL_CAPABILITIES, Capability, OWNER_CAPABILITIES, UNSCOPED_CAPABILITIES } from './capabilities';

/**
 * Resolves who the caller is from durable state, never from token claims,
 * so role and staff changes apply on the next request.
 */
@Injectable()
export class AccessControlService {
  async resolve(tx: StoreTransaction, userId: string): Promise<AccessGrant> {
    const user = await tx.users.findById(userId);
    if (!user || !user.isActive) {
      throw new DomainError(ErrorKind.UNAUTHORIZED, 'Account is not active');
    }

    switch (user.role) {
      case 'admin':
        return { userId, role: user.role, capabilities: new Set(ALL_CAPABILITIES) };
      case 'shop_owner': {
        const shop = await tx.shops.findByOwner(userId);
        if (!shop) {
          return { userId, role: user.role, capabilities: new Set() };
        }
        return { userId, role: user.role, shopId: shop.id, capabilities: new Set(OWNER_CAPABILITIES) };
      }
      case 'staff': {
        const staff = await tx.staff.findByUser(userId);
        if (!staff || !staff.isActive) {
          return { userId, role: user.role, capabilities: new Set() };
        }
        const capabilities = new Set<Capability>([Capability.VIEW_SHOP_ORDERS]);
        if (staff.canTakeOrders) capabilities.add(Capability.TAKE_ORDERS);
        if (staff.canUpdateOrders) capabilities.add(Capability.UPDATE_ORDERS);
        if (staff.canRegisterCustomers) capabilities.add(Capability.REGISTER_CUSTOMERS);
        return { userId, role: user.role, shopId: staff.shopId, capabilities };
      }
      case 'customer':
        return { userId, role: user.role, capabilities: new Set([Capability.PLACE_ORDERS]) };
    }
  }

  /** True when the grant holds `capability`, scoped to `shopId` when given. */
  can(grant: AccessGrant, capability: Capability, shopId?: string): boolean {
    if (!grant.capabilities.has(capability)) return false;
    if (grant.role === 'admin' || shopId === undefined || UNSCOPED_CAPABILITIES.has(capability)) return true;
    return grant.shopId === shopId;
  }

  require(grant: AccessGrant, capability: Capability, shopId?: string): void {
    if (!this.can(grant, capability, shopId)) {
      throw new DomainError(ErrorKind.FORBIDDEN, 'You are not allowed to perform this action');
    }
  }

  /**
   * Gate for reading or acting on one customer's account. Passes for the
   * customer and for admins; shop staff and owners need `capability` and an
   * existing order from the customer at their shop.
   */
  async requireCustomerAccess(
    tx: StoreTransaction,
    actorId: string,
    customerId: string,
    capability = Capability.REGISTER_CUSTOMERS,
  ): Promise<void> {
    if (actorId === customerId) return;
    const grant = await this.resolve(tx, actorId);
    this.require(grant, capability);
    if (grant.role === 'admin') return;
    if (!grant.shopId || !(await tx.orders.customerHasOrderAt(customerId, grant.shopId))) {
      throw new DomainError(ErrorKind.FORBIDDEN, 'Customer has no orders at your shop');
    }
  }

  /** Admin, or staff/owner of the given shop. */
  isShopMember(grant: AccessGrant, shopId: string): boolean {
    return grant.role === 'admin' || grant.shopId === shopId;
  }
}
