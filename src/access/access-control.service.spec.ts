import { MemoryStore } from '../database/memory/memory-store';
import { ids, seedOrder, seedStore } from '../testing/fixtures';
import { AccessControlService } from './access-control.service';
import { Capability } from './capabilities';

describe('AccessControlService', () => {
  const access = new AccessControlService();

  async function seed() {
    const store = new MemoryStore();
    await store.transaction(async (tx) => {
      await tx.users.insert({ id: 'admin-1', username: 'admin', phone: '+10000000001', passwordHash: 'x', role: 'admin' });
      await tx.users.insert({ id: 'owner-1', username: 'owner', phone: '+10000000002', passwordHash: 'x', role: 'shop_owner' });
      await tx.users.insert({ id: 'staff-1', username: 'staff', phone: '+10000000003', passwordHash: 'x', role: 'staff' });
      await tx.users.insert({ id: 'cust-1', username: 'cust', phone: '+10000000004', passwordHash: 'x' });
      await tx.users.insert({
        id: 'gone-1',
        username: 'gone',
        phone: '+10000000005',
        passwordHash: 'x',
        isActive: false,
      });
      await tx.shops.insert({ id: 'shop-1', ownerId: 'owner-1', name: 'Fresh Press', address: '1 Main St', phone: '+1555' });
      await tx.staff.insert({
        shopId: 'shop-1',
        userId: 'staff-1',
        position: 'counter',
        canUpdateOrders: false,
      });
    });
    return store;
  }

  it('grants owners their shop capabilities scoped to their shop', async () => {
    const store = await seed();
    const grant = await store.transaction((tx) => access.resolve(tx, 'owner-1'));
    expect(grant.shopId).toBe('shop-1');
    expect(access.can(grant, Capability.UPDATE_ORDERS, 'shop-1')).toBe(true);
    expect(access.can(grant, Capability.UPDATE_ORDERS, 'shop-2')).toBe(false);
    expect(access.can(grant, Capability.DELETE_ORDERS, 'shop-1')).toBe(false);
  });

  it('derives staff capabilities from their permission flags', async () => {
    const store = await seed();
    const grant = await store.transaction((tx) => access.resolve(tx, 'staff-1'));
    expect(access.can(grant, Capability.TAKE_ORDERS, 'shop-1')).toBe(true);
    expect(access.can(grant, Capability.REGISTER_CUSTOMERS, 'shop-1')).toBe(true);
    expect(access.can(grant, Capability.UPDATE_ORDERS, 'shop-1')).toBe(false);
    expect(() => access.require(grant, Capability.UPDATE_ORDERS, 'shop-1')).toThrow(
      expect.objectContaining({ kind: 'Forbidden' }),
    );
  });

  it('drops staff capabilities once the membership is deactivated', async () => {
    const store = await seed();
    await store.transaction(async (tx) => {
      const staff = await tx.staff.findByUser('staff-1');
      if (staff) await tx.staff.update(staff.id, { isActive: false });
    });
    const grant = await store.transaction((tx) => access.resolve(tx, 'staff-1'));
    expect(grant.capabilities.size).toBe(0);
  });

  it('lets admins act on any shop', async () => {
    const store = await seed();
    const grant = await store.transaction((tx) => access.resolve(tx, 'admin-1'));
    expect(access.can(grant, Capability.UPDATE_ORDERS, 'shop-9')).toBe(true);
    expect(access.can(grant, Capability.DELETE_ORDERS)).toBe(true);
  });

  it('limits customers to placing orders at any shop', async () => {
    const store = await seed();
    const grant = await store.transaction((tx) => access.resolve(tx, 'cust-1'));
    expect(access.can(grant, Capability.PLACE_ORDERS, 'shop-1')).toBe(true);
    expect(access.can(grant, Capability.TAKE_ORDERS, 'shop-1')).toBe(false);
    expect(access.isShopMember(grant, 'shop-1')).toBe(false);
  });

  it('rejects inactive or unknown accounts', async () => {
    const store = await seed();
    await expect(store.transaction((tx) => access.resolve(tx, 'gone-1'))).rejects.toMatchObject({
      kind: 'Unauthorized',
    });
    await expect(store.transaction((tx) => access.resolve(tx, 'nobody'))).rejects.toMatchObject({
      kind: 'Unauthorized',
    });
  });

  describe('requireCustomerAccess', () => {
    const check = (store: MemoryStore, actorId: string, customerId: string) =>
      store.transaction((tx) => access.requireCustomerAccess(tx, actorId, customerId));

    it('lets customers reach their own account without a shop link', async () => {
      const store = await seedStore();
      await expect(check(store, ids.customer, ids.customer)).resolves.toBeUndefined();
    });

    it('lets admins reach any customer', async () => {
      const store = await seedStore();
      await expect(check(store, ids.admin, ids.customer)).resolves.toBeUndefined();
    });

    it('requires shop staff to share an order with the customer', async () => {
      const store = await seedStore();
      await expect(check(store, ids.staff, ids.customer)).rejects.toMatchObject({ kind: 'Forbidden' });

      await seedOrder(store, { id: 'order-1', customerId: ids.customer });
      await expect(check(store, ids.staff, ids.customer)).resolves.toBeUndefined();
      await expect(check(store, ids.owner, ids.customer)).resolves.toBeUndefined();
    });

    it('refuses the owner of a shop the customer never used', async () => {
      const store = await seedStore();
      await seedOrder(store, { id: 'order-1', customerId: ids.customer });
      await expect(check(store, ids.otherOwner, ids.customer)).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('refuses staff without registration rights even with a shared order', async () => {
      const store = await seedStore();
      await seedOrder(store, { id: 'order-1', customerId: ids.customer });
      await expect(check(store, ids.clerk, ids.customer)).rejects.toMatchObject({ kind: 'Forbidden' });
    });
  });
});
