import { ids, seedOrder, seedStore, shirtDryCleanLine } from '../../testing/fixtures';
import { MemoryStore } from './memory-store';

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(async () => {
    store = await seedStore();
  });

  it('hands out copies that do not write through to stored rows', async () => {
    const profile = await store.transaction((tx) => tx.customers.findProfile(ids.customer));
    if (!profile) throw new Error('seeded profile missing');
    profile.totalSpentCents = 999_999;

    const reread = await store.transaction((tx) => tx.customers.findProfile(ids.customer));
    expect(reread?.totalSpentCents).toBe(0);
  });

  it('returns a copy from updates as well', async () => {
    const updated = await store.transaction((tx) => tx.shops.update(ids.shop, { name: 'Renamed' }));
    updated.name = 'Mutated';

    const reread = await store.transaction((tx) => tx.shops.findById(ids.shop));
    expect(reread?.name).toBe('Renamed');
  });

  it('discards writes of a transaction that rejects', async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.shops.update(ids.shop, { name: 'Half done' });
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    const shop = await store.transaction((tx) => tx.shops.findById(ids.shop));
    expect(shop?.name).toBe('Main Street Cleaners');
  });

  it('lists customers served by a shop with search, tier and paging', async () => {
    await seedOrder(store, { id: 'o-1', customerId: ids.customer, lines: [shirtDryCleanLine(1)] });
    await seedOrder(store, { id: 'o-2', customerId: ids.otherCustomer, shopId: ids.otherShop });

    const all = await store.transaction((tx) => tx.customers.listServedByShop(ids.shop, {}, { skip: 0, take: 10 }));
    expect(all.total).toBe(1);
    expect(all.items.map((c) => c.user.id)).toEqual([ids.customer]);

    const byName = await store.transaction((tx) =>
      tx.customers.listServedByShop(ids.shop, { search: 'ALI' }, { skip: 0, take: 10 }),
    );
    expect(byName.total).toBe(1);

    const gold = await store.transaction((tx) =>
      tx.customers.listServedByShop(ids.shop, { tier: 'gold' }, { skip: 0, take: 10 }),
    );
    expect(gold.total).toBe(0);
  });
});
