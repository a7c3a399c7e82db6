import { AccessControlService } from '../access/access-control.service';
import { ids, seedStore } from '../testing/fixtures';
import { CatalogService, priceKey } from './catalog.service';

describe('CatalogService', () => {
  const buildService = async () => {
    const store = await seedStore();
    const service = new CatalogService(store, new AccessControlService());
    return { store, service };
  };

  describe('createPrice', () => {
    it('creates a price for an item and service of the same shop', async () => {
      const { service } = await buildService();
      const item = await service.createItem(ids.owner, ids.shop, { name: 'Dress' });
      const price = await service.createPrice(ids.owner, ids.shop, {
        itemId: item.id,
        serviceId: ids.dryClean,
        priceCents: 1800,
      });
      expect(price).toMatchObject({ shopId: ids.shop, itemId: item.id, serviceId: ids.dryClean, priceCents: 1800 });
    });

    it('rejects a duplicate triple with Conflict', async () => {
      const { service } = await buildService();
      await expect(
        service.createPrice(ids.owner, ids.shop, { itemId: ids.shirt, serviceId: ids.dryClean, priceCents: 999 }),
      ).rejects.toMatchObject({ kind: 'Conflict' });
    });

    it('rejects a non-positive price with ValidationFailed', async () => {
      const { service } = await buildService();
      const item = await service.createItem(ids.owner, ids.shop, { name: 'Scarf' });
      await expect(
        service.createPrice(ids.owner, ids.shop, { itemId: item.id, serviceId: ids.press, priceCents: 0 }),
      ).rejects.toMatchObject({ kind: 'ValidationFailed', fieldErrors: { priceCents: expect.any(Array) } });
    });

    it('rejects a price above the ceiling', async () => {
      const { service } = await buildService();
      await expect(
        service.updatePrice(ids.owner, ids.shop, ids.shirtPress, { priceCents: 100_000_001 }),
      ).rejects.toMatchObject({ kind: 'ValidationFailed', fieldErrors: { priceCents: ['must not exceed 100000000'] } });
    });

    it('refuses staff without catalog rights', async () => {
      const { service } = await buildService();
      await expect(
        service.createPrice(ids.staff, ids.shop, { itemId: ids.suit, serviceId: ids.press, priceCents: 500 }),
      ).rejects.toMatchObject({ kind: 'Forbidden' });
    });

    it('refuses the owner of another shop', async () => {
      const { service } = await buildService();
      await expect(service.createItem(ids.otherOwner, ids.shop, { name: 'Coat' })).rejects.toMatchObject({
        kind: 'Forbidden',
      });
    });
  });

  describe('createService', () => {
    it('rejects a duplicate name within the shop', async () => {
      const { service } = await buildService();
      await expect(service.createService(ids.owner, ids.shop, { name: 'Press' })).rejects.toMatchObject({
        kind: 'Conflict',
      });
    });

    it('allows the same name in another shop', async () => {
      const { service } = await buildService();
      const created = await service.createService(ids.otherOwner, ids.otherShop, { name: 'Press' });
      expect(created.shopId).toBe(ids.otherShop);
    });
  });

  describe('getCatalog', () => {
    it('lists only active entries', async () => {
      const { service } = await buildService();
      await service.updateItem(ids.owner, ids.shop, ids.suit, { isActive: false });
      await service.updatePrice(ids.owner, ids.shop, ids.shirtPress, { isActive: false });

      const catalog = await service.getCatalog(ids.shop);
      expect(catalog.items.map((i) => i.name)).toEqual(['ShirtA']);
      expect(catalog.services.map((s) => s.name)).toEqual(['DryClean', 'Press']);
      expect(catalog.prices.map((p) => p.id).sort()).toEqual([ids.shirtDryClean, ids.suitDryClean].sort());
    });

    it('fails with NotFound for an unknown shop', async () => {
      const { service } = await buildService();
      await expect(service.getCatalog('shop-missing')).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });

  describe('resolvePrices', () => {
    it('skips pairs whose item is retired', async () => {
      const { store, service } = await buildService();
      await service.updateItem(ids.owner, ids.shop, ids.suit, { isActive: false });

      const prices = await store.transaction((tx) =>
        service.resolvePrices(tx, ids.shop, [
          { itemId: ids.shirt, serviceId: ids.dryClean },
          { itemId: ids.suit, serviceId: ids.dryClean },
        ]),
      );
      expect([...prices.keys()]).toEqual([priceKey(ids.shirt, ids.dryClean)]);
      expect(prices.get(priceKey(ids.shirt, ids.dryClean))).toMatchObject({
        itemName: 'ShirtA',
        serviceName: 'DryClean',
        price: { priceCents: 1250 },
      });
    });
  });
});
