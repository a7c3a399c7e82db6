import { Injectable, Logger } from '@nestjs/common';
import { AccessControlService } from '../access/access-control.service';
import { Capability } from '../access/capabilities';
import { DomainError, ErrorKind } from '../common/errors';
import { Item, Service, ServicePrice, Shop } from '../database/schema';
import { PricedPair, Store, StoreTransaction } from '../database/store';
import {
  CreateCatalogEntryDto,
  CreateServicePriceDto,
  UpdateCatalogEntryDto,
  UpdateServicePriceDto,
} from './dto/catalog.dto';

/** Upper bound for one unit price; keeps line totals well inside integer range. */
export const MAX_PRICE_CENTS = 100_000_000;

export interface PriceQuery {
  itemId: string;
  serviceId: string;
}

export interface ShopCatalog {
  shopId: string;
  services: Service[];
  items: Item[];
  prices: ServicePrice[];
}

export const priceKey = (itemId: string, serviceId: string) => `${itemId}:${serviceId}`;

@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);

  constructor(
    private readonly store: Store,
    private readonly access: AccessControlService,
  ) {}

  async getCatalog(shopId: string): Promise<ShopCatalog> {
    return this.store.transaction(async (tx) => {
      await this.requireActiveShop(tx, shopId);
      const [services, items, prices] = await Promise.all([
        tx.catalog.listServices(shopId, { activeOnly: true }),
        tx.catalog.listItems(shopId, { activeOnly: true }),
        tx.catalog.listPrices(shopId, { activeOnly: true }),
      ]);
      return { shopId, services, items, prices };
    });
  }

  /**
   * Active prices for each requested pair, keyed by {@link priceKey}.
   * Pairs without an active price (or with a retired item/service) are absent.
   */
  async resolvePrices(tx: StoreTransaction, shopId: string, pairs: PriceQuery[]): Promise<Map<string, PricedPair>> {
    const found = await tx.catalog.findActivePrices(shopId, pairs);
    return new Map(found.map((row) => [priceKey(row.price.itemId, row.price.serviceId), row]));
  }

  createService(actorId: string, shopId: string, dto: CreateCatalogEntryDto) {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      if (await tx.catalog.findServiceByName(shopId, dto.name)) {
        throw new DomainError(ErrorKind.CONFLICT, `Service "${dto.name}" already exists`);
      }
      const service = await tx.catalog.insertService({ shopId, name: dto.name, description: dto.description });
      this.logger.log({ msg: 'Service created', shopId, serviceId: service.id, actorId });
      return service;
    });
  }

  updateService(actorId: string, shopId: string, serviceId: string, dto: UpdateCatalogEntryDto) {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      const service = await tx.catalog.findService(serviceId);
      if (!service || service.shopId !== shopId) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Service not found');
      }
      if (dto.name && dto.name !== service.name && (await tx.catalog.findServiceByName(shopId, dto.name))) {
        throw new DomainError(ErrorKind.CONFLICT, `Service "${dto.name}" already exists`);
      }
      return tx.catalog.updateService(serviceId, {
        name: dto.name,
        description: dto.description,
        isActive: dto.isActive,
        updatedAt: new Date(),
      });
    });
  }

  createItem(actorId: string, shopId: string, dto: CreateCatalogEntryDto) {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      if (await tx.catalog.findItemByName(shopId, dto.name)) {
        throw new DomainError(ErrorKind.CONFLICT, `Item "${dto.name}" already exists`);
      }
      const item = await tx.catalog.insertItem({ shopId, name: dto.name, description: dto.description });
      this.logger.log({ msg: 'Item created', shopId, itemId: item.id, actorId });
      return item;
    });
  }

  updateItem(actorId: string, shopId: string, itemId: string, dto: UpdateCatalogEntryDto) {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      const item = await tx.catalog.findItem(itemId);
      if (!item || item.shopId !== shopId) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Item not found');
      }
      if (dto.name && dto.name !== item.name && (await tx.catalog.findItemByName(shopId, dto.name))) {
        throw new DomainError(ErrorKind.CONFLICT, `Item "${dto.name}" already exists`);
      }
      return tx.catalog.updateItem(itemId, {
        name: dto.name,
        description: dto.description,
        isActive: dto.isActive,
        updatedAt: new Date(),
      });
    });
  }

  createPrice(actorId: string, shopId: string, dto: CreateServicePriceDto) {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      this.assertPositivePrice(dto.priceCents);
      const [service, item] = await Promise.all([
        tx.catalog.findService(dto.serviceId),
        tx.catalog.findItem(dto.itemId),
      ]);
      if (!service || service.shopId !== shopId) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Service not found');
      }
      if (!item || item.shopId !== shopId) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Item not found');
      }
      if (await tx.catalog.findPriceByTriple(shopId, dto.serviceId, dto.itemId)) {
        throw new DomainError(ErrorKind.CONFLICT, `A price for ${item.name} / ${service.name} already exists`);
      }
      const price = await tx.catalog.insertPrice({
        shopId,
        serviceId: dto.serviceId,
        itemId: dto.itemId,
        priceCents: dto.priceCents,
      });
      this.logger.log({ msg: 'Service price created', shopId, priceId: price.id, priceCents: price.priceCents });
      return price;
    });
  }

  updatePrice(actorId: string, shopId: string, priceId: string, dto: UpdateServicePriceDto) {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      const price = await tx.catalog.findPrice(priceId);
      if (!price || price.shopId !== shopId) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Service price not found');
      }
      if (dto.priceCents !== undefined) this.assertPositivePrice(dto.priceCents);
      return tx.catalog.updatePrice(priceId, {
        priceCents: dto.priceCents,
        isActive: dto.isActive,
        updatedAt: new Date(),
      });
    });
  }

  private assertPositivePrice(priceCents: number) {
    if (!Number.isInteger(priceCents) || priceCents <= 0) {
      throw new DomainError(ErrorKind.VALIDATION_FAILED, 'Price must be a positive amount', {
        priceCents: ['must be a positive integer number of cents'],
      });
    }
    if (priceCents > MAX_PRICE_CENTS) {
      throw new DomainError(ErrorKind.VALIDATION_FAILED, 'Price is too large', {
        priceCents: [`must not exceed ${MAX_PRICE_CENTS}`],
      });
    }
  }

  private async authorize(tx: StoreTransaction, actorId: string, shopId: string) {
    await this.requireShop(tx, shopId);
    const grant = await this.access.resolve(tx, actorId);
    this.access.require(grant, Capability.MANAGE_CATALOG, shopId);
  }

  private async requireShop(tx: StoreTransaction, shopId: string): Promise<Shop> {
    const shop = await tx.shops.findById(shopId);
    if (!shop) {
      throw new DomainError(ErrorKind.NOT_FOUND, 'Shop not found');
    }
    return shop;
  }

  private async requireActiveShop(tx: StoreTransaction, shopId: string) {
    const shop = await this.requireShop(tx, shopId);
    if (!shop.isActive) {
      throw new DomainError(ErrorKind.NOT_FOUND, 'Shop not found');
    }
    return shop;
  }
}
