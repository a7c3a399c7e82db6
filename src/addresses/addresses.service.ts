import { Injectable, Logger } from '@nestjs/common';
import { DomainError, ErrorKind } from '../common/errors';
import { CustomerAddress } from '../database/schema';
import { Store, StoreTransaction } from '../database/store';
import { CreateAddressDto, UpdateAddressDto } from './dto';

@Injectable()
export class AddressesService {
  private readonly logger = new Logger(AddressesService.name);

  constructor(private readonly store: Store) {}

  list(customerId: string): Promise<CustomerAddress[]> {
    return this.store.transaction((tx) => tx.addresses.listActive(customerId));
  }

  get(customerId: string, id: string): Promise<CustomerAddress> {
    return this.store.transaction((tx) => this.findOwned(tx, customerId, id));
  }

  /** The first address a customer saves becomes the default. */
  create(customerId: string, dto: CreateAddressDto): Promise<CustomerAddress> {
    return this.store.transaction(async (tx) => {
      await this.assertLabelFree(tx, customerId, dto.label);
      const existing = await tx.addresses.listActive(customerId);
      const isDefault = dto.isDefault === true || existing.length === 0;
      if (isDefault) {
        await tx.addresses.clearDefault(customerId);
      }
      const address = await tx.addresses.insert({
        customerId,
        type: dto.type,
        label: dto.label,
        streetAddress: dto.streetAddress,
        apartmentUnit: dto.apartmentUnit,
        city: dto.city,
        state: dto.state,
        postalCode: dto.postalCode,
        country: dto.country,
        pickupInstructions: dto.pickupInstructions,
        isDefault,
      });
      this.logger.log({ msg: 'Address created', customerId, addressId: address.id, isDefault });
      return address;
    });
  }

  update(customerId: string, id: string, dto: UpdateAddressDto): Promise<CustomerAddress> {
    return this.store.transaction(async (tx) => {
      const existing = await this.findOwned(tx, customerId, id);
      if (dto.label !== undefined && dto.label !== existing.label) {
        await this.assertLabelFree(tx, customerId, dto.label);
      }
      if (dto.isDefault === true) {
        await tx.addresses.clearDefault(customerId);
      }
      const updated = await tx.addresses.update(id, {
        type: dto.type,
        label: dto.label,
        streetAddress: dto.streetAddress,
        apartmentUnit: dto.apartmentUnit,
        city: dto.city,
        state: dto.state,
        postalCode: dto.postalCode,
        country: dto.country,
        pickupInstructions: dto.pickupInstructions,
        isDefault: dto.isDefault ?? existing.isDefault,
        updatedAt: new Date(),
      });
      if (existing.isDefault && dto.isDefault === false) {
        // a customer with addresses always keeps exactly one default
        const promoted = await this.promoteFallback(tx, customerId, id);
        if (!promoted) return tx.addresses.update(id, { isDefault: true });
      }
      return updated;
    });
  }

  /** Soft delete; the next address takes over as default. */
  remove(customerId: string, id: string): Promise<{ id: string; deleted: true }> {
    return this.store.transaction(async (tx) => {
      const existing = await this.findOwned(tx, customerId, id);
      await tx.addresses.update(id, { isActive: false, isDefault: false, updatedAt: new Date() });
      if (existing.isDefault) {
        await this.promoteFallback(tx, customerId, id);
      }
      this.logger.log({ msg: 'Address removed', customerId, addressId: id });
      return { id, deleted: true };
    });
  }

  private async findOwned(tx: StoreTransaction, customerId: string, id: string): Promise<CustomerAddress> {
    const address = await tx.addresses.findById(id);
    if (!address || address.customerId !== customerId || !address.isActive) {
      throw new DomainError(ErrorKind.NOT_FOUND, 'Address not found');
    }
    return address;
  }

  private async assertLabelFree(tx: StoreTransaction, customerId: string, label: string) {
    if (await tx.addresses.findActiveByLabel(customerId, label)) {
      throw new DomainError(ErrorKind.CONFLICT, 'You already have an address with this label', {
        label: ['must be unique among your addresses'],
      });
    }
  }

  private async promoteFallback(tx: StoreTransaction, customerId: string, excludeId: string) {
    const fallback = (await tx.addresses.listActive(customerId)).find((address) => address.id !== excludeId);
    if (!fallback) return undefined;
    return tx.addresses.update(fallback.id, { isDefault: true, updatedAt: new Date() });
  }
}
