import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { randomBytes } from 'crypto';
import { AccessControlService } from '../access/access-control.service';
import { Capability } from '../access/capabilities';
import { DomainError, ErrorKind } from '../common/errors';
import { normalizePhone } from '../common/utils/phone.util';
import { CustomerProfile, Order, User } from '../database/schema';
import { Store, StoreTransaction } from '../database/store';
import { SettingsService } from '../settings/settings.service';
import { RegisterWalkInCustomerDto, UpdateCustomerProfileDto } from './dto/customer.dto';
import { tierFor } from './membership-tier';

export interface CustomerView {
  id: string;
  username: string;
  phone: string;
  email: string | null;
  profile: CustomerProfile;
  loyaltyBalance: number;
}

/** What the counter needs to start an order; no spend or loyalty figures. */
export interface CustomerContact {
  id: string;
  username: string;
  phone: string;
  preferredName: string | null;
}

@Injectable()
export class CustomersService {
  private readonly logger = new Logger(CustomersService.name);

  constructor(
    private readonly store: Store,
    private readonly access: AccessControlService,
    private readonly settings: SettingsService,
    private readonly config: ConfigService,
  ) {}

  getProfile(actorId: string, customerId: string): Promise<CustomerView> {
    return this.store.transaction(async (tx) => {
      await this.access.requireCustomerAccess(tx, actorId, customerId);
      const user = await tx.users.findById(customerId);
      if (!user || user.role !== 'customer') {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Customer not found');
      }
      return this.toView(tx, user, await this.ensureProfile(tx, user.id));
    });
  }

  updateProfile(customerId: string, dto: UpdateCustomerProfileDto) {
    return this.store.transaction(async (tx) => {
      const user = await tx.users.findById(customerId);
      if (!user || user.role !== 'customer') {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Customer not found');
      }
      await this.ensureProfile(tx, customerId);
      const profile = await tx.customers.updateProfile(customerId, {
        preferredName: dto.preferredName,
        preferredCommunication: dto.preferredCommunication,
        specialInstructions: dto.specialInstructions,
        updatedAt: new Date(),
      });
      return this.toView(tx, user, profile);
    });
  }

  /** Counter registration for a customer without an account; the password is random and unknown to anyone. */
  registerWalkIn(actorId: string, dto: RegisterWalkInCustomerDto): Promise<CustomerView> {
    return this.store.transaction(async (tx) => {
      const grant = await this.access.resolve(tx, actorId);
      this.access.require(grant, Capability.REGISTER_CUSTOMERS);

      const phone = normalizePhone(dto.phone);
      const username = dto.username ?? phone;
      const email = dto.email?.toLowerCase() ?? null;
      if (await tx.users.findConflicting({ username, phone, email })) {
        throw new DomainError(ErrorKind.CONFLICT, 'A user with this phone, username or email already exists');
      }

      const passwordHash = await bcrypt.hash(randomBytes(24).toString('hex'), this.bcryptRounds());
      const user = await tx.users.insert({ username, phone, email, passwordHash, role: 'customer' });
      const profile = await tx.customers.insertProfile({
        userId: user.id,
        preferredName: dto.preferredName,
        preferredCommunication: dto.preferredCommunication,
      });
      this.logger.log({ msg: 'Walk-in customer registered', customerId: user.id, actorId, shopId: grant.shopId });
      return this.toView(tx, user, profile);
    });
  }

  lookupByPhone(actorId: string, rawPhone: string): Promise<CustomerContact> {
    return this.store.transaction(async (tx) => {
      const grant = await this.access.resolve(tx, actorId);
      this.access.require(grant, Capability.REGISTER_CUSTOMERS);
      const user = await tx.users.findByIdentifier(normalizePhone(rawPhone));
      if (!user || user.role !== 'customer') {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Customer not found');
      }
      const profile = await this.ensureProfile(tx, user.id);
      return { id: user.id, username: user.username, phone: user.phone, preferredName: profile.preferredName };
    });
  }

  async ensureProfile(tx: StoreTransaction, userId: string): Promise<CustomerProfile> {
    return (await tx.customers.findProfile(userId)) ?? tx.customers.insertProfile({ userId });
  }

  /** Rolls a completed order into the customer's spend and tier. Runs in the completion transaction. */
  async recordCompletedOrder(tx: StoreTransaction, order: Order, at: Date): Promise<CustomerProfile> {
    const profile = (await tx.customers.lockProfile(order.customerId)) ?? (await this.ensureProfile(tx, order.customerId));
    const totalSpentCents = profile.totalSpentCents + order.totalCents;
    const membershipTier = tierFor(totalSpentCents, this.settings.getMembershipThresholds());
    if (membershipTier !== profile.membershipTier) {
      this.logger.log({ msg: 'Membership tier changed', customerId: order.customerId, from: profile.membershipTier, to: membershipTier });
    }
    return tx.customers.updateProfile(order.customerId, {
      totalSpentCents,
      totalOrders: profile.totalOrders + 1,
      membershipTier,
      firstOrderAt: profile.firstOrderAt ?? at,
      lastOrderAt: at,
      updatedAt: at,
    });
  }

  private async toView(tx: StoreTransaction, user: User, profile: CustomerProfile): Promise<CustomerView> {
    return {
      id: user.id,
      username: user.username,
      phone: user.phone,
      email: user.email,
      profile,
      loyaltyBalance: await tx.loyalty.balance(user.id, new Date()),
    };
  }

  private bcryptRounds() {
    return this.config.get<number>('BCRYPT_ROUNDS') ?? 10;
  }
}
