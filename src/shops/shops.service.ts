import { Injectable, Logger } from '@nestjs/common';
import { AccessControlService } from '../access/access-control.service';
import { Capability } from '../access/capabilities';
import { DomainError, ErrorKind } from '../common/errors';
import { normalizePhone } from '../common/utils/phone.util';
import { Shop, ShopStaff, User } from '../database/schema';
import { Store, StoreTransaction } from '../database/store';
import { AddStaffDto, CreateShopDto, UpdateShopDto, UpdateStaffDto } from './dto/shop.dto';

const RECENT_ORDER_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

interface DashboardBase {
  user: Pick<User, 'id' | 'username' | 'role'>;
  shop: Pick<Shop, 'id' | 'name' | 'address'>;
}

export interface StaffDashboard extends DashboardBase {
  kind: 'staff';
  staff: {
    position: string;
    isActive: boolean;
    since: Date;
    permissions: Pick<ShopStaff, 'canTakeOrders' | 'canUpdateOrders' | 'canRegisterCustomers'>;
  };
  stats: { totalOrders: number; ordersLast7Days: number; pendingOrders: number };
}

export interface OwnerDashboard extends DashboardBase {
  kind: 'owner';
  staffStats: { activeStaff: number; totalStaff: number };
}

export type Dashboard = StaffDashboard | OwnerDashboard;

@Injectable()
export class ShopsService {
  private readonly logger = new Logger(ShopsService.name);

  constructor(
    private readonly store: Store,
    private readonly access: AccessControlService,
  ) {}

  listActive(): Promise<Shop[]> {
    return this.store.transaction((tx) => tx.shops.list({ activeOnly: true }));
  }

  getPublic(shopId: string): Promise<Shop> {
    return this.store.transaction(async (tx) => {
      const shop = await tx.shops.findById(shopId);
      if (!shop || !shop.isActive) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'Shop not found');
      }
      return shop;
    });
  }

  /** The caller's own shop, for owners and staff. */
  getMine(actorId: string): Promise<Shop> {
    return this.store.transaction(async (tx) => {
      const grant = await this.access.resolve(tx, actorId);
      const shop = grant.shopId ? await tx.shops.findById(grant.shopId) : undefined;
      if (!shop) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'You are not attached to a shop');
      }
      return shop;
    });
  }

  /** Landing view for the caller's shop; staff see order workload, owners see their team. */
  getDashboard(actorId: string): Promise<Dashboard> {
    return this.store.transaction(async (tx) => {
      const grant = await this.access.resolve(tx, actorId);
      const user = await tx.users.findById(actorId);
      const shop = grant.shopId ? await tx.shops.findById(grant.shopId) : undefined;
      if (!user || !shop) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'You are not attached to a shop');
      }
      const base: DashboardBase = {
        user: { id: user.id, username: user.username, role: user.role },
        shop: { id: shop.id, name: shop.name, address: shop.address },
      };

      if (grant.role === 'shop_owner') {
        const members = await tx.staff.listByShop(shop.id);
        return {
          ...base,
          kind: 'owner',
          staffStats: { activeStaff: members.filter((m) => m.isActive).length, totalStaff: members.length },
        };
      }

      const staff = await tx.staff.findByUser(actorId);
      if (!staff) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'You are not attached to a shop');
      }
      const now = Date.now();
      return {
        ...base,
        kind: 'staff',
        staff: {
          position: staff.position,
          isActive: staff.isActive,
          since: staff.createdAt,
          permissions: {
            canTakeOrders: staff.canTakeOrders,
            canUpdateOrders: staff.canUpdateOrders,
            canRegisterCustomers: staff.canRegisterCustomers,
          },
        },
        stats: {
          totalOrders: await tx.orders.countByShop(shop.id, {}),
          ordersLast7Days: await tx.orders.countByShop(shop.id, {
            createdSince: new Date(now - RECENT_ORDER_WINDOW_MS),
          }),
          pendingOrders: await tx.orders.countByShop(shop.id, { statuses: ['received', 'in_progress'] }),
        },
      };
    });
  }

  create(actorId: string, dto: CreateShopDto): Promise<Shop> {
    return this.store.transaction(async (tx) => {
      const owner = await tx.users.findById(actorId);
      if (!owner || !owner.isActive || owner.role !== 'shop_owner') {
        throw new DomainError(ErrorKind.FORBIDDEN, 'Only shop owners can open a shop');
      }
      if (await tx.shops.findByOwner(actorId)) {
        throw new DomainError(ErrorKind.CONFLICT, 'You already own a shop');
      }
      const shop = await tx.shops.insert({
        ownerId: actorId,
        name: dto.name,
        address: dto.address,
        phone: normalizePhone(dto.phone),
      });
      this.logger.log({ msg: 'Shop created', shopId: shop.id, ownerId: actorId });
      return shop;
    });
  }

  update(actorId: string, shopId: string, dto: UpdateShopDto): Promise<Shop> {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      const shop = await tx.shops.update(shopId, {
        name: dto.name,
        address: dto.address,
        phone: dto.phone === undefined ? undefined : normalizePhone(dto.phone),
        isActive: dto.isActive,
        updatedAt: new Date(),
      });
      if (dto.isActive === false) {
        this.logger.warn({ msg: 'Shop deactivated', shopId, actorId });
      }
      return shop;
    });
  }

  listStaff(actorId: string, shopId: string): Promise<ShopStaff[]> {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      return tx.staff.listByShop(shopId);
    });
  }

  /**
   * Attaches a customer or detached staff account to the shop and gives it
   * the staff role. A user works for one shop at most.
   */
  addStaff(actorId: string, shopId: string, dto: AddStaffDto): Promise<ShopStaff> {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      const user = await tx.users.findById(dto.userId);
      if (!user || !user.isActive) {
        throw new DomainError(ErrorKind.NOT_FOUND, 'User not found');
      }
      if (user.role === 'admin' || user.role === 'shop_owner') {
        throw new DomainError(ErrorKind.CONFLICT, `A ${user.role} cannot be added as staff`);
      }

      const now = new Date();
      const flags = {
        canTakeOrders: dto.canTakeOrders ?? true,
        canUpdateOrders: dto.canUpdateOrders ?? true,
        canRegisterCustomers: dto.canRegisterCustomers ?? true,
      };
      const existing = await tx.staff.findByUser(user.id);
      let staff: ShopStaff;
      if (existing) {
        if (existing.shopId !== shopId || existing.isActive) {
          throw new DomainError(ErrorKind.CONFLICT, 'User is already staff at a shop');
        }
        staff = await tx.staff.update(existing.id, { ...flags, position: dto.position, isActive: true, updatedAt: now });
      } else {
        staff = await tx.staff.insert({ shopId, userId: user.id, position: dto.position, ...flags });
      }
      if (user.role !== 'staff') {
        await tx.users.update(user.id, { role: 'staff', updatedAt: now });
      }
      this.logger.log({ msg: 'Staff added', shopId, staffId: staff.id, userId: user.id, actorId });
      return staff;
    });
  }

  updateStaff(actorId: string, shopId: string, staffId: string, dto: UpdateStaffDto): Promise<ShopStaff> {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      await this.requireStaff(tx, shopId, staffId);
      return tx.staff.update(staffId, {
        position: dto.position,
        isActive: dto.isActive,
        canTakeOrders: dto.canTakeOrders,
        canUpdateOrders: dto.canUpdateOrders,
        canRegisterCustomers: dto.canRegisterCustomers,
        updatedAt: new Date(),
      });
    });
  }

  deactivateStaff(actorId: string, shopId: string, staffId: string): Promise<ShopStaff> {
    return this.store.transaction(async (tx) => {
      await this.authorize(tx, actorId, shopId);
      await this.requireStaff(tx, shopId, staffId);
      const staff = await tx.staff.update(staffId, { isActive: false, updatedAt: new Date() });
      this.logger.log({ msg: 'Staff deactivated', shopId, staffId, actorId });
      return staff;
    });
  }

  private async authorize(tx: StoreTransaction, actorId: string, shopId: string) {
    if (!(await tx.shops.findById(shopId))) {
      throw new DomainError(ErrorKind.NOT_FOUND, 'Shop not found');
    }
    const grant = await this.access.resolve(tx, actorId);
    this.access.require(grant, Capability.MANAGE_SHOP, shopId);
  }

  private async requireStaff(tx: StoreTransaction, shopId: string, staffId: string) {
    const staff = await tx.staff.findById(staffId);
    if (!staff || staff.shopId !== shopId) {
      throw new DomainError(ErrorKind.NOT_FOUND, 'Staff member not found');
    }
    return staff;
  }
}
