import { Logger } from '@nestjs/common';
import { DomainError, ErrorKind } from '../common/errors';
import type {
  CustomerAddress,
  CustomerProfile,
  Item,
  LoyaltyEntry,
  LoyaltyEntryType,
  MembershipTier,
  NewCustomerAddress,
  NewCustomerProfile,
  NewItem,
  NewLoyaltyEntry,
  NewNotification,
  NewOrder,
  NewOrderItem,
  NewOrderStatusHistory,
  NewRefreshSession,
  NewService,
  NewServicePrice,
  NewShop,
  NewShopStaff,
  NewUser,
  Notification,
  NotificationStatus,
  Order,
  OrderItem,
  OrderStatus,
  OrderStatusHistory,
  RefreshSession,
  Service,
  ServicePrice,
  Shop,
  ShopStaff,
  User,
} from './schema';

export interface PageRequest {
  skip: number;
  take: number;
}

export interface PageResult<T> {
  items: T[];
  total: number;
}

export interface PricedPair {
  price: ServicePrice;
  itemName: string;
  serviceName: string;
}

export type UserPatch = Partial<Pick<User, 'role' | 'email' | 'phone' | 'isActive' | 'updatedAt'>>;
export type ShopPatch = Partial<Pick<Shop, 'name' | 'address' | 'phone' | 'isActive' | 'updatedAt'>>;
export type StaffPatch = Partial<
  Pick<
    ShopStaff,
    'position' | 'isActive' | 'canTakeOrders' | 'canUpdateOrders' | 'canRegisterCustomers' | 'updatedAt'
  >
>;
export type CatalogEntryPatch = Partial<Pick<Service, 'name' | 'description' | 'isActive' | 'updatedAt'>>;
export type ServicePricePatch = Partial<Pick<ServicePrice, 'priceCents' | 'isActive' | 'updatedAt'>>;
export type CustomerProfilePatch = Partial<Omit<CustomerProfile, 'userId' | 'createdAt'>>;
export type OrderPatch = Partial<
  Pick<
    Order,
    | 'status'
    | 'totalCents'
    | 'loyaltyPointsEarned'
    | 'version'
    | 'completedAt'
    | 'cancelledAt'
    | 'updatedAt'
  >
>;
export type AddressPatch = Partial<Omit<CustomerAddress, 'id' | 'customerId' | 'createdAt'>>;
export type NotificationPatch = Partial<Pick<Notification, 'status' | 'readAt'>>;

export interface UserRepository {
  findById(id: string): Promise<User | undefined>;
  /** Matches on username, phone or email. */
  findByIdentifier(identifier: string): Promise<User | undefined>;
  findConflicting(input: { username: string; phone: string; email?: string | null }): Promise<User | undefined>;
  insert(values: NewUser): Promise<User>;
  update(id: string, patch: UserPatch): Promise<User>;
}

export interface RefreshSessionRepository {
  insert(values: NewRefreshSession): Promise<RefreshSession>;
  findByJti(jti: string): Promise<RefreshSession | undefined>;
  revoke(jti: string, at: Date): Promise<void>;
}

export interface ShopRepository {
  findById(id: string): Promise<Shop | undefined>;
  findByOwner(ownerId: string): Promise<Shop | undefined>;
  list(filter: { activeOnly: boolean }): Promise<Shop[]>;
  insert(values: NewShop): Promise<Shop>;
  update(id: string, patch: ShopPatch): Promise<Shop>;
}

export interface StaffRepository {
  findById(id: string): Promise<ShopStaff | undefined>;
  findByUser(userId: string): Promise<ShopStaff | undefined>;
  listByShop(shopId: string): Promise<ShopStaff[]>;
  insert(values: NewShopStaff): Promise<ShopStaff>;
  update(id: string, patch: StaffPatch): Promise<ShopStaff>;
}

export interface CatalogRepository {
  findService(id: string): Promise<Service | undefined>;
  findServiceByName(shopId: string, name: string): Promise<Service | undefined>;
  listServices(shopId: string, filter: { activeOnly: boolean }): Promise<Service[]>;
  insertService(values: NewService): Promise<Service>;
  updateService(id: string, patch: CatalogEntryPatch): Promise<Service>;

  findItem(id: string): Promise<Item | undefined>;
  findItemByName(shopId: string, name: string): Promise<Item | undefined>;
  listItems(shopId: string, filter: { activeOnly: boolean }): Promise<Item[]>;
  insertItem(values: NewItem): Promise<Item>;
  updateItem(id: string, patch: CatalogEntryPatch): Promise<Item>;

  findPrice(id: string): Promise<ServicePrice | undefined>;
  findPriceByTriple(shopId: string, serviceId: string, itemId: string): Promise<ServicePrice | undefined>;
  listPrices(shopId: string, filter: { activeOnly: boolean }): Promise<ServicePrice[]>;
  insertPrice(values: NewServicePrice): Promise<ServicePrice>;
  updatePrice(id: string, patch: ServicePricePatch): Promise<ServicePrice>;
  /** Active prices whose item and service are active too. */
  findActivePrices(shopId: string, pairs: Array<{ itemId: string; serviceId: string }>): Promise<PricedPair[]>;
}

export interface CustomerRepository {
  findProfile(userId: string): Promise<CustomerProfile | undefined>;
  /** Row lock held until the surrounding transaction ends. */
  lockProfile(userId: string): Promise<CustomerProfile | undefined>;
  insertProfile(values: NewCustomerProfile): Promise<CustomerProfile>;
  updateProfile(userId: string, patch: CustomerProfilePatch): Promise<CustomerProfile>;
  listServedByShop(
    shopId: string,
    filter: ServedCustomerFilter,
    page: PageRequest,
  ): Promise<PageResult<ServedCustomer>>;
  allServedByShop(shopId: string): Promise<ServedCustomer[]>;
}

export interface AddressRepository {
  /** Active addresses, default first, then by label. */
  listActive(customerId: string): Promise<CustomerAddress[]>;
  findById(id: string): Promise<CustomerAddress | undefined>;
  findActiveByLabel(customerId: string, label: string): Promise<CustomerAddress | undefined>;
  insert(values: NewCustomerAddress): Promise<CustomerAddress>;
  update(id: string, patch: AddressPatch): Promise<CustomerAddress>;
  clearDefault(customerId: string): Promise<void>;
}

export type ServedCustomerSort = 'recent' | 'spent' | 'name';

export interface ServedCustomerFilter {
  /** Case-insensitive match on username, email, phone or preferred name. */
  search?: string;
  tier?: MembershipTier;
  sort?: ServedCustomerSort;
}

/** A customer with at least one order at the shop. */
export interface ServedCustomer {
  user: Pick<User, 'id' | 'username' | 'email' | 'phone'>;
  profile: CustomerProfile;
}

export interface OrderRepository {
  /** Increments and returns the per-shop, per-year counter. */
  nextSequence(shopId: string, year: number): Promise<number>;
  insert(values: NewOrder): Promise<Order>;
  findById(id: string): Promise<Order | undefined>;
  /** Row lock held until the surrounding transaction ends. */
  lockById(id: string): Promise<Order | undefined>;
  update(id: string, patch: OrderPatch): Promise<Order>;
  listByCustomer(customerId: string, page: PageRequest): Promise<PageResult<Order>>;
  listByShop(shopId: string, filter: { status?: OrderStatus }, page: PageRequest): Promise<PageResult<Order>>;
  /** Oldest first. */
  listByCustomerAtShop(customerId: string, shopId: string, filter: { status?: OrderStatus }): Promise<Order[]>;
  customerHasOrderAt(customerId: string, shopId: string): Promise<boolean>;
  countByShop(shopId: string, filter: { statuses?: OrderStatus[]; createdSince?: Date }): Promise<number>;
  delete(id: string): Promise<void>;

  insertItems(values: NewOrderItem[]): Promise<OrderItem[]>;
  listItems(orderId: string): Promise<OrderItem[]>;
  listItemsOf(orderIds: string[]): Promise<OrderItem[]>;
  deleteItem(id: string): Promise<void>;
  deleteItemsOf(orderId: string): Promise<void>;

  insertHistory(values: NewOrderStatusHistory): Promise<OrderStatusHistory>;
  listHistory(orderId: string): Promise<OrderStatusHistory[]>;
  deleteHistoryOf(orderId: string): Promise<void>;
}

export interface LoyaltyRepository {
  insert(values: NewLoyaltyEntry): Promise<LoyaltyEntry>;
  /** Every entry of the customer, oldest first. */
  listByCustomer(customerId: string): Promise<LoyaltyEntry[]>;
  /** Newest first. */
  recent(customerId: string, limit: number): Promise<LoyaltyEntry[]>;
  /** Newest first. */
  listPage(customerId: string, filter: { type?: LoyaltyEntryType }, page: PageRequest): Promise<PageResult<LoyaltyEntry>>;
  /** Sum of entries that have not expired at `at`. */
  balance(customerId: string, at: Date): Promise<number>;
  /** Per-customer {@link LoyaltyRepository.balance}; customers without entries are absent. */
  balances(customerIds: string[], at: Date): Promise<Map<string, number>>;
  detachOrder(orderId: string): Promise<void>;
}

export interface NotificationRepository {
  insert(values: NewNotification): Promise<Notification>;
  findById(id: string): Promise<Notification | undefined>;
  listByRecipient(
    recipientId: string,
    filter: { status?: NotificationStatus },
    page: PageRequest,
  ): Promise<PageResult<Notification>>;
  update(id: string, patch: NotificationPatch): Promise<Notification>;
}

export interface StoreTransaction {
  users: UserRepository;
  refreshSessions: RefreshSessionRepository;
  shops: ShopRepository;
  staff: StaffRepository;
  catalog: CatalogRepository;
  customers: CustomerRepository;
  addresses: AddressRepository;
  orders: OrderRepository;
  loyalty: LoyaltyRepository;
  notifications: NotificationRepository;
}

export type TransactionWork<T> = (tx: StoreTransaction) => Promise<T>;

/**
 * Transactional gateway to durable state. Every read and write goes through
 * {@link Store.transaction}; a conflict is retried once before it surfaces.
 */
export abstract class Store {
  protected readonly logger = new Logger(Store.name);

  async transaction<T>(work: TransactionWork<T>): Promise<T> {
    try {
      return await this.runTransaction(work);
    } catch (err) {
      if (err instanceof DomainError && err.kind === ErrorKind.CONCURRENCY_CONFLICT) {
        this.logger.warn({ msg: 'Transaction conflict, retrying once', reason: err.userMessage });
        return this.runTransaction(work);
      }
      throw err;
    }
  }

  protected abstract runTransaction<T>(work: TransactionWork<T>): Promise<T>;

  abstract ping(): Promise<void>;
}
