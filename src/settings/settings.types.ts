export interface LoyaltyConfig {
  /** Points per order = floor(totalCents * earnPercent / 10000). */
  earnPercent: number;
  expiryDays: number;
  expiringSoonDays: number;
}

export interface OrderPolicy {
  numberPrefix: string;
  /** Largest quantity accepted on one order line. */
  maxItemQuantity: number;
}

export interface MembershipThresholds {
  silverCents: number;
  goldCents: number;
  platinumCents: number;
}
