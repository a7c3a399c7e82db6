import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoyaltyConfig, MembershipThresholds, OrderPolicy } from './settings.types';

const MEMBERSHIP_THRESHOLDS: MembershipThresholds = {
  silverCents: 20_000,
  goldCents: 50_000,
  platinumCents: 100_000,
};

@Injectable()
export class SettingsService {
  constructor(private readonly config: ConfigService) {}

  getLoyaltyConfig(): LoyaltyConfig {
    return {
      earnPercent: this.config.get<number>('LOYALTY_EARN_PERCENT') ?? 10,
      expiryDays: this.config.get<number>('LOYALTY_EXPIRY_DAYS') ?? 365,
      expiringSoonDays: this.config.get<number>('LOYALTY_EXPIRING_SOON_DAYS') ?? 30,
    };
  }

  getOrderPolicy(): OrderPolicy {
    return {
      numberPrefix: this.config.get<string>('ORDER_NUMBER_PREFIX') ?? 'ORD',
      maxItemQuantity: this.config.get<number>('ORDER_MAX_ITEM_QUANTITY') ?? 1000,
    };
  }

  getMembershipThresholds(): MembershipThresholds {
    return MEMBERSHIP_THRESHOLDS;
  }
}
