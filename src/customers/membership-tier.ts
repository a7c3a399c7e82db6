import type { MembershipTier } from '../database/schema';
import type { MembershipThresholds } from '../settings/settings.types';

export function tierFor(totalSpentCents: number, thresholds: MembershipThresholds): MembershipTier {
  if (totalSpentCents >= thresholds.platinumCents) return 'platinum';
  if (totalSpentCents >= thresholds.goldCents) return 'gold';
  if (totalSpentCents >= thresholds.silverCents) return 'silver';
  return 'bronze';
}
