import { DomainError, ErrorKind } from '../common/errors';
import type { LoyaltyEntry } from '../database/schema';

type LedgerEntry = Pick<LoyaltyEntry, 'id' | 'points' | 'expiresAt' | 'consumesEntryId' | 'createdAt'>;

/** A positive entry together with what is left of it. */
export interface PointLot {
  entryId: string;
  remaining: number;
  expiresAt: Date | null;
}

export interface LotDraw {
  lot: PointLot;
  points: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const isLive = (entry: Pick<LoyaltyEntry, 'expiresAt'>, at: Date) =>
  !entry.expiresAt || entry.expiresAt.getTime() > at.getTime();

export function balanceOf(entries: readonly LedgerEntry[], at: Date): number {
  return entries.filter((entry) => isLive(entry, at)).reduce((sum, entry) => sum + entry.points, 0);
}

/**
 * Unexpired lots with points left, soonest-expiring first. Lots that never
 * expire come last; ties break on age.
 */
export function openLots(entries: readonly LedgerEntry[], at: Date): PointLot[] {
  const drawn = new Map<string, number>();
  for (const entry of entries) {
    if (entry.points < 0 && entry.consumesEntryId) {
      drawn.set(entry.consumesEntryId, (drawn.get(entry.consumesEntryId) ?? 0) - entry.points);
    }
  }

  return entries
    .filter((entry) => entry.points > 0 && isLive(entry, at))
    .map((entry) => ({
      entry,
      lot: { entryId: entry.id, remaining: entry.points - (drawn.get(entry.id) ?? 0), expiresAt: entry.expiresAt },
    }))
    .filter(({ lot }) => lot.remaining > 0)
    .sort((a, b) => {
      const aExp = a.lot.expiresAt?.getTime() ?? Number.POSITIVE_INFINITY;
      const bExp = b.lot.expiresAt?.getTime() ?? Number.POSITIVE_INFINITY;
      if (aExp !== bExp) return aExp < bExp ? -1 : 1;
      return a.entry.createdAt.getTime() - b.entry.createdAt.getTime();
    })
    .map(({ lot }) => lot);
}

/** Splits `points` across lots in order; fails when the lots cannot cover it. */
export function allocate(lots: readonly PointLot[], points: number): LotDraw[] {
  const available = lots.reduce((sum, lot) => sum + lot.remaining, 0);
  if (points > available) {
    throw new DomainError(
      ErrorKind.INSUFFICIENT_POINTS,
      `Not enough loyalty points: requested ${points}, available ${available}`,
    );
  }
  const draws: LotDraw[] = [];
  let outstanding = points;
  for (const lot of lots) {
    if (outstanding === 0) break;
    const take = Math.min(lot.remaining, outstanding);
    draws.push({ lot, points: take });
    outstanding -= take;
  }
  return draws;
}

export function expiringWithin(lots: readonly PointLot[], at: Date, days: number): number {
  const horizon = at.getTime() + days * DAY_MS;
  return lots
    .filter((lot) => lot.expiresAt !== null && lot.expiresAt.getTime() <= horizon)
    .reduce((sum, lot) => sum + lot.remaining, 0);
}

export function earnedPoints(totalCents: number, earnPercent: number): number {
  return Math.floor((totalCents * earnPercent) / 10000);
}

export function addDays(from: Date, days: number): Date {
  return new Date(from.getTime() + days * DAY_MS);
}
