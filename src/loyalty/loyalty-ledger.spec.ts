import { allocate, balanceOf, earnedPoints, expiringWithin, openLots } from './loyalty-ledger';

describe('loyalty-ledger', () => {
  const jan1 = new Date('2025-01-01T00:00:00Z');
  const feb1 = new Date('2025-02-01T00:00:00Z');
  const mar1 = new Date('2025-03-01T00:00:00Z');

  const entry = (id: string, points: number, expiresAt: Date | null, consumesEntryId: string | null = null) => ({
    id,
    points,
    expiresAt,
    consumesEntryId,
    createdAt: jan1,
  });

  describe('openLots', () => {
    it('orders lots by expiry with non-expiring lots last', () => {
      const lots = openLots([entry('a', 100, mar1), entry('b', 50, feb1), entry('c', 30, null)], jan1);
      expect(lots.map((lot) => lot.entryId)).toEqual(['b', 'a', 'c']);
    });

    it('subtracts what negative entries already drew', () => {
      const lots = openLots([entry('a', 100, mar1), entry('r1', -40, mar1, 'a'), entry('b', 10, null)], jan1);
      expect(lots).toEqual([
        { entryId: 'a', remaining: 60, expiresAt: mar1 },
        { entryId: 'b', remaining: 10, expiresAt: null },
      ]);
    });

    it('drops exhausted and expired lots', () => {
      const lots = openLots(
        [entry('a', 20, mar1), entry('r1', -20, mar1, 'a'), entry('b', 50, feb1), entry('c', 5, null)],
        new Date('2025-02-15T00:00:00Z'),
      );
      expect(lots.map((lot) => lot.entryId)).toEqual(['c']);
    });
  });

  describe('balanceOf', () => {
    it('never goes negative once a partly redeemed lot expires', () => {
      const entries = [entry('a', 100, feb1), entry('r1', -60, feb1, 'a'), entry('bonus', 20, null)];
      expect(balanceOf(entries, jan1)).toBe(60);
      expect(balanceOf(entries, new Date('2025-02-02T00:00:00Z'))).toBe(20);
    });

    it('treats the expiry instant as expired', () => {
      expect(balanceOf([entry('a', 10, feb1)], feb1)).toBe(0);
    });
  });

  describe('allocate', () => {
    it('splits a draw across lots in order', () => {
      const lots = openLots([entry('a', 30, feb1), entry('b', 100, mar1)], jan1);
      const draws = allocate(lots, 50);
      expect(draws.map((d) => [d.lot.entryId, d.points])).toEqual([
        ['a', 30],
        ['b', 20],
      ]);
    });

    it('fails with InsufficientPoints when the lots do not cover the draw', () => {
      const lots = openLots([entry('a', 50, feb1)], jan1);
      expect(() => allocate(lots, 100)).toThrow(expect.objectContaining({ kind: 'InsufficientPoints' }));
    });
  });

  describe('expiringWithin', () => {
    it('sums lots expiring inside the window', () => {
      const lots = openLots([entry('a', 40, new Date('2025-01-06T00:00:00Z')), entry('b', 100, mar1), entry('c', 7, null)], jan1);
      expect(expiringWithin(lots, jan1, 7)).toBe(40);
    });
  });

  describe('earnedPoints', () => {
    it('rounds down', () => {
      expect(earnedPoints(2500, 10)).toBe(2);
      expect(earnedPoints(2500, 100)).toBe(25);
      expect(earnedPoints(99, 100)).toBe(0);
    });
  });
});
