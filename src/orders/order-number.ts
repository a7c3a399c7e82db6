/** `ORD-2025-0001`; the sequence widens past four digits instead of wrapping. */
export function formatOrderNumber(prefix: string, year: number, sequence: number): string {
  return `${prefix}-${year}-${String(sequence).padStart(4, '0')}`;
}
