/** Two-decimal string for an amount held in cents. */
export function formatCents(cents: number): string {
  return (cents / 100).toFixed(2);
}
