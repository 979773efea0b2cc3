// Threshold Decision

/**
 * Occupancy decision: `probability >= threshold / 100`.
 * Pure and stateless; equality counts as occupied.
 */
export function isOccupied(probability: number, thresholdPercent: number): boolean {
  return probability >= thresholdPercent / 100;
}
