// Likelihood ratios

/**
 * Likelihood ratio of evidence with strength `s` in [0, 1].
 *
 * Mixes the active and inactive likelihoods by strength:
 * `s = 1` gives tp / fp, `s = 0` gives (1 - tp) / (1 - fp), and
 * `s = 0.5` gives exactly 1 (no information).
 */
export function likelihoodRatio(strength: number, pTruePositive: number, pFalsePositive: number): number {
  if (strength === 0.5) return 1;
  const occupied = strength * pTruePositive + (1 - strength) * (1 - pTruePositive);
  const unoccupied = strength * pFalsePositive + (1 - strength) * (1 - pFalsePositive);
  return occupied / unoccupied;
}
