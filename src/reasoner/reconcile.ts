import { fail, ok, type Result } from '../errors.js';
import type { RiskCounts, RiskDistribution, RiskLevel, RiskPercentages } from '../types.js';

export const RISK_LEVELS: readonly RiskLevel[] = ['low', 'medium', 'high', 'critical'];

/**
 * Largest-remainder allocation: floor every share, then hand the leftover
 * points to the largest fractional parts (lower index first on ties,
 * cycling if there are more points than entries).
 */
export function reconcilePercentages(counts: RiskCounts): Result<RiskPercentages> {
  for (const [i, c] of counts.entries()) {
    if (!Number.isInteger(c) || c < 0) {
      return fail('validation', `Count at index ${i} must be a non-negative integer. Got ${c}`, { index: i, value: c });
    }
  }

  const total = counts[0] + counts[1] + counts[2] + counts[3];
  if (total === 0) return ok([0, 0, 0, 0]);

  // integer arithmetic: equal shares must compare equal
  const share = (c: number) => Math.floor((c * 100) / total);
  const base: RiskPercentages = [share(counts[0]), share(counts[1]), share(counts[2]), share(counts[3])];
  const rem = counts.map(c => (c * 100) % total);
  const remainder = 100 - (base[0] + base[1] + base[2] + base[3]);

  const order = [0, 1, 2, 3].sort((a, b) => rem[b] - rem[a] || a - b);
  for (let i = 0; i < remainder; i++) base[order[i % order.length]] += 1;
  return ok(base);
}

export function riskDistribution(counts: RiskCounts): Result<RiskDistribution> {
  const pct = reconcilePercentages(counts);
  if (!pct.ok) return pct;
  return ok({
    low: { count: counts[0], percentage: pct.value[0] },
    medium: { count: counts[1], percentage: pct.value[1] },
    high: { count: counts[2], percentage: pct.value[2] },
    critical: { count: counts[3], percentage: pct.value[3] }
  });
}

export function countRiskLevels(levels: Iterable<RiskLevel>): RiskCounts {
  const counts: [number, number, number, number] = [0, 0, 0, 0];
  for (const level of levels) counts[RISK_LEVELS.indexOf(level)] += 1;
  return counts;
}
