import type { Result } from './errors.js';
import type { PredictionStore } from './predictionStore.js';
import { countRiskLevels, riskDistribution } from './reasoner/reconcile.js';
import type { PredictionRecord, RiskDistribution } from './types.js';
import { round } from './utils/parse.js';

const NEW_CASE_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

export interface DoctorDashboard {
  totalPatients: number;
  newCases: number;
  highRiskCount: number;
  criticalRiskCount: number;
  riskDistribution: RiskDistribution;
  lastUpdated: string;
}

export interface PatientDashboard {
  statistics: {
    totalPredictions: number;
    highRiskCount: number;
    criticalRiskCount: number;
    mostCommonDisease: string | null;
    lastPredictionDate: string | null;
    lastDisease: string | null;
  };
  predictions: PredictionRecord[];
  riskDistribution: RiskDistribution;
  lastUpdated: string;
}

export async function doctorDashboard(store: PredictionStore, now: Date = new Date()): Promise<Result<DoctorDashboard>> {
  const records = await store.all();
  const counts = await store.riskCounts();
  const distribution = riskDistribution(counts);
  if (!distribution.ok) return distribution;

  const since = now.getTime() - NEW_CASE_WINDOW_MS;
  return {
    ok: true,
    value: {
      totalPatients: records.length,
      newCases: records.filter(r => Date.parse(r.timestamp) >= since).length,
      highRiskCount: counts[2],
      criticalRiskCount: counts[3],
      riskDistribution: distribution.value,
      lastUpdated: now.toISOString()
    }
  };
}

/** Per-patient view. Percentages here are plain one-decimal shares and may not sum to 100. */
export async function patientDashboard(store: PredictionStore, patientId: string, now: Date = new Date()): Promise<PatientDashboard> {
  const predictions = (await store.forPatient(patientId))
    .slice()
    .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp));
  const total = predictions.length;
  const counts = countRiskLevels(predictions.map(p => p.riskLevel));

  const diseaseCounts = new Map<string, number>();
  for (const p of predictions) diseaseCounts.set(p.disease, (diseaseCounts.get(p.disease) ?? 0) + 1);
  let mostCommonDisease: string | null = null;
  let best = 0;
  for (const [disease, n] of diseaseCounts) {
    if (n > best) { best = n; mostCommonDisease = disease; }
  }

  const share = (i: number) => ({ count: counts[i], percentage: total > 0 ? round((counts[i] / total) * 100, 1) : 0 });
  const distribution: RiskDistribution = { low: share(0), medium: share(1), high: share(2), critical: share(3) };

  const latest: PredictionRecord | undefined = predictions[0];
  return {
    statistics: {
      totalPredictions: total,
      highRiskCount: counts[2],
      criticalRiskCount: counts[3],
      mostCommonDisease,
      lastPredictionDate: latest?.timestamp ?? null,
      lastDisease: latest?.disease ?? null
    },
    predictions,
    riskDistribution: distribution,
    lastUpdated: now.toISOString()
  };
}
