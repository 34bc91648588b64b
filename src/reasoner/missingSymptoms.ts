import type { MissingSymptomEntry } from '../types.js';
import { displayName, getProfile, type KnowledgeBase } from './knowledge.js';

export const MISSING_WEIGHT_THRESHOLD = 0.75;
export const MAX_MISSING = 5;

/**
 * High-weight symptoms of a disease that the patient did not report,
 * strongest first. Unknown diseases give an empty list instead of an error.
 */
export function missingSymptoms(kb: KnowledgeBase, disease: string, present: Iterable<string>): MissingSymptomEntry[] {
  const profile = getProfile(kb, disease);
  if (!profile.ok) return [];

  const reported = new Set(present);
  const missing: MissingSymptomEntry[] = [];
  for (const [key, weight] of profile.value.symptomWeights) {
    if (reported.has(key) || weight < MISSING_WEIGHT_THRESHOLD) continue;
    missing.push({ key, name: displayName(kb, key), weight });
  }
  return missing.sort((a, b) => b.weight - a.weight).slice(0, MAX_MISSING);
}
