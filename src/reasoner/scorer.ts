import type { Result } from '../errors.js';
import type { BmiCategory, Demographics, DiseaseProfile, PredictionResult } from '../types.js';
import { round } from '../utils/parse.js';
import { getProfile, type KnowledgeBase } from './knowledge.js';

// Divides the logit before the sigmoid; > 1 pulls probabilities toward 0.5.
export const CALIBRATION_TEMPERATURE = 1.8;

const PRIOR_FLOOR = 0.05;
const PRIOR_CEILING = 0.95;

export function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

export function calibratedSigmoid(z: number, temperature: number = CALIBRATION_TEMPERATURE): number {
  return sigmoid(z / temperature);
}

export function ageAdjustment(age?: number): number {
  if (age === undefined) return 0;
  if (age > 50) return 0.5;
  if (age < 20) return -0.5;
  return 0;
}

export function calculateBmi(heightCm?: number, weightKg?: number): number | null {
  if (!heightCm || !weightKg || heightCm <= 0 || weightKg <= 0) return null;
  const heightM = heightCm / 100;
  return weightKg / (heightM * heightM);
}

/** Applies to every disease; kept small so symptoms stay dominant. */
export function bmiEffect(bmi: number | null): number {
  if (bmi === null) return 0;
  if (bmi < 18.5) return 0.25;
  if (bmi < 25) return 0;
  if (bmi < 30) return 0.35;
  return 0.6;
}

export function bmiCategory(bmi: number | null): BmiCategory | null {
  if (bmi === null) return null;
  if (bmi < 18.5) return 'Underweight';
  if (bmi < 25) return 'Normal';
  if (bmi < 30) return 'Overweight';
  return 'Obese';
}

export function confidenceScore(matched: number, rawProbability: number, bmi: number | null): number {
  const symptomFactor = Math.min(1, matched / 5);
  const bmiFactor = bmi !== null && (bmi < 18.5 || bmi > 30) ? 0.1 : 0;
  return symptomFactor * 0.5 + rawProbability * 0.4 + bmiFactor;
}

export function scoreProfile(profile: DiseaseProfile, symptoms: Iterable<string>, demographics: Demographics = {}): PredictionResult {
  const observed = new Set(symptoms);
  let z = profile.bias + ageAdjustment(demographics.age);

  const bmi = calculateBmi(demographics.heightCm, demographics.weightKg);
  const effect = bmiEffect(bmi);
  z += effect;

  let matched = 0;
  for (const symptom of observed) {
    const weight = profile.symptomWeights.get(symptom);
    if (weight === undefined) continue;
    z += weight;
    matched++;
  }

  const rawProbability = sigmoid(z);
  return {
    disease: profile.key,
    rawProbability,
    calibratedProbability: calibratedSigmoid(z),
    prior: Math.min(PRIOR_CEILING, Math.max(PRIOR_FLOOR, rawProbability)),
    likelihood: 0.75 + rawProbability * 0.2,
    symptomsMatched: matched,
    totalSymptoms: observed.size,
    confidence: confidenceScore(matched, rawProbability, bmi),
    bmi: bmi === null ? null : round(bmi, 2),
    bmiCategory: bmiCategory(bmi),
    bmiEffect: effect
  };
}

export function scoreDisease(
  kb: KnowledgeBase,
  disease: string,
  symptoms: Iterable<string>,
  demographics: Demographics = {}
): Result<PredictionResult> {
  const profile = getProfile(kb, disease);
  if (!profile.ok) return profile;
  return { ok: true, value: scoreProfile(profile.value, symptoms, demographics) };
}

/** Differential over every known disease, highest calibrated probability first. */
export function predictAll(kb: KnowledgeBase, symptoms: Iterable<string>, demographics: Demographics = {}): PredictionResult[] {
  const observed = [...symptoms];
  const predictions: PredictionResult[] = [];
  for (const disease of kb.diseases) {
    const scored = scoreDisease(kb, disease, observed, demographics);
    if (!scored.ok) {
      console.error(`[Engine] Prediction failed for disease '${disease}': ${scored.error.message}`);
      continue;
    }
    predictions.push(scored.value);
  }
  return predictions.sort((a, b) => b.calibratedProbability - a.calibratedProbability);
}
