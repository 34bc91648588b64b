import type { Result } from '../errors.js';
import type {
  Demographics,
  LikelihoodPosterior,
  MissingSymptomEntry,
  PosteriorPolicy,
  PredictionResult,
  RiskAssessment,
  RiskCounts,
  RiskPercentages,
  TestPosterior
} from '../types.js';
import { posteriorFromPriorLikelihood, posteriorFromTest, riskLevelFromPercentage } from './bayes.js';
import { listDiseases, resolveDiseaseKey, symptomImportance, symptomsFor, type KnowledgeBase } from './knowledge.js';
import { missingSymptoms } from './missingSymptoms.js';
import { reconcilePercentages } from './reconcile.js';
import { predictAll, scoreDisease } from './scorer.js';

export interface PredictionEngine {
  readonly knowledge: KnowledgeBase;
  resolve(name: string): Result<string>;
  listDiseases(): string[];
  symptomsFor(name: string): Result<Record<string, string>>;
  symptomImportance(name: string): Result<{ key: string; name: string; weight: number }[]>;
  score(disease: string, symptoms: Iterable<string>, demographics?: Demographics): Result<PredictionResult>;
  predictAll(symptoms: Iterable<string>, demographics?: Demographics): PredictionResult[];
  missing(disease: string, present: Iterable<string>): MissingSymptomEntry[];
  posteriorFromPriorLikelihood(prior: number, likelihood: number, falsePositiveRate?: number, policy?: PosteriorPolicy): Result<LikelihoodPosterior>;
  posteriorFromTest(prior: number, sensitivity: number, specificity: number, testResult: string, policy?: PosteriorPolicy): Result<TestPosterior>;
  riskLevelFromPercentage(percentage: number): RiskAssessment;
  reconcile(counts: RiskCounts): Result<RiskPercentages>;
}

/** Binds every engine operation to one knowledge base. */
export function createPredictionEngine(kb: KnowledgeBase): PredictionEngine {
  return Object.freeze({
    knowledge: kb,
    resolve: (name: string) => resolveDiseaseKey(kb, name),
    listDiseases: () => listDiseases(kb),
    symptomsFor: (name: string) => symptomsFor(kb, name),
    symptomImportance: (name: string) => symptomImportance(kb, name),
    score: (disease: string, symptoms: Iterable<string>, demographics?: Demographics) => scoreDisease(kb, disease, symptoms, demographics),
    predictAll: (symptoms: Iterable<string>, demographics?: Demographics) => predictAll(kb, symptoms, demographics),
    missing: (disease: string, present: Iterable<string>) => missingSymptoms(kb, disease, present),
    posteriorFromPriorLikelihood,
    posteriorFromTest,
    riskLevelFromPercentage,
    reconcile: reconcilePercentages
  });
}
