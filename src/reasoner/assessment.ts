import { ok, type Result } from '../errors.js';
import type {
  Demographics,
  LikelihoodPosterior,
  MissingSymptomEntry,
  PredictionResult,
  RiskAssessment,
  RiskLevel
} from '../types.js';
import { DEFAULT_FALSE_POSITIVE_RATE, storedRiskLevel } from './bayes.js';
import type { PredictionEngine } from './engine.js';

export interface AssessmentRequest {
  disease: string;
  symptoms: string[];
  demographics?: Demographics;
}

export interface Assessment {
  prediction: PredictionResult;
  bayesian: LikelihoodPosterior;
  risk: RiskAssessment;
  riskLevel: RiskLevel;
  missingSymptoms: MissingSymptomEntry[];
}

export interface DifferentialEntry {
  prediction: PredictionResult;
  posterior: number;
  risk: RiskAssessment;
}

// score -> posterior -> risk band -> unreported symptoms
export function assessDisease(
  engine: PredictionEngine,
  request: AssessmentRequest,
  falsePositiveRate: number = DEFAULT_FALSE_POSITIVE_RATE
): Result<Assessment> {
  const prediction = engine.score(request.disease, request.symptoms, request.demographics);
  if (!prediction.ok) return prediction;

  const bayesian = engine.posteriorFromPriorLikelihood(prediction.value.prior, prediction.value.likelihood, falsePositiveRate, 'lenient');
  if (!bayesian.ok) return bayesian;

  const risk = engine.riskLevelFromPercentage(bayesian.value.posterior * 100);
  return ok({
    prediction: prediction.value,
    bayesian: bayesian.value,
    risk,
    riskLevel: storedRiskLevel(risk),
    missingSymptoms: engine.missing(prediction.value.disease, request.symptoms)
  });
}

export function differential(
  engine: PredictionEngine,
  symptoms: string[],
  falsePositiveRate: number = DEFAULT_FALSE_POSITIVE_RATE
): DifferentialEntry[] {
  const entries: DifferentialEntry[] = [];
  for (const prediction of engine.predictAll(symptoms)) {
    const bayesian = engine.posteriorFromPriorLikelihood(prediction.prior, prediction.likelihood, falsePositiveRate, 'lenient');
    if (!bayesian.ok) {
      console.error(`[Engine] Posterior failed for '${prediction.disease}': ${bayesian.error.message}`);
      continue;
    }
    entries.push({
      prediction,
      posterior: bayesian.value.posterior,
      risk: engine.riskLevelFromPercentage(bayesian.value.posterior * 100)
    });
  }
  return entries;
}
