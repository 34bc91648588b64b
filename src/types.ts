
export interface DiseaseProfile {
  readonly key: string;
  readonly symptomWeights: ReadonlyMap<string, number>;
  readonly bias: number;
}

export interface Demographics {
  age?: number;
  heightCm?: number;
  weightKg?: number;
}

export type BmiCategory = 'Underweight' | 'Normal' | 'Overweight' | 'Obese';

export interface PredictionResult {
  disease: string;
  rawProbability: number;
  calibratedProbability: number;
  prior: number;
  likelihood: number;
  symptomsMatched: number;
  totalSymptoms: number;
  confidence: number;
  bmi: number | null;
  bmiCategory: BmiCategory | null;
  bmiEffect: number;
}

export type PosteriorPolicy = 'lenient' | 'strict';
export type TestResult = 'positive' | 'negative';

export interface LikelihoodPosterior {
  prior: number;
  likelihood: number;
  falsePositiveRate: number;
  posterior: number;
}

export interface TestPosterior {
  prior: number;
  sensitivity: number;
  specificity: number;
  falsePositiveRate: number;
  posterior: number;
  testResult: TestResult;
}

export type BayesianResult = LikelihoodPosterior | TestPosterior;

export interface MissingSymptomEntry {
  key: string;
  name: string;
  weight: number;
}

export type RiskLabel = 'Low' | 'Moderate' | 'High' | 'Critical';
export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export interface RiskAssessment {
  level: RiskLabel;
  color: 'success' | 'warning' | 'danger' | 'dark';
  description: string;
}

// low, medium, high, critical
export type RiskCounts = readonly [number, number, number, number];
export type RiskPercentages = [number, number, number, number];

export type RiskDistribution = Record<RiskLevel, { count: number; percentage: number }>;

export interface PredictionRecord {
  id: string;
  patientId: string | null;
  disease: string;
  symptoms: string[];
  rawProbability: number;
  posterior: number;
  confidence: number;
  riskLevel: RiskLevel;
  age: number | null;
  timestamp: string;
}
