import { fail, ok, type Result } from '../errors.js';
import type { LikelihoodPosterior, PosteriorPolicy, RiskAssessment, RiskLevel, TestPosterior, TestResult } from '../types.js';

export const DEFAULT_FALSE_POSITIVE_RATE = 0.05;

/*
 * Two policies, picked per call site:
 *   lenient - clamp inputs into [0,1], zero denominator -> posterior 0
 *   strict  - out-of-range input is a validation error, zero denominator is division_degenerate
 * Non-finite input is rejected under both.
 */

function clamp01(x: number) { return Math.max(0, Math.min(1, x)); }

function checkProbabilities(inputs: [string, number][], policy: PosteriorPolicy): Result<number[]> {
  const out: number[] = [];
  for (const [name, value] of inputs) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return fail('validation', `${name} must be numeric. Got ${String(value)}`, { field: name });
    }
    if (policy === 'strict' && (value < 0 || value > 1)) {
      return fail('validation', `${name} must be between 0 and 1. Got ${value}`, { field: name, value });
    }
    out.push(clamp01(value));
  }
  return ok(out);
}

function divide(numerator: number, denominator: number, policy: PosteriorPolicy): Result<number> {
  if (denominator === 0) {
    return policy === 'strict'
      ? fail('division_degenerate', 'Invalid inputs caused division by zero')
      : ok(0);
  }
  return ok(numerator / denominator);
}

/** P(D|S) = P(S|D)·P(D) / (P(S|D)·P(D) + P(S|¬D)·P(¬D)) */
export function posteriorFromPriorLikelihood(
  prior: number,
  likelihood: number,
  falsePositiveRate: number = DEFAULT_FALSE_POSITIVE_RATE,
  policy: PosteriorPolicy = 'lenient'
): Result<LikelihoodPosterior> {
  const checked = checkProbabilities(
    [['Prior probability', prior], ['Likelihood', likelihood], ['False positive rate', falsePositiveRate]],
    policy
  );
  if (!checked.ok) return checked;
  const [p, l, fpr] = checked.value;

  const numerator = l * p;
  const posterior = divide(numerator, numerator + fpr * (1 - p), policy);
  if (!posterior.ok) return posterior;
  return ok({ prior: p, likelihood: l, falsePositiveRate: fpr, posterior: posterior.value });
}

export function isTestResult(value: unknown): value is TestResult {
  return value === 'positive' || value === 'negative';
}

export function posteriorFromTest(
  prior: number,
  sensitivity: number,
  specificity: number,
  testResult: string,
  policy: PosteriorPolicy = 'lenient'
): Result<TestPosterior> {
  const result = testResult.trim().toLowerCase();
  if (!isTestResult(result)) {
    return fail('validation', `Test result must be 'positive' or 'negative'. Got '${testResult}'`, { field: 'test_result' });
  }
  const checked = checkProbabilities(
    [['Prior probability', prior], ['Sensitivity', sensitivity], ['Specificity', specificity]],
    policy
  );
  if (!checked.ok) return checked;
  const [p, sens, spec] = checked.value;
  const falsePositiveRate = 1 - spec;

  let numerator: number;
  let denominator: number;
  if (result === 'positive') {
    numerator = sens * p;
    denominator = numerator + falsePositiveRate * (1 - p);
  } else {
    numerator = (1 - sens) * p;
    denominator = numerator + spec * (1 - p);
  }

  const posterior = divide(numerator, denominator, policy);
  if (!posterior.ok) return posterior;
  return ok({ prior: p, sensitivity: sens, specificity: spec, falsePositiveRate, posterior: posterior.value, testResult: result });
}

export function riskLevelFromPercentage(percentage: number): RiskAssessment {
  if (percentage < 30) {
    return { level: 'Low', color: 'success', description: 'Low probability of disease' };
  }
  if (percentage < 60) {
    return { level: 'Moderate', color: 'warning', description: 'Moderate probability - consider further testing' };
  }
  if (percentage < 85) {
    return { level: 'High', color: 'danger', description: 'High probability - immediate medical consultation recommended' };
  }
  return { level: 'Critical', color: 'dark', description: 'Critical risk level - urgent medical attention required' };
}

const STORED_LEVELS: Record<RiskAssessment['level'], RiskLevel> = {
  Low: 'low',
  Moderate: 'medium',
  High: 'high',
  Critical: 'critical'
};

export function storedRiskLevel(assessment: RiskAssessment): RiskLevel {
  return STORED_LEVELS[assessment.level];
}
