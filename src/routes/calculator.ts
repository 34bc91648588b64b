import express from 'express';
import type { AppDeps } from '../app.js';
import { DEFAULT_FALSE_POSITIVE_RATE } from '../reasoner/bayes.js';
import { evaluateTable, presetFor } from '../reasoner/probabilityTable.js';
import { isRecord, toNumber } from '../utils/parse.js';
import { pct, sendEngineError, sendInternalError } from './respond.js';

// Direct calculator calls validate strictly; the prediction flow uses the lenient policy.
export default function calculatorRoutes({ engine, presets }: AppDeps) {
  const router = express.Router();

  router.post('/posterior', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body)) return res.status(400).json({ error: 'No data provided' });
    const prior = toNumber(body.prior);
    const likelihood = toNumber(body.likelihood);
    const fpr = body.false_positive_rate === undefined ? DEFAULT_FALSE_POSITIVE_RATE : toNumber(body.false_positive_rate);
    if (prior === null || likelihood === null || fpr === null) {
      return res.status(400).json({ success: false, error: 'Non-numeric input provided', kind: 'validation' });
    }

    const result = engine.posteriorFromPriorLikelihood(prior, likelihood, fpr, 'strict');
    if (!result.ok) return sendEngineError(res, result.error);
    res.json({
      success: true,
      ...result.value,
      posterior_percentage: pct(result.value.posterior),
      risk_assessment: engine.riskLevelFromPercentage(result.value.posterior * 100)
    });
  });

  router.post('/test-result', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body)) return res.status(400).json({ error: 'No data provided' });
    const prior = toNumber(body.prior);
    const sensitivity = toNumber(body.sensitivity);
    const specificity = toNumber(body.specificity);
    if (prior === null || sensitivity === null || specificity === null) {
      return res.status(400).json({ success: false, error: 'Non-numeric input provided', kind: 'validation' });
    }
    if (body.test_result !== undefined && typeof body.test_result !== 'string') {
      return res.status(400).json({
        success: false,
        error: `Test result must be 'positive' or 'negative'. Got '${String(body.test_result)}'`,
        kind: 'validation'
      });
    }
    const testResult = typeof body.test_result === 'string' ? body.test_result : 'positive';

    const result = engine.posteriorFromTest(prior, sensitivity, specificity, testResult, 'strict');
    if (!result.ok) return sendEngineError(res, result.error);
    res.json({
      success: true,
      ...result.value,
      posterior_percentage: pct(result.value.posterior),
      risk_assessment: engine.riskLevelFromPercentage(result.value.posterior * 100)
    });
  });

  router.post('/table', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || !Array.isArray(body.rows)) return res.status(400).json({ error: 'Expected a "rows" array' });
    try {
      const evaluated = evaluateTable(body.rows, { strict: body.strict !== false });
      if (!evaluated.ok) return sendEngineError(res, evaluated.error);
      res.json({ success: true, ...evaluated.value });
    } catch (error) {
      sendInternalError(res, 'Table', error);
    }
  });

  router.get('/presets', (_req, res) => {
    res.json({ success: true, presets: presets.rows });
  });

  router.post('/preset', (req, res) => {
    const body: unknown = req.body;
    const disease = isRecord(body) && typeof body.disease === 'string' ? body.disease.trim() : '';
    if (!disease) return res.status(400).json({ success: false, error: 'Disease name is required', kind: 'validation' });

    const preset = presetFor(presets, disease);
    if (!preset.ok) return sendEngineError(res, preset.error);
    res.json({
      success: true,
      ...preset.value,
      posterior_percentage: pct(preset.value.posterior),
      risk_assessment: engine.riskLevelFromPercentage(preset.value.posterior * 100)
    });
  });

  return router;
}
