import express from 'express';
import { v4 as uuid } from 'uuid';
import type { AppDeps } from '../app.js';
import { assessDisease, differential } from '../reasoner/assessment.js';
import { titleCase } from '../reasoner/knowledge.js';
import type { Demographics, PredictionRecord } from '../types.js';
import { isRecord, round, toNumber, toStringList } from '../utils/parse.js';
import { pct, sendEngineError, sendInternalError } from './respond.js';

export const PATIENT_COOKIE = 'patientId';

function readDemographics(body: Record<string, unknown>): Demographics {
  const demographics: Demographics = {};
  // an unparseable age is ignored rather than rejected
  const age = toNumber(body.age);
  if (age !== null) demographics.age = Math.trunc(age);
  const height = toNumber(body.height_cm);
  const weight = toNumber(body.weight_kg);
  if (height !== null) demographics.heightCm = height;
  if (weight !== null) demographics.weightKg = weight;
  return demographics;
}

function patientIdFrom(req: express.Request, res: express.Response): string {
  const existing: unknown = req.cookies?.[PATIENT_COOKIE];
  if (typeof existing === 'string' && existing) return existing;
  const id = uuid();
  res.cookie(PATIENT_COOKIE, id, { httpOnly: true });
  return id;
}

export default function mlRoutes({ engine, store, config }: AppDeps) {
  const router = express.Router();

  router.get('/diseases', (_req, res) => {
    const diseases = engine.listDiseases().map(key => ({ key, name: titleCase(key) }));
    res.json({ success: true, diseases });
  });

  router.get('/symptoms/:disease', (req, res) => {
    const key = engine.resolve(req.params.disease);
    if (!key.ok) return sendEngineError(res, key.error);
    const symptoms = engine.symptomsFor(key.value);
    if (!symptoms.ok) return sendEngineError(res, symptoms.error);
    res.json({
      success: true,
      disease: titleCase(key.value),
      symptoms: Object.entries(symptoms.value).map(([k, name]) => ({ key: k, name }))
    });
  });

  router.get('/symptom-importance/:disease', (req, res) => {
    const key = engine.resolve(req.params.disease);
    if (!key.ok) return sendEngineError(res, key.error);
    const importance = engine.symptomImportance(key.value);
    if (!importance.ok) return sendEngineError(res, importance.error);
    res.json({
      success: true,
      disease: titleCase(key.value),
      symptom_importance: importance.value.map(s => ({ symptom: s.name, importance: round(s.weight * 100, 1) }))
    });
  });

  router.post('/predict', async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || Object.keys(body).length === 0) return res.status(400).json({ error: 'No data provided' });
    if (typeof body.disease !== 'string' || !body.disease.trim()) return res.status(400).json({ error: 'Disease not specified' });
    const symptoms = toStringList(body.symptoms);
    if (!symptoms || symptoms.length === 0) return res.status(400).json({ error: 'No symptoms provided' });

    try {
      const demographics = readDemographics(body);
      const assessed = assessDisease(engine, { disease: body.disease, symptoms, demographics }, config.falsePositiveRate);
      if (!assessed.ok) return sendEngineError(res, assessed.error);
      const { prediction, bayesian, risk, riskLevel, missingSymptoms } = assessed.value;

      const record: PredictionRecord = {
        id: uuid(),
        patientId: patientIdFrom(req, res),
        disease: prediction.disease,
        symptoms,
        rawProbability: prediction.rawProbability,
        posterior: bayesian.posterior,
        confidence: prediction.confidence,
        riskLevel,
        age: demographics.age ?? null,
        timestamp: new Date().toISOString()
      };
      try {
        await store.save(record);
      } catch (err) {
        // history is best effort; the prediction itself still goes back
        console.warn(`[Predict] Failed to save prediction ${record.id}:`, err);
      }

      console.log(`[Predict] disease=${prediction.disease} matched=${prediction.symptomsMatched}/${prediction.totalSymptoms} risk=${riskLevel}`);
      res.json({
        success: true,
        disease: titleCase(prediction.disease),
        bmi: prediction.bmi,
        bmi_category: prediction.bmiCategory,
        ml_prediction: {
          raw_probability: pct(prediction.rawProbability),
          calibrated_probability: pct(prediction.calibratedProbability),
          confidence_score: pct(prediction.confidence),
          symptoms_analyzed: prediction.symptomsMatched,
          missing_symptoms: missingSymptoms
        },
        bayesian_analysis: {
          prior: pct(bayesian.prior),
          likelihood: pct(bayesian.likelihood),
          posterior: pct(bayesian.posterior),
          false_positive_rate: pct(bayesian.falsePositiveRate)
        },
        risk_assessment: risk
      });
    } catch (error) {
      sendInternalError(res, 'Predict', error);
    }
  });

  router.post('/predict-multiple', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || Object.keys(body).length === 0) return res.status(400).json({ error: 'No data provided' });
    const symptoms = toStringList(body.symptoms);
    if (!symptoms || symptoms.length === 0) return res.status(400).json({ error: 'No symptoms provided' });

    try {
      const predictions = differential(engine, symptoms, config.falsePositiveRate).map(({ prediction, posterior, risk }) => ({
        disease: titleCase(prediction.disease),
        key: prediction.disease,
        probability: pct(prediction.rawProbability),
        calibrated_probability: pct(prediction.calibratedProbability),
        posterior: pct(posterior),
        confidence: pct(prediction.confidence),
        risk_level: risk
      }));
      res.json({ success: true, predictions, symptoms_count: symptoms.length });
    } catch (error) {
      sendInternalError(res, 'Predict', error);
    }
  });

  return router;
}
