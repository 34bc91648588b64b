import express from 'express';
import type { AppDeps } from '../app.js';
import { doctorDashboard, patientDashboard } from '../dashboard.js';
import { PATIENT_COOKIE } from './ml.js';
import { sendEngineError, sendInternalError } from './respond.js';

export default function dashboardRoutes({ store }: AppDeps) {
  const router = express.Router();

  router.get('/doctor/dashboard', async (_req, res) => {
    try {
      const data = await doctorDashboard(store);
      if (!data.ok) return sendEngineError(res, data.error);
      res.json({ success: true, data: data.value });
    } catch (error) {
      sendInternalError(res, 'Dashboard', error);
    }
  });

  router.get('/patient/dashboard', async (req, res) => {
    const patientId: unknown = req.cookies?.[PATIENT_COOKIE];
    if (typeof patientId !== 'string' || !patientId) {
      return res.status(400).json({ success: false, error: 'No patient session', message: 'Make a prediction first' });
    }
    try {
      res.json({ success: true, data: await patientDashboard(store, patientId) });
    } catch (error) {
      sendInternalError(res, 'Dashboard', error);
    }
  });

  return router;
}
