import type { Response } from 'express';
import { httpStatusFor, type EngineError } from '../errors.js';
import { round } from '../utils/parse.js';

export function sendEngineError(res: Response, error: EngineError) {
  return res.status(httpStatusFor(error.kind)).json({ success: false, error: error.message, kind: error.kind, ...error.details });
}

export function sendInternalError(res: Response, tag: string, error: unknown) {
  const details = error instanceof Error ? error.message : String(error);
  console.error(`[${tag}] error:`, error);
  return res.status(500).json({ error: 'Internal Server Error', details });
}

/** 0.4567 -> 45.67 */
export function pct(probability: number): number {
  return round(probability * 100, 2);
}
