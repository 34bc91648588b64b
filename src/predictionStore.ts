import { Redis } from 'ioredis';
import type { AppConfig } from './config.js';
import { countRiskLevels, RISK_LEVELS } from './reasoner/reconcile.js';
import type { PredictionRecord, RiskCounts, RiskLevel } from './types.js';
import { isRecord, toNumber } from './utils/parse.js';

/** Persists the reduced record of each prediction and feeds the dashboards. */
export interface PredictionStore {
  save(record: PredictionRecord): Promise<void>;
  riskCounts(): Promise<RiskCounts>;
  all(): Promise<PredictionRecord[]>;
  forPatient(patientId: string): Promise<PredictionRecord[]>;
}

/** The ioredis calls the Redis store makes; a `Redis` client satisfies it. */
export interface RedisClient {
  multi(): RedisTransaction;
  hgetall(key: string): Promise<Record<string, string>>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
}

export interface RedisTransaction {
  rpush(key: string, value: string): RedisTransaction;
  hincrby(key: string, field: string, increment: number): RedisTransaction;
  exec(): Promise<[Error | null, unknown][] | null>;
}

export const RECORDS_KEY = 'predictions';
export const COUNTS_KEY = 'predictions:risk_counts';
export const patientKey = (id: string) => `predictions:patient:${id}`;

function isRiskLevel(value: unknown): value is RiskLevel {
  return typeof value === 'string' && RISK_LEVELS.some(level => level === value);
}

// -- Helpers -------------------------------------------------------------

export function parseRecord(raw: unknown): PredictionRecord | null {
  if (!isRecord(raw)) return null;
  const rawProbability = toNumber(raw.rawProbability);
  const posterior = toNumber(raw.posterior);
  const confidence = toNumber(raw.confidence);
  if (
    typeof raw.id !== 'string' ||
    typeof raw.disease !== 'string' ||
    typeof raw.timestamp !== 'string' ||
    !isRiskLevel(raw.riskLevel) ||
    rawProbability === null || posterior === null || confidence === null
  ) {
    return null;
  }
  return {
    id: raw.id,
    patientId: typeof raw.patientId === 'string' ? raw.patientId : null,
    disease: raw.disease,
    symptoms: Array.isArray(raw.symptoms) ? raw.symptoms.filter((s): s is string => typeof s === 'string') : [],
    rawProbability,
    posterior,
    confidence,
    riskLevel: raw.riskLevel,
    age: toNumber(raw.age),
    timestamp: raw.timestamp
  };
}

export function decode(key: string, rows: string[]): PredictionRecord[] {
  const out: PredictionRecord[] = [];
  for (const row of rows) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(row);
    } catch (err) {
      console.warn(`[Store] Corrupt JSON in ${key}, skipping.`, err);
      continue;
    }
    const record = parseRecord(parsed);
    if (record) out.push(record);
    else console.warn(`[Store] Malformed record in ${key}, skipping.`);
  }
  return out;
}

// -- Store implementations -------------------------------------------------

export function createMemoryStore(): PredictionStore {
  const records: PredictionRecord[] = [];
  return {
    async save(record) {
      records.push(record);
      console.log(`[Store] SAVE (memory) ${record.id}: disease=${record.disease}, risk=${record.riskLevel}`);
    },
    async riskCounts() {
      return countRiskLevels(records.map(r => r.riskLevel));
    },
    async all() {
      return [...records];
    },
    async forPatient(patientId) {
      return records.filter(r => r.patientId === patientId);
    }
  };
}

export function createRedisStore(redis: RedisClient): PredictionStore {
  return {
    async save(record) {
      const json = JSON.stringify(record);
      const tx = redis.multi().rpush(RECORDS_KEY, json).hincrby(COUNTS_KEY, record.riskLevel, 1);
      if (record.patientId) tx.rpush(patientKey(record.patientId), json);
      const results = await tx.exec();
      for (const [err] of results ?? []) {
        if (err) throw err;
      }
      console.log(`[Store] SAVE ${record.id}: disease=${record.disease}, risk=${record.riskLevel}`);
    },
    async riskCounts() {
      const hash = await redis.hgetall(COUNTS_KEY);
      const count = (level: RiskLevel) => toNumber(hash[level]) ?? 0;
      return [count('low'), count('medium'), count('high'), count('critical')];
    },
    async all() {
      return decode(RECORDS_KEY, await redis.lrange(RECORDS_KEY, 0, -1));
    },
    async forPatient(patientId) {
      const key = patientKey(patientId);
      return decode(key, await redis.lrange(key, 0, -1));
    }
  };
}

export function createPredictionStore(config: AppConfig): PredictionStore {
  if (!config.redisEnabled) return createMemoryStore();
  const redis = config.redisUrl ? new Redis(config.redisUrl) : new Redis();
  redis.on('error', (err) => console.error('[Redis Error]', err));
  return createRedisStore(redis);
}
