import { afterEach, describe, test, expect, vi, beforeEach } from 'vitest';
import { doctorDashboard, patientDashboard } from '../src/dashboard.js';
import {
  COUNTS_KEY,
  createMemoryStore,
  createRedisStore,
  decode,
  parseRecord,
  patientKey,
  RECORDS_KEY,
  type PredictionStore,
  type RedisClient,
  type RedisTransaction
} from '../src/predictionStore.js';
import type { PredictionRecord, RiskLevel } from '../src/types.js';
import { unwrap } from './helpers.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');
const DAY = 24 * 60 * 60 * 1000;

function record(id: string, overrides: Partial<PredictionRecord> & { riskLevel: RiskLevel; daysAgo: number }): PredictionRecord {
  return {
    id,
    patientId: overrides.patientId ?? null,
    disease: overrides.disease ?? 'diabetes',
    symptoms: overrides.symptoms ?? ['fatigue'],
    rawProbability: overrides.rawProbability ?? 0.2,
    posterior: overrides.posterior ?? 0.5,
    confidence: overrides.confidence ?? 0.3,
    riskLevel: overrides.riskLevel,
    age: overrides.age ?? null,
    timestamp: new Date(NOW.getTime() - overrides.daysAgo * DAY).toISOString()
  };
}

let store: PredictionStore;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  store = createMemoryStore();
});

afterEach(() => {
  vi.restoreAllMocks();
});

// in-process stand-in for the list and hash commands the store issues
class FakeRedis implements RedisClient {
  lists = new Map<string, string[]>();
  hashes = new Map<string, Record<string, string>>();
  execError: Error | null = null;

  multi(): RedisTransaction {
    const queued: (() => unknown)[] = [];
    const tx: RedisTransaction = {
      rpush: (key, value) => {
        queued.push(() => {
          const list = this.lists.get(key) ?? [];
          list.push(value);
          this.lists.set(key, list);
          return list.length;
        });
        return tx;
      },
      hincrby: (key, field, increment) => {
        queued.push(() => {
          const hash = this.hashes.get(key) ?? {};
          hash[field] = String(Number(hash[field] ?? 0) + increment);
          this.hashes.set(key, hash);
          return Number(hash[field]);
        });
        return tx;
      },
      exec: async () => {
        const error = this.execError;
        if (error) return queued.map((): [Error | null, unknown] => [error, null]);
        return queued.map((run): [Error | null, unknown] => [null, run()]);
      }
    };
    return tx;
  }

  async hgetall(key: string) {
    return { ...(this.hashes.get(key) ?? {}) };
  }

  async lrange(key: string) {
    return [...(this.lists.get(key) ?? [])];
  }
}

describe('memory prediction store', () => {
  test('counts risk levels and filters by patient', async () => {
    await store.save(record('a', { riskLevel: 'low', daysAgo: 1, patientId: 'p1' }));
    await store.save(record('b', { riskLevel: 'high', daysAgo: 2, patientId: 'p2' }));
    await store.save(record('c', { riskLevel: 'high', daysAgo: 3, patientId: 'p1' }));

    expect(await store.riskCounts()).toEqual([1, 0, 2, 0]);
    expect((await store.forPatient('p1')).map(r => r.id)).toEqual(['a', 'c']);
    expect((await store.all()).map(r => r.id)).toEqual(['a', 'b', 'c']);
  });

  test('all() returns a copy', async () => {
    await store.save(record('a', { riskLevel: 'low', daysAgo: 0 }));
    (await store.all()).pop();
    expect(await store.all()).toHaveLength(1);
  });
});

describe('redis prediction store', () => {
  test('pushes the record and bumps the risk counter in one transaction', async () => {
    const redis = new FakeRedis();
    const redisStore = createRedisStore(redis);
    await redisStore.save(record('a', { riskLevel: 'high', daysAgo: 1, patientId: 'p1' }));
    await redisStore.save(record('b', { riskLevel: 'high', daysAgo: 0 }));
    await redisStore.save(record('c', { riskLevel: 'low', daysAgo: 0, patientId: 'p1' }));

    expect(redis.hashes.get(COUNTS_KEY)).toEqual({ high: '2', low: '1' });
    expect(redis.lists.get(RECORDS_KEY)).toHaveLength(3);
    expect(await redisStore.riskCounts()).toEqual([1, 0, 2, 0]);
    expect((await redisStore.all()).map(r => r.id)).toEqual(['a', 'b', 'c']);
    expect((await redisStore.forPatient('p1')).map(r => r.id)).toEqual(['a', 'c']);
    expect(redis.lists.has(patientKey('p2'))).toBe(false);
  });

  test('an empty counter hash reads as zero counts', async () => {
    expect(await createRedisStore(new FakeRedis()).riskCounts()).toEqual([0, 0, 0, 0]);
  });

  test('save throws the first transaction error', async () => {
    const redis = new FakeRedis();
    redis.execError = new Error('READONLY replica');
    await expect(createRedisStore(redis).save(record('a', { riskLevel: 'low', daysAgo: 0 }))).rejects.toThrow('READONLY replica');
    expect(redis.lists.size).toBe(0);
  });

  test('reads skip corrupt entries', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const redis = new FakeRedis();
    const good = record('a', { riskLevel: 'medium', daysAgo: 0 });
    redis.lists.set(RECORDS_KEY, ['{not json', JSON.stringify(good)]);

    expect(await createRedisStore(redis).all()).toEqual([good]);
    expect(warn).toHaveBeenCalledWith('[Store] Corrupt JSON in predictions, skipping.', expect.any(SyntaxError));
  });
});

describe('decode', () => {
  test('keeps valid rows and warns about the rest', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const good = record('a', { riskLevel: 'low', daysAgo: 0 });
    const rows = ['[', JSON.stringify({ id: 'x' }), JSON.stringify(good)];

    expect(decode('predictions:patient:p1', rows)).toEqual([good]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenLastCalledWith('[Store] Malformed record in predictions:patient:p1, skipping.');
  });
});

describe('parseRecord', () => {
  test('accepts a stored record', () => {
    const r = record('a', { riskLevel: 'critical', daysAgo: 0, age: 61 });
    expect(parseRecord(JSON.parse(JSON.stringify(r)))).toEqual(r);
  });

  test('rejects unknown risk levels and missing fields', () => {
    expect(parseRecord({ ...record('a', { riskLevel: 'low', daysAgo: 0 }), riskLevel: 'severe' })).toBeNull();
    expect(parseRecord({ id: 'a' })).toBeNull();
    expect(parseRecord('a')).toBeNull();
  });
});

describe('doctorDashboard', () => {
  test('reconciles the risk distribution and counts new cases', async () => {
    await store.save(record('a', { riskLevel: 'low', daysAgo: 1 }));
    await store.save(record('b', { riskLevel: 'high', daysAgo: 10 }));
    await store.save(record('c', { riskLevel: 'high', daysAgo: 2 }));

    const data = unwrap(await doctorDashboard(store, NOW));
    expect(data.totalPatients).toBe(3);
    expect(data.newCases).toBe(2);
    expect(data.highRiskCount).toBe(2);
    expect(data.criticalRiskCount).toBe(0);
    expect(data.riskDistribution).toEqual({
      low: { count: 1, percentage: 33 },
      medium: { count: 0, percentage: 0 },
      high: { count: 2, percentage: 67 },
      critical: { count: 0, percentage: 0 }
    });
    expect(data.lastUpdated).toBe('2026-03-10T12:00:00.000Z');
  });

  test('empty store gives zero percentages', async () => {
    const data = unwrap(await doctorDashboard(store, NOW));
    expect(data.totalPatients).toBe(0);
    expect(data.riskDistribution.low).toEqual({ count: 0, percentage: 0 });
  });
});

describe('patientDashboard', () => {
  test('summarises one patient newest first', async () => {
    await store.save(record('a', { riskLevel: 'low', daysAgo: 5, patientId: 'p1', disease: 'diabetes' }));
    await store.save(record('b', { riskLevel: 'high', daysAgo: 1, patientId: 'p1', disease: 'covid19' }));
    await store.save(record('c', { riskLevel: 'high', daysAgo: 3, patientId: 'p1', disease: 'diabetes' }));
    await store.save(record('d', { riskLevel: 'critical', daysAgo: 0, patientId: 'p2', disease: 'stroke' }));

    const data = await patientDashboard(store, 'p1', NOW);
    expect(data.predictions.map(p => p.id)).toEqual(['b', 'c', 'a']);
    expect(data.statistics).toEqual({
      totalPredictions: 3,
      highRiskCount: 2,
      criticalRiskCount: 0,
      mostCommonDisease: 'diabetes',
      lastPredictionDate: new Date(NOW.getTime() - DAY).toISOString(),
      lastDisease: 'covid19'
    });
    expect(data.riskDistribution.low.percentage).toBe(33.3);
    expect(data.riskDistribution.high.percentage).toBe(66.7);
  });

  test('patient without history', async () => {
    const data = await patientDashboard(store, 'nobody', NOW);
    expect(data.statistics.totalPredictions).toBe(0);
    expect(data.statistics.mostCommonDisease).toBeNull();
    expect(data.statistics.lastDisease).toBeNull();
    expect(data.riskDistribution.critical).toEqual({ count: 0, percentage: 0 });
  });
});
