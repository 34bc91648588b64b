import { DEFAULT_FALSE_POSITIVE_RATE } from './reasoner/bayes.js';
import { DEFAULT_KNOWLEDGE_PATH } from './reasoner/knowledge.js';
import { DEFAULT_PRESETS_PATH } from './reasoner/probabilityTable.js';

export interface AppConfig {
  port: number;
  redisEnabled: boolean;
  redisUrl: string | undefined;
  knowledgePath: string;
  presetsPath: string;
  falsePositiveRate: number;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fpr = Number(env.FALSE_POSITIVE_RATE);
  return Object.freeze({
    port: Number(env.PORT) || 3000,
    redisEnabled: env.REDIS_ENABLED === 'true',
    redisUrl: env.REDIS_URL || undefined,
    knowledgePath: env.KNOWLEDGE_PATH || DEFAULT_KNOWLEDGE_PATH,
    presetsPath: env.PRESETS_PATH || DEFAULT_PRESETS_PATH,
    falsePositiveRate: env.FALSE_POSITIVE_RATE && fpr >= 0 && fpr <= 1 ? fpr : DEFAULT_FALSE_POSITIVE_RATE
  });
}
