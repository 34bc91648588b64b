import fs from 'fs';
import path from 'path';
import { fail, ok, type Result } from '../errors.js';
import type { DiseaseProfile } from '../types.js';
import { isRecord } from '../utils/parse.js';

export type DiseaseEntry = { key: string; bias: number; symptoms: Record<string, number> };
export type KnowledgeFile = { diseases: DiseaseEntry[]; displayNames?: Record<string, string> };

/**
 * Read-only disease table. Built once at startup and handed to every
 * component; nothing mutates it afterwards.
 */
export interface KnowledgeBase {
  readonly diseases: readonly string[];
  readonly profiles: ReadonlyMap<string, DiseaseProfile>;
  /** underscore-stripped key -> key, first profile wins */
  readonly strippedKeys: ReadonlyMap<string, string>;
  readonly displayNames: ReadonlyMap<string, string>;
}

export const DEFAULT_KNOWLEDGE_PATH = 'knowledge/diseases.json';

export function loadJSON(rel: string): unknown {
  const p = path.isAbsolute(rel) ? rel : path.join(process.cwd(), rel);
  return JSON.parse(fs.readFileSync(p, 'utf8'));
}

export function loadKnowledge(rel: string = DEFAULT_KNOWLEDGE_PATH): Result<KnowledgeBase> {
  const parsed = parseKnowledgeFile(loadJSON(rel));
  if (!parsed.ok) return parsed;
  return buildKnowledgeBase(parsed.value);
}

export function parseKnowledgeFile(raw: unknown): Result<KnowledgeFile> {
  if (!isRecord(raw) || !Array.isArray(raw.diseases)) {
    return fail('validation', 'Knowledge file must be an object with a "diseases" array');
  }
  const diseases: DiseaseEntry[] = [];
  for (const [i, entry] of raw.diseases.entries()) {
    if (!isRecord(entry) || typeof entry.key !== 'string' || typeof entry.bias !== 'number' || !isRecord(entry.symptoms)) {
      return fail('validation', `Malformed disease entry at index ${i}`, { index: i });
    }
    const symptoms: Record<string, number> = {};
    for (const [symptom, weight] of Object.entries(entry.symptoms)) {
      if (typeof weight !== 'number') {
        return fail('validation', `Weight for '${symptom}' in '${entry.key}' is not a number`, { disease: entry.key, symptom });
      }
      symptoms[symptom] = weight;
    }
    diseases.push({ key: entry.key, bias: entry.bias, symptoms });
  }

  const displayNames: Record<string, string> = {};
  if (raw.displayNames !== undefined) {
    if (!isRecord(raw.displayNames)) return fail('validation', '"displayNames" must be an object');
    for (const [key, label] of Object.entries(raw.displayNames)) {
      if (typeof label !== 'string') return fail('validation', `Display name for '${key}' must be a string`, { symptom: key });
      displayNames[key] = label;
    }
  }
  return ok({ diseases, displayNames });
}

export function buildKnowledgeBase(file: KnowledgeFile): Result<KnowledgeBase> {
  const profiles = new Map<string, DiseaseProfile>();
  const strippedKeys = new Map<string, string>();
  const displayNames = new Map<string, string>();

  for (const entry of file.diseases) {
    const key = normalizeDiseaseName(entry.key);
    if (key !== entry.key || !key) {
      return fail('validation', `Disease key '${entry.key}' is not normalized`, { disease: entry.key });
    }
    if (profiles.has(key)) return fail('validation', `Duplicate disease key '${key}'`, { disease: key });
    if (!Number.isFinite(entry.bias)) return fail('validation', `Bias for '${key}' must be finite`, { disease: key });

    const weights = new Map<string, number>();
    for (const [symptom, weight] of Object.entries(entry.symptoms)) {
      if (!(weight >= 0 && weight <= 1)) {
        return fail('validation', `Weight for '${symptom}' in '${key}' must be between 0 and 1. Got ${weight}`, { disease: key, symptom });
      }
      weights.set(symptom, weight);
      if (!displayNames.has(symptom)) {
        displayNames.set(symptom, file.displayNames?.[symptom] ?? titleCase(symptom));
      }
    }

    profiles.set(key, Object.freeze({ key, bias: entry.bias, symptomWeights: weights }));
    const stripped = key.replace(/_/g, '');
    if (!strippedKeys.has(stripped)) strippedKeys.set(stripped, key);
  }

  return ok(Object.freeze({
    diseases: Object.freeze([...profiles.keys()]),
    profiles,
    strippedKeys,
    displayNames
  }));
}

export function normalizeDiseaseName(name: string): string {
  return name.trim().toLowerCase().replace(/[ -]/g, '_');
}

/** "loss_taste_smell" -> "Loss Taste Smell" */
export function titleCase(key: string): string {
  return key
    .replace(/_/g, ' ')
    .replace(/[a-z]+/gi, w => w[0].toUpperCase() + w.slice(1).toLowerCase());
}

export function resolveDiseaseKey(kb: KnowledgeBase, name: string): Result<string> {
  const normalized = normalizeDiseaseName(name);
  if (kb.profiles.has(normalized)) return ok(normalized);

  const match = kb.strippedKeys.get(normalized.replace(/_/g, ''));
  if (match) return ok(match);

  return fail('not_found', `Disease '${name}' (key: ${normalized}) not found`, { input: name, normalized });
}

export function getProfile(kb: KnowledgeBase, name: string): Result<DiseaseProfile> {
  const key = resolveDiseaseKey(kb, name);
  if (!key.ok) return key;
  const profile = kb.profiles.get(key.value);
  return profile ? ok(profile) : fail('not_found', `Disease '${name}' not found`, { input: name, normalized: key.value });
}

export function listDiseases(kb: KnowledgeBase): string[] {
  return [...kb.diseases];
}

export function displayName(kb: KnowledgeBase, symptom: string): string {
  return kb.displayNames.get(symptom) ?? titleCase(symptom);
}

export function symptomsFor(kb: KnowledgeBase, name: string): Result<Record<string, string>> {
  const profile = getProfile(kb, name);
  if (!profile.ok) return profile;
  const out: Record<string, string> = {};
  for (const symptom of profile.value.symptomWeights.keys()) out[symptom] = displayName(kb, symptom);
  return ok(out);
}

export function symptomImportance(kb: KnowledgeBase, name: string): Result<{ key: string; name: string; weight: number }[]> {
  const profile = getProfile(kb, name);
  if (!profile.ok) return profile;
  const rows = [...profile.value.symptomWeights].map(([key, weight]) => ({ key, name: displayName(kb, key), weight }));
  return ok(rows.sort((a, b) => b.weight - a.weight));
}
