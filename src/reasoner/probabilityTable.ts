import { fail, ok, type EngineError, type Result } from '../errors.js';
import { isRecord, round, toNumber } from '../utils/parse.js';
import { posteriorFromTest } from './bayes.js';
import { loadJSON } from './knowledge.js';

export const DEFAULT_PRESETS_PATH = 'knowledge/presets.json';

export interface TableRow {
  disease: string | null;
  prevalence: number;
  sensitivity: number;
  falsePositive: number;
  specificity: number;
  posterior: number;
}

export interface TableEvaluation {
  rows: TableRow[];
  dropped: number;
}

function evaluateRow(raw: unknown): Result<TableRow> {
  if (!isRecord(raw)) return fail('validation', 'Row must be an object');
  const prevalence = toNumber(raw.prevalence);
  const sensitivity = toNumber(raw.sensitivity);
  const falsePositive = toNumber(raw.falsePositive ?? raw.false_positive);
  if (prevalence === null || sensitivity === null || falsePositive === null) {
    return fail('validation', 'All inputs must be numeric');
  }
  if (falsePositive < 0 || falsePositive > 1) {
    return fail('validation', `False positive rate must be between 0 and 1. Got ${falsePositive}`, { field: 'falsePositive' });
  }

  const posterior = posteriorFromTest(prevalence, sensitivity, 1 - falsePositive, 'positive', 'strict');
  if (!posterior.ok) return posterior;
  return ok({
    disease: typeof raw.disease === 'string' ? raw.disease : null,
    prevalence,
    sensitivity,
    falsePositive,
    specificity: posterior.value.specificity,
    posterior: round(posterior.value.posterior, 4)
  });
}

/**
 * Posterior for each prevalence/sensitivity/false-positive row.
 * strict: the first bad row fails the table. Otherwise bad rows are dropped and counted.
 */
export function evaluateTable(rows: unknown[], options: { strict: boolean }): Result<TableEvaluation> {
  const out: TableRow[] = [];
  let dropped = 0;
  for (const [index, raw] of rows.entries()) {
    const row = evaluateRow(raw);
    if (row.ok) { out.push(row.value); continue; }
    if (options.strict) return withRowIndex(row.error, index);
    dropped++;
  }
  if (dropped > 0) console.warn(`[Table] Warning: Dropped ${dropped} invalid row(s)`);
  return ok({ rows: out, dropped });
}

function withRowIndex(error: EngineError, index: number): Result<TableEvaluation> {
  return fail(error.kind, `Row ${index}: ${error.message}`, { ...error.details, row: index });
}

/** Evaluated preset rows, keyed by lowercased disease name. */
export interface PresetTable {
  readonly rows: readonly TableRow[];
  readonly byName: ReadonlyMap<string, TableRow>;
}

export function loadPresets(rel: string = DEFAULT_PRESETS_PATH): Result<PresetTable> {
  return buildPresetTable(loadJSON(rel));
}

export function buildPresetTable(raw: unknown): Result<PresetTable> {
  if (!isRecord(raw) || !Array.isArray(raw.presets)) {
    return fail('validation', 'Preset file must be an object with a "presets" array');
  }
  const evaluated = evaluateTable(raw.presets, { strict: true });
  if (!evaluated.ok) return evaluated;

  const byName = new Map<string, TableRow>();
  for (const [index, row] of evaluated.value.rows.entries()) {
    const name = row.disease?.trim().toLowerCase();
    if (!name) return fail('validation', `Preset at row ${index} has no disease name`, { row: index });
    if (byName.has(name)) return fail('validation', `Duplicate preset '${row.disease}'`, { row: index });
    byName.set(name, Object.freeze(row));
  }
  return ok(Object.freeze({ rows: Object.freeze([...byName.values()]), byName }));
}

// case-insensitive exact match on the disease name
export function presetFor(table: PresetTable, name: string): Result<TableRow> {
  const row = table.byName.get(name.trim().toLowerCase());
  return row ? ok(row) : fail('not_found', `Disease '${name}' not found in presets`, { input: name });
}
