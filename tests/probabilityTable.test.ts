import { afterEach, describe, test, expect, vi } from 'vitest';
import { buildPresetTable, evaluateTable, loadPresets, presetFor } from '../src/reasoner/probabilityTable.js';
import { errorOf, unwrap } from './helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('evaluateTable', () => {
  test('computes a rounded posterior per row', () => {
    const { rows, dropped } = unwrap(evaluateTable([
      { disease: 'Flu', prevalence: 0.1, sensitivity: 0.9, falsePositive: 0.05 },
      { prevalence: '0.5', sensitivity: '0.5', false_positive: '0.5' }
    ], { strict: true }));
    expect(dropped).toBe(0);
    expect(rows[0].disease).toBe('Flu');
    expect(rows[0].specificity).toBeCloseTo(0.95, 12);
    expect(rows[0].posterior).toBe(0.6667);
    expect(rows[1].disease).toBeNull();
    expect(rows[1].posterior).toBe(0.5);
  });

  test('strict mode fails on the first bad row', () => {
    const error = errorOf(evaluateTable([
      { prevalence: 0.2, sensitivity: 0.9, falsePositive: 0.1 },
      { prevalence: 'abc', sensitivity: 0.5, falsePositive: 0.5 }
    ], { strict: true }));
    expect(error.kind).toBe('validation');
    expect(error.message).toBe('Row 1: All inputs must be numeric');
    expect(error.details).toEqual({ row: 1 });
  });

  test('strict mode rejects out-of-range and degenerate rows', () => {
    expect(errorOf(evaluateTable([{ prevalence: 1.2, sensitivity: 0.5, falsePositive: 0.1 }], { strict: true })).kind).toBe('validation');
    expect(errorOf(evaluateTable([{ prevalence: 0, sensitivity: 0.5, falsePositive: 0 }], { strict: true })).kind).toBe('division_degenerate');
  });

  test('lenient mode drops bad rows and warns', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { rows, dropped } = unwrap(evaluateTable([
      { prevalence: 0.5, sensitivity: 'abc', falsePositive: 0.5 },
      { prevalence: 0.5, sensitivity: 0.5, falsePositive: 0.5 },
      'not a row'
    ], { strict: false }));
    expect(rows).toHaveLength(1);
    expect(dropped).toBe(2);
    expect(warn).toHaveBeenCalledWith('[Table] Warning: Dropped 2 invalid row(s)');
  });
});

describe('preset table', () => {
  const presets = unwrap(loadPresets());

  test('loads and evaluates every preset in file order', () => {
    expect(presets.rows).toHaveLength(10);
    expect(presets.rows[0]).toMatchObject({ disease: 'Flu', posterior: 0.6667 });
    expect(presets.rows[3]).toMatchObject({ disease: 'Tuberculosis', posterior: 0.0748 });
  });

  test('presetFor matches names case-insensitively', () => {
    expect(unwrap(presetFor(presets, 'HEPATITIS B')).disease).toBe('Hepatitis B');
  });

  test('presetFor fails with not_found for unknown diseases', () => {
    const error = errorOf(presetFor(presets, 'Dragon Pox'));
    expect(error.kind).toBe('not_found');
    expect(error.details).toEqual({ input: 'Dragon Pox' });
  });

  test('rejects unnamed, duplicate and invalid presets', () => {
    const row = { disease: 'Flu', prevalence: 0.1, sensitivity: 0.9, falsePositive: 0.05 };
    expect(errorOf(buildPresetTable({ rows: [row] })).message).toBe('Preset file must be an object with a "presets" array');
    expect(errorOf(buildPresetTable({ presets: [{ ...row, disease: undefined }] })).details).toEqual({ row: 0 });
    expect(errorOf(buildPresetTable({ presets: [row, { ...row, disease: 'flu ' }] })).message).toBe("Duplicate preset 'flu '");
    expect(errorOf(buildPresetTable({ presets: [row, { ...row, sensitivity: 2 }] })).details).toMatchObject({ row: 1 });
  });
});
