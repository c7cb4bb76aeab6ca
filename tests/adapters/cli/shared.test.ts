import { describe, it, expect, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import {
  buildConfig,
  buildLabels,
  createCallbacks,
  parseFormat,
  parseList,
  parsePositiveInt,
} from '../../../src/adapters/cli/shared.js';
import { DEFAULT_SECTION_LABELS } from '../../../src/core/index.js';

const baseOptions = { languages: 'es', cueOutputTokens: 3000, maxAttempts: 3 };

describe('parseFormat', () => {
  it('accepts the supported formats', () => {
    expect(parseFormat('compact')).toBe('compact');
  });

  it('rejects anything else', () => {
    expect(() => parseFormat('srt')).toThrow(InvalidArgumentError);
  });
});

describe('parsePositiveInt', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('6000')).toBe(6000);
  });

  it.each(['0', '-3', '2.5', 'abc', '12abc'])('rejects %s', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('parseList', () => {
  it('splits on commas and drops blanks', () => {
    expect(parseList('oración, cierre,, ')).toEqual(['oración', 'cierre']);
  });
});

describe('buildLabels', () => {
  it('uses the default labels when none are given', () => {
    expect(buildLabels(baseOptions)).toEqual(DEFAULT_SECTION_LABELS);
  });

  it('overrides each label independently', () => {
    expect(
      buildLabels({ ...baseOptions, startLabel: 'predicación', fallbackLabels: ['anuncios'] })
    ).toEqual({
      startLabel: 'predicación',
      endLabel: 'ministración',
      fallbackLabels: ['anuncios'],
    });
  });

  it('keeps the default fallbacks for an empty list', () => {
    expect(buildLabels({ ...baseOptions, fallbackLabels: [] }).fallbackLabels).toEqual(
      DEFAULT_SECTION_LABELS.fallbackLabels
    );
  });
});

describe('buildConfig', () => {
  it('falls back to Spanish then English for a blank language list', () => {
    expect(buildConfig({ ...baseOptions, languages: ',' }).languages).toEqual(['es', 'en']);
  });

  it('carries budgets and the optional minimum', () => {
    expect(buildConfig({ ...baseOptions, languages: 'pt, es', minPoints: 5 })).toEqual({
      languages: ['pt', 'es'],
      labels: DEFAULT_SECTION_LABELS,
      cueTokenBudget: 3000,
      summaryTokenBudget: 6000,
      maxAttempts: 3,
      minPoints: 5,
    });
  });
});

describe('createCallbacks', () => {
  it('writes progress to stderr and debug only when verbose', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createCallbacks(false).onProgress?.('Rango usado: 00:10:00 -> 00:45:00');
    expect(createCallbacks(false).onDebug).toBeUndefined();
    createCallbacks(true).onDebug?.('detalle');

    expect(error.mock.calls).toEqual([['ℹ️  Rango usado: 00:10:00 -> 00:45:00'], ['🔍 detalle']]);
    error.mockRestore();
  });
});
