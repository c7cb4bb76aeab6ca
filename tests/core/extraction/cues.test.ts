import { describe, it, expect } from 'vitest';
import {
  CueExtractor,
  formatCueLines,
  normalizeCues,
  parseCueLines,
} from '../../../src/core/extraction/cues.js';
import { RetryPolicy } from '../../../src/core/extraction/retry-policy.js';
import { FormatError, SchemaError } from '../../../src/core/errors.js';
import { catchError } from '../../helpers/errors.js';
import { ScriptedGenerator, stopped, truncated } from '../../helpers/scripted-generator.js';

const TEMPLATE = 'Idiomas: {{LANGUAGES}}\n{{JSON_SCHEMA}}\n---\n{{TRANSCRIPT}}';

describe('normalizeCues', () => {
  it('converts, sorts and keeps the first cue per timestamp', () => {
    const cues = normalizeCues(
      [
        { timestamp: '00:10:00', title: 'Mensaje' },
        { timestamp: '00:00:00', title: 'Bienvenida' },
        { timestamp: 600, title: 'Idea repetida' },
        { timestamp: '00:45:00', title: ' Oración ' },
      ],
      'raw'
    );

    expect(cues).toEqual([
      { timestampSeconds: 0, title: 'Bienvenida' },
      { timestampSeconds: 600, title: 'Mensaje' },
      { timestampSeconds: 2700, title: 'Oración' },
    ]);
  });

  it('always yields strictly ascending timestamps', () => {
    const entries = Array.from({ length: 40 }, (_, i) => ({
      timestamp: ((i * 37) % 13) * 60,
      title: `Sección ${i}`,
    }));

    const cues = normalizeCues(entries, 'raw');

    expect(cues).toHaveLength(13);
    for (let i = 1; i < cues.length; i++) {
      expect(cues[i].timestampSeconds).toBeGreaterThan(cues[i - 1].timestampSeconds);
    }
  });

  it('drops fractions so cue lines read back to the same cues', () => {
    const cues = normalizeCues(
      [
        { timestamp: 600.2, title: 'Mensaje' },
        { timestamp: '00:10:00.700', title: 'Ministración' },
        { timestamp: 2700.9, title: 'Oración' },
      ],
      'raw'
    );

    expect(cues).toEqual([
      { timestampSeconds: 600, title: 'Mensaje' },
      { timestampSeconds: 2700, title: 'Oración' },
    ]);
    expect(parseCueLines(formatCueLines(cues))).toEqual(cues);
  });

  it('rejects an empty cue list', () => {
    const error = catchError(() => normalizeCues([], '{"cues": []}'));
    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({ rawResponse: '{"cues": []}' });
  });

  it('rejects timestamps it cannot convert', () => {
    expect(() => normalizeCues([{ timestamp: '10 min', title: 'Mensaje' }], 'raw')).toThrow(SchemaError);
  });
});

describe('CueExtractor', () => {
  const response = JSON.stringify({
    cues: [
      { timestamp: '00:00:00', title: 'Bienvenida' },
      { timestamp: '00:10:00', title: 'Mensaje' },
    ],
  });

  it('builds the prompt from the template and returns cues', async () => {
    const generator = new ScriptedGenerator([stopped(response)]);
    const extractor = new CueExtractor(new RetryPolicy(generator), { template: TEMPLATE });

    const cues = await extractor.extract('00:00:00|Bienvenidos', ['es', 'en']);

    expect(cues).toEqual([
      { timestampSeconds: 0, title: 'Bienvenida' },
      { timestampSeconds: 600, title: 'Mensaje' },
    ]);

    const { prompt, maxOutputTokens } = generator.requests[0];
    expect(prompt.startsWith('Idiomas: es, en\n{')).toBe(true);
    expect(prompt).toContain('"cues"');
    expect(prompt.endsWith('---\n00:00:00|Bienvenidos')).toBe(true);
    expect(maxOutputTokens).toBe(3000);
  });

  it('reports how the extraction went', async () => {
    const generator = new ScriptedGenerator([truncated('{"cues": ['), stopped(response)]);
    const extractor = new CueExtractor(new RetryPolicy(generator), { template: TEMPLATE, tokenBudget: 500 });

    const details = await extractor.extractWithDetails('00:00:00|Bienvenidos');

    expect(details.attempts).toBe(2);
    expect(details.tokenBudget).toBe(1000);
    expect(details.completionReason).toBe('stop');
    expect(details.raw).toBe(response);
    expect(details.cues).toHaveLength(2);
  });

  it('rejects cues with blank titles', async () => {
    const generator = new ScriptedGenerator([stopped('{"cues": [{"timestamp": "00:00:00", "title": "  "}]}')]);
    const extractor = new CueExtractor(new RetryPolicy(generator), { template: TEMPLATE });

    await expect(extractor.extract('00:00:00|hola')).rejects.toBeInstanceOf(SchemaError);
  });

  it('rejects numeric timestamps that overflow to Infinity', async () => {
    const raw = '{"cues": [{"timestamp": 1e400, "title": "Mensaje"}]}';
    const generator = new ScriptedGenerator([stopped(raw)]);
    const extractor = new CueExtractor(new RetryPolicy(generator), { template: TEMPLATE });

    const error = await extractor.extract('00:00:00|hola').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({ rawResponse: raw });
  });

  it('rejects cue entries with unexpected fields', async () => {
    const generator = new ScriptedGenerator([
      stopped('{"cues": [{"timestamp": "00:00:00", "title": "Bienvenida", "end": "00:05:00"}]}'),
    ]);
    const extractor = new CueExtractor(new RetryPolicy(generator), { template: TEMPLATE });

    await expect(extractor.extract('00:00:00|hola')).rejects.toBeInstanceOf(SchemaError);
  });
});

describe('cue lines', () => {
  const cues = [
    { timestampSeconds: 0, title: 'Bienvenida' },
    { timestampSeconds: 3723, title: 'Mensaje: La fe que vence' },
  ];

  it('formats one cue per line', () => {
    expect(formatCueLines(cues)).toBe('00:00:00 Bienvenida\n01:02:03 Mensaje: La fe que vence');
  });

  it('reads formatted lines back', () => {
    expect(parseCueLines(`${formatCueLines(cues)}\n\n`)).toEqual(cues);
  });

  it('fails on a malformed line', () => {
    const error = catchError(() => parseCueLines('00:00:00 Bienvenida\n\nsin tiempo'));
    expect(error).toBeInstanceOf(FormatError);
    expect(error).toMatchObject({ lineNumber: 3, line: 'sin tiempo' });
  });
});
