import { describe, it, expect } from 'vitest';
import {
  bracketedGrammar,
  compactGrammar,
  initialGrammar,
  parseTranscript,
} from '../../../src/core/transcript/parser.js';
import { renderTranscript } from '../../../src/core/transcript/render.js';
import { FormatError } from '../../../src/core/errors.js';
import { catchError } from '../../helpers/errors.js';

describe('parseTranscript', () => {
  it('parses bracketed ranges', () => {
    expect(parseTranscript('[00:00:01.000 --> 00:00:03.500] Bienvenidos')).toEqual([
      { startSeconds: 1, endSeconds: 3.5, text: 'Bienvenidos' },
    ]);
  });

  it('parses compact ranges', () => {
    expect(parseTranscript('00:00:04|00:00:06.250|a todos')).toEqual([
      { startSeconds: 4, endSeconds: 6.25, text: 'a todos' },
    ]);
  });

  it('parses start-only lines without an end time', () => {
    const [segment] = parseTranscript('00:01:00|hola');
    expect(segment).toEqual({ startSeconds: 60, text: 'hola' });
    expect('endSeconds' in segment).toBe(false);
  });

  it('prefers the compact grammar over start-only when both could apply', () => {
    expect(parseTranscript('00:00:01|00:00:02|texto')).toEqual([
      { startSeconds: 1, endSeconds: 2, text: 'texto' },
    ]);
  });

  it('keeps pipes inside start-only text', () => {
    expect(parseTranscript('00:00:01|a|b')).toEqual([{ startSeconds: 1, text: 'a|b' }]);
  });

  it('accepts mixed grammars and orders segments by start time', () => {
    const raw = [
      '00:00:10|después',
      '[00:00:01.000 --> 00:00:02.000] primero',
      '00:00:05|00:00:08|en medio',
    ].join('\n');

    expect(parseTranscript(raw).map((s) => s.text)).toEqual(['primero', 'en medio', 'después']);
  });

  it('skips blank lines, CRLF endings and lines with empty text', () => {
    const raw = '00:00:01|uno\r\n\r\n   \r\n00:00:02|   \r\n00:00:03|tres\r\n';
    expect(parseTranscript(raw)).toEqual([
      { startSeconds: 1, text: 'uno' },
      { startSeconds: 3, text: 'tres' },
    ]);
  });

  it('fails on an out-of-range minute', () => {
    const error = catchError(() => parseTranscript('12:61:00|hello'));

    expect(error).toBeInstanceOf(FormatError);
    expect(error).toMatchObject({ line: '12:61:00|hello', lineNumber: 1 });
    expect(error).toMatchObject({ message: expect.stringContaining('Minute value 61 out of range') });
  });

  it('fails on the first unrecognized line with its line number', () => {
    const error = catchError(() => parseTranscript('00:00:01|hola\nsin tiempo\n00:00:03|otra'));

    expect(error).toBeInstanceOf(FormatError);
    expect(error).toMatchObject({ line: 'sin tiempo', lineNumber: 2 });
  });

  it('fails on an out-of-range end time in a range grammar', () => {
    const error = catchError(() => parseTranscript('[00:00:01.000 --> 00:00:60.000] hola'));
    expect(error).toMatchObject({ lineNumber: 1 });
    expect(error).toMatchObject({ message: expect.stringContaining('Second value 60 out of range') });
  });

  it('uses only the grammars it is given', () => {
    expect(() => parseTranscript('00:00:01|hola', [bracketedGrammar])).toThrow(FormatError);
  });

  it('is idempotent when re-parsing its own compact serialization', () => {
    const raw = [
      '00:00:00.000|00:00:02.500|Bienvenidos',
      '00:00:02.500|00:00:05.000|a la casa de Dios',
      '01:02:03.040|01:02:04.000|amén',
    ].join('\n');

    const segments = parseTranscript(raw);
    const rendered = renderTranscript(segments, 'compact');

    expect(parseTranscript(rendered)).toEqual(segments);
    expect(renderTranscript(parseTranscript(rendered), 'compact')).toBe(rendered);
    expect(rendered).toBe(raw);
  });
});

describe('grammars', () => {
  it('bracketed grammar matches only bracketed ranges', () => {
    expect(bracketedGrammar.match('[00:00:01 --> 00:00:02] hola')).toEqual({
      start: '00:00:01',
      end: '00:00:02',
      text: 'hola',
    });
    expect(bracketedGrammar.match('00:00:01|hola')).toBeNull();
  });

  it('compact grammar needs two timestamps', () => {
    expect(compactGrammar.match('00:00:01|00:00:02|hola')).toEqual({
      start: '00:00:01',
      end: '00:00:02',
      text: 'hola',
    });
    expect(compactGrammar.match('00:00:01|hola')).toBeNull();
  });

  it('start-only grammar takes everything after the first pipe as text', () => {
    expect(initialGrammar.match('00:00:01|00:00:02|hola')).toEqual({
      start: '00:00:01',
      text: '00:00:02|hola',
    });
  });
});
