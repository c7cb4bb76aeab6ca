import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ArtifactWriter,
  defaultArtifactPaths,
  defaultTranscriptPath,
} from '../../../src/core/output/artifacts.js';

describe('defaultArtifactPaths', () => {
  it('places artifacts beside the transcript', () => {
    expect(defaultArtifactPaths(join('servicios', 'domingo.txt'))).toEqual({
      cues: join('servicios', 'cues_domingo.txt'),
      cueResponse: join('servicios', 'response_domingo.txt'),
      summary: join('servicios', 'summary_domingo.txt'),
      summaryResponse: join('servicios', 'summary_response_domingo.txt'),
    });
  });

  it('names the transcript after the video', () => {
    expect(defaultTranscriptPath('abcDEF12345')).toBe('transcript_abcDEF12345.txt');
  });
});

describe('ArtifactWriter', () => {
  let dir: string;
  const writer = new ArtifactWriter();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates parent directories and ends the file with a newline', async () => {
    const path = join(dir, 'a', 'b', 'cues.txt');
    await writer.writeToFile('00:10:00 Mensaje', path);
    await expect(readFile(path, 'utf-8')).resolves.toBe('00:10:00 Mensaje\n');
  });

  it('keeps an existing trailing newline', async () => {
    const path = join(dir, 'summary.txt');
    await writer.writeToFile('🙏 Dios es fiel\n', path);
    await expect(readFile(path, 'utf-8')).resolves.toBe('🙏 Dios es fiel\n');
  });

  it('saves a set of files into a fresh temp directory', async () => {
    const saved = await writer.saveTemp('artifacts-test-', { 'response.txt': '{}', 'cues.txt': 'x' });
    try {
      expect((await readdir(saved)).sort()).toEqual(['cues.txt', 'response.txt']);
      await expect(readFile(join(saved, 'response.txt'), 'utf-8')).resolves.toBe('{}\n');
    } finally {
      await rm(saved, { recursive: true, force: true });
    }
  });
});
