import { mkdir, mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, extname, join } from 'path';

export interface ArtifactPaths {
  cues: string;
  cueResponse: string;
  summary: string;
  summaryResponse: string;
}

/**
 * Default artifact locations, written beside the transcript:
 * cues_<stem>.txt, response_<stem>.txt, summary_<stem>.txt, summary_response_<stem>.txt
 */
export function defaultArtifactPaths(transcriptPath: string): ArtifactPaths {
  const dir = dirname(transcriptPath);
  const stem = basename(transcriptPath, extname(transcriptPath));

  return {
    cues: join(dir, `cues_${stem}.txt`),
    cueResponse: join(dir, `response_${stem}.txt`),
    summary: join(dir, `summary_${stem}.txt`),
    summaryResponse: join(dir, `summary_response_${stem}.txt`),
  };
}

export function defaultTranscriptPath(videoId: string): string {
  return `transcript_${videoId}.txt`;
}

export class ArtifactWriter {
  // Writes text with a trailing newline, creating parent directories
  async writeToFile(content: string, outputPath: string): Promise<void> {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
  }

  /**
   * Write every file into a fresh directory under the OS temp dir and return
   * its path.
   */
  async saveTemp(prefix: string, files: Record<string, string>): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), prefix));
    for (const [name, content] of Object.entries(files)) {
      await this.writeToFile(content, join(dir, name));
    }
    return dir;
  }
}
