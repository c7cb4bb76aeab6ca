import { Command, Option } from 'commander';
import {
  ArtifactWriter,
  YouTubeClient,
  captionsToSegments,
  defaultTranscriptPath,
  parseLanguages,
  renderTranscript,
} from '../../../core/index.js';
import { requireYouTubeApiKey } from '../env.js';
import { reportError } from '../report.js';
import { TRANSCRIPT_FORMATS, parseFormat } from '../shared.js';
import type { TranscriptFormat } from '../../../types/index.js';

interface TranscriptCommandOptions {
  languages: string;
  format: TranscriptFormat;
  output?: string;
  verbose?: boolean;
}

export function createTranscriptCommand(): Command {
  const command = new Command('transcript')
    .description('Descarga la transcripción de un video de YouTube usando los subtítulos disponibles')
    .argument('<video>', 'Video ID (11 caracteres) o URL de YouTube')
    .option('-l, --languages <list>', 'Idiomas en prioridad separados por coma', 'es,en')
    .addOption(
      new Option('-f, --format <format>', `Formato de salida (${TRANSCRIPT_FORMATS.join(' | ')})`)
        .argParser(parseFormat)
        .default('initial')
    )
    .option('-o, --output <path>', 'Ruta de salida (por defecto: transcript_<video_id>.txt)')
    .option('--verbose', 'Muestra detalles de depuración')
    .action(async (video: string, options: TranscriptCommandOptions) => {
      try {
        const youtube = new YouTubeClient(requireYouTubeApiKey());
        const videoId = youtube.parseVideoId(video);
        const captions = await youtube.getCaptions(videoId, parseLanguages(options.languages));
        const text = renderTranscript(captionsToSegments(captions), options.format);

        const outputPath = options.output ?? defaultTranscriptPath(videoId);
        await new ArtifactWriter().writeToFile(text, outputPath);
        console.log(`Transcripción guardada en: ${outputPath}`);
      } catch (error) {
        reportError(error, options.verbose);
      }
    });

  return command;
}
