import { Command } from 'commander';
import { ArtifactWriter, defaultArtifactPaths, formatCueLines } from '../../../core/index.js';
import { reportError } from '../report.js';
import {
  createCallbacks,
  createSummarizer,
  parsePositiveInt,
  readTranscriptSource,
  type PipelineOptions,
} from '../shared.js';

interface CuesCommandOptions extends PipelineOptions {
  output?: string;
  json?: boolean;
  showRaw?: boolean;
  saveTemp?: boolean;
}

export function createCuesCommand(): Command {
  const command = new Command('cues')
    .description('Genera los CUEs (secciones con tiempo) de una transcripción o de un video de YouTube')
    .argument('[transcriptFile]', 'Transcripción en cualquiera de los formatos con tiempo')
    .option('-v, --video <url>', 'Video ID o URL de YouTube en lugar de un archivo')
    .option('-l, --languages <list>', 'Idiomas en prioridad separados por coma', 'es,en')
    .option('-o, --output <path>', 'Ruta de salida para los CUEs (por defecto: cues_<archivo>.txt)')
    .option('-m, --model <model>', 'Modelo de Gemini')
    .option('--cue-output-tokens <number>', 'max_output_tokens inicial para los CUEs', parsePositiveInt, 3000)
    .option('--max-attempts <number>', 'Intentos máximos ante salida truncada', parsePositiveInt, 3)
    .option('--json', 'Imprime la respuesta JSON en lugar de líneas')
    .option('--show-raw', 'Muestra la respuesta cruda del modelo por stderr')
    .option('--save-temp', 'Guarda los archivos intermedios en una carpeta temporal')
    .option('--verbose', 'Muestra detalles de depuración')
    .action(async (transcriptFile: string | undefined, options: CuesCommandOptions) => {
      try {
        const summarizer = await createSummarizer(options);
        const callbacks = createCallbacks(options.verbose);
        const writer = new ArtifactWriter();

        const transcriptText = await readTranscriptSource(summarizer, transcriptFile, options.video, callbacks);

        const run = await summarizer.generateCues(transcriptText, callbacks);
        const cueLines = formatCueLines(run.cues);

        if (options.showRaw) {
          console.error('\n🔍 Respuesta cruda (CUEs):');
          console.error(run.raw);
        }

        if (transcriptFile && !options.video) {
          const paths = defaultArtifactPaths(transcriptFile);
          const outputPath = options.output ?? paths.cues;
          await writer.writeToFile(cueLines, outputPath);
          await writer.writeToFile(run.raw, paths.cueResponse);
          console.error(`ℹ️  CUEs guardados en: ${outputPath}`);
          console.error(`ℹ️  Respuesta completa guardada en: ${paths.cueResponse}`);
        } else if (options.output) {
          await writer.writeToFile(cueLines, options.output);
        }

        if (options.saveTemp) {
          const dir = await writer.saveTemp('youtube-cues-', {
            'transcript_ti.txt': transcriptText,
            'cues.json': run.raw,
            'cues.txt': cueLines,
          });
          console.error(`ℹ️  Archivos temporales en: ${dir}`);
        }

        if (run.attempts > 1) {
          console.error(`ℹ️  CUEs reintentados por salida truncada (max_output_tokens usado: ${run.tokenBudget}).`);
        }

        console.log(options.json ? run.raw : cueLines);
      } catch (error) {
        reportError(error, options.verbose);
      }
    });

  return command;
}
