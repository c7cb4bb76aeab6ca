import { Command } from 'commander';
import { readFile } from 'fs/promises';
import {
  ArtifactWriter,
  DEFAULT_SECTION_LABELS,
  defaultArtifactPaths,
  formatCueLines,
  formatSummaryLines,
  formatTimestamp,
  parseCueLines,
  type CueRun,
  type SummaryRun,
} from '../../../core/index.js';
import { reportError } from '../report.js';
import {
  createCallbacks,
  createSummarizer,
  parseList,
  parsePositiveInt,
  type PipelineOptions,
} from '../shared.js';
import { END_OF_TRANSCRIPT, type Cue } from '../../../types/index.js';

interface SummaryCommandOptions extends PipelineOptions {
  output?: string;
  json?: boolean;
  showRaw?: boolean;
  saveTemp?: boolean;
}

function toJsonOutput(run: SummaryRun): string {
  const { range } = run;
  return JSON.stringify({
    summary_points: run.points.map((point) => formatSummaryLines([point])),
    range: {
      start: formatTimestamp(range.startSeconds),
      end: range.endSeconds === END_OF_TRANSCRIPT ? 'END_OF_TRANSCRIPT' : formatTimestamp(range.endSeconds),
    },
    range_source: range.source,
  });
}

export function createSummaryCommand(): Command {
  const command = new Command('summary')
    .description(
      "Genera un resumen en puntos (con emojis) del bloque entre 'Mensaje' y antes de 'Ministración'"
    )
    .argument('[transcriptFile]', 'Transcripción en cualquiera de los formatos con tiempo')
    .argument('[cuesFile]', 'CUEs por línea (HH:MM:SS Título); si falta, se generan')
    .option('-v, --video <url>', 'Video ID o URL de YouTube en lugar de archivos')
    .option('-l, --languages <list>', 'Idiomas en prioridad separados por coma', 'es,en')
    .option('-o, --output <path>', 'Ruta de salida del resumen (por defecto: summary_<archivo>.txt)')
    .option('-m, --model <model>', 'Modelo de Gemini')
    .option('--start-label <label>', 'Etiqueta que marca el inicio del bloque', DEFAULT_SECTION_LABELS.startLabel)
    .option('--end-label <label>', 'Etiqueta que marca el fin del bloque', DEFAULT_SECTION_LABELS.endLabel)
    .option('--fallback-labels <list>', 'Secciones posteriores alternativas, en orden, separadas por coma', parseList)
    .option('--max-output-tokens <number>', 'max_output_tokens inicial para el resumen', parsePositiveInt, 6000)
    .option('--cue-output-tokens <number>', 'max_output_tokens inicial para los CUEs', parsePositiveInt, 3000)
    .option('--max-attempts <number>', 'Intentos máximos ante salida truncada', parsePositiveInt, 3)
    .option('--min-points <number>', 'Rechaza resúmenes con menos puntos que este mínimo', parsePositiveInt)
    .option('--json', 'Imprime la respuesta en JSON en lugar de puntos por línea')
    .option('--show-raw', 'Muestra las respuestas crudas del modelo por stderr')
    .option('--save-temp', 'Guarda los archivos intermedios en una carpeta temporal')
    .option('--verbose', 'Muestra detalles de depuración')
    .action(
      async (
        transcriptFile: string | undefined,
        cuesFile: string | undefined,
        options: SummaryCommandOptions
      ) => {
        try {
          const summarizer = await createSummarizer(options);
          const callbacks = createCallbacks(options.verbose);
          const writer = new ArtifactWriter();

          let transcriptText: string;
          let cueRun: CueRun | null = null;
          let cues: Cue[];
          let run: SummaryRun;

          if (options.video) {
            const result = await summarizer.summarizeVideo(options.video, callbacks);
            transcriptText = result.transcriptText;
            cueRun = result.cueRun;
            cues = cueRun.cues;
            run = result.summaryRun;
          } else {
            if (!transcriptFile) {
              throw new Error('Se necesita un archivo de transcripción o la opción --video.');
            }
            transcriptText = await readFile(transcriptFile, 'utf-8');
            if (cuesFile) {
              cues = parseCueLines(await readFile(cuesFile, 'utf-8'));
            } else {
              cueRun = await summarizer.generateCues(transcriptText, callbacks);
              cues = cueRun.cues;
            }
            run = await summarizer.summarizeMessage(cueRun?.segments ?? transcriptText, cues, callbacks);
          }
          const summaryLines = formatSummaryLines(run.points);

          if (options.showRaw) {
            if (cueRun) {
              console.error('\n🔍 Respuesta cruda (CUEs):');
              console.error(cueRun.raw);
            }
            console.error('\n🔍 Respuesta cruda (resumen):');
            console.error(run.raw);
          }

          if (transcriptFile && !options.video) {
            const paths = defaultArtifactPaths(transcriptFile);
            const outputPath = options.output ?? paths.summary;
            await writer.writeToFile(summaryLines, outputPath);
            await writer.writeToFile(run.raw, paths.summaryResponse);
            console.error(`ℹ️  Resumen guardado en: ${outputPath}`);
            console.error(`ℹ️  Respuesta JSON guardada en: ${paths.summaryResponse}`);
          } else if (options.output) {
            await writer.writeToFile(summaryLines, options.output);
          }

          if (options.saveTemp) {
            const files: Record<string, string> = {
              'transcript_ti.txt': transcriptText,
              'cues.txt': formatCueLines(cues),
              'summary.json': run.raw,
              'summary.txt': summaryLines,
            };
            if (cueRun) files['cues.json'] = cueRun.raw;
            const dir = await writer.saveTemp('youtube-message-summary-', files);
            console.error(`ℹ️  Archivos temporales en: ${dir}`);
          }

          console.error(
            `ℹ️  Resumen finish_reason: ${run.completionReason} (max_output_tokens usado: ${run.tokenBudget})`
          );
          if (run.attempts > 1) {
            console.error(
              `ℹ️  Se reintentó por salida truncada. max_output_tokens usado: ${run.tokenBudget} (finish_reason final: ${run.completionReason}).`
            );
          }

          console.log(options.json ? toJsonOutput(run) : summaryLines);
        } catch (error) {
          reportError(error, options.verbose);
        }
      }
    );

  return command;
}
